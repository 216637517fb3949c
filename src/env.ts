import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const stringToBoolean = (value: unknown): unknown => {
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === '') {
      return undefined;
    }
    if (normalized === 'true') {
      return true;
    }
    if (normalized === 'false') {
      return false;
    }
  }
  return value;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive(),
  LOG_LEVEL: z.preprocess(
    emptyToUndefined,
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ),
  PUBLIC_BASE_URL: z.string().min(1),
  MEDIA_STREAM_TOKEN: z.string().min(1),

  TELNYX_API_KEY: z.string().min(1),
  TELNYX_PUBLIC_KEY: z.string().min(1),
  TELNYX_WEBHOOK_SECRET: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  TELNYX_SKIP_SIGNATURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  TELNYX_STREAM_TRACK: z
    .enum(['inbound_track', 'outbound_track', 'both_tracks'])
    .default('inbound_track'),

  REALTIME_URL: z.string().min(1),
  REALTIME_API_KEY: z.string().min(1),
  REALTIME_AUTH_MODE: z.preprocess(emptyToUndefined, z.enum(['api-key', 'bearer']).default('api-key')),
  REALTIME_MODEL: z.preprocess(emptyToUndefined, z.string().min(1).default('gpt-4o-mini')),
  REALTIME_VOICE: z.preprocess(
    emptyToUndefined,
    z.string().min(1).default('en-US-Ava:DragonHDLatestNeural'),
  ),
  REALTIME_VOICE_TYPE: z.preprocess(emptyToUndefined, z.string().min(1).default('azure-standard')),
  REALTIME_SETUP_TIMEOUT_MS: positiveInt(10_000),

  AI_SEND_QUEUE_FRAMES: positiveInt(200),
  TRANSPORT_SEND_QUEUE_FRAMES: positiveInt(500),
  PLAYOUT_LEAD_MS: positiveInt(200),
  SESSION_CLOSE_GRACE_MS: positiveInt(2000),

  TOOL_TIMEOUT_MS: positiveInt(8000),
  TOOL_MAX_CONCURRENT: positiveInt(4),

  DATABASE_URL: z.string().min(1),

  SMTP_HOST: z.string().min(1),
  SMTP_PORT: positiveInt(587),
  SMTP_SECURE: z.preprocess(stringToBoolean, z.boolean().default(false)),
  SMTP_USER: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SMTP_PASSWORD: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SUMMARY_SENDER_EMAIL: z.preprocess(
    emptyToUndefined,
    z.string().email().default('donotreply@example.com'),
  ),
  SUPPORT_EMAIL: z.preprocess(emptyToUndefined, z.string().email().default('support@example.com')),

  REDIS_URL: z.string().min(1),
  CAPACITY_ENABLED: z.preprocess(stringToBoolean, z.boolean().default(true)),
  GLOBAL_CONCURRENCY_CAP: z.coerce.number().int().positive(),
  CAPACITY_TTL_SECONDS: z.coerce.number().int().positive(),
  CAP_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default('cap')),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join(', ');
  throw new Error(`Invalid environment variables: ${issues}`);
}

export const env = parsed.data;
