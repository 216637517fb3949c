import { env } from '../env';
import { type AudioFormat, PCM16_24K, PCMU_8K } from '../media/types';
import { CUSTOMER_SERVICE_TOOLS } from '../tools/definitions';
import type { ToolDefinition } from '../tools/types';

export interface VoiceParameters {
  name: string;
  type: string;
  temperature?: number;
}

export interface TurnDetectionConfig {
  type: string;
  threshold: number;
  prefixPaddingMs: number;
  silenceDurationMs: number;
  removeFillerWords: boolean;
}

/** Supplied once per call; frozen so it cannot change mid-call. */
export interface SessionConfiguration {
  readonly model: string;
  readonly instructions: string;
  readonly tools: readonly ToolDefinition[];
  readonly voice: Readonly<VoiceParameters>;
  readonly turnDetection: Readonly<TurnDetectionConfig>;
  readonly audioFormat: Readonly<AudioFormat>;
  readonly noiseSuppression: boolean;
  readonly echoCancellation: boolean;
  readonly transcriptionModel?: string;
  /** Ask the model to speak first once the session is configured. */
  readonly greetFirst: boolean;
}

export const DEFAULT_INSTRUCTIONS = `## Objective
You are a voice agent called 'Assistant', a customer service agent.

## Main Functions
1. Existing clients: if they identify as a client, ask for their client ID and check their contracted products and open support cases using 'lookup_client'.
2. Support cases: if a client asks to open a support case, use 'create_support_case' with their client ID and a description of the problem.
3. General information: if they are not a client, answer about general products and services.
4. Conversation summary: before ending the call with an existing client, always use 'send_conversation_summary' to email them a summary of what was discussed.

## Personality and Tone
- Warm, accessible and professional
- Brief, natural, spoken answers in English
- No emojis, annotations or parentheses`;

export const DEFAULT_TURN_DETECTION: TurnDetectionConfig = {
  type: 'azure_semantic_vad',
  threshold: 0.3,
  prefixPaddingMs: 200,
  silenceDurationMs: 200,
  removeFillerWords: false,
};

/** The AI side format that bridges to a transport format without resampling. */
export function aiFormatFor(transportFormat: AudioFormat): AudioFormat {
  return transportFormat.encoding === 'mulaw' ? PCMU_8K : PCM16_24K;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const entry of Object.values(value)) {
      deepFreeze(entry);
    }
  }
  return value;
}

export function buildSessionConfiguration(
  overrides: Partial<SessionConfiguration> & Pick<SessionConfiguration, 'audioFormat'>,
): SessionConfiguration {
  const config: SessionConfiguration = {
    model: overrides.model ?? env.REALTIME_MODEL,
    instructions: overrides.instructions ?? DEFAULT_INSTRUCTIONS,
    tools: (overrides.tools ?? CUSTOMER_SERVICE_TOOLS).map((tool) => structuredClone(tool)),
    voice: { ...(overrides.voice ?? { name: env.REALTIME_VOICE, type: env.REALTIME_VOICE_TYPE, temperature: 0.8 }) },
    turnDetection: { ...(overrides.turnDetection ?? DEFAULT_TURN_DETECTION) },
    audioFormat: { ...overrides.audioFormat },
    noiseSuppression: overrides.noiseSuppression ?? true,
    echoCancellation: overrides.echoCancellation ?? true,
    transcriptionModel: overrides.transcriptionModel ?? 'whisper-1',
    greetFirst: overrides.greetFirst ?? true,
  };
  return deepFreeze(config);
}
