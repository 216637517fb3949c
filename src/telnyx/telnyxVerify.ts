import crypto from 'crypto';
import { asRecord } from '../ai/protocol';
import { env } from '../env';
import type { TelnyxEventMeta } from './types';

const MAX_SKEW_SECONDS = 300;

export interface TelnyxSignatureInput {
  rawBody: Buffer;
  signature: string;
  timestamp: string;
  scheme?: 'ed25519' | 'hmac-sha256';
  /** Overrides the configured keys; used by tests. */
  publicKey?: string;
  hmacSecret?: string;
  nowEpochSeconds?: number;
}

export interface TelnyxSignatureCheck {
  ok: boolean;
  skipped: boolean;
}

function isHex(value: string): boolean {
  return /^[0-9a-f]+$/i.test(value);
}

function parsePublicKey(publicKey: string): crypto.KeyObject {
  if (publicKey.includes('BEGIN PUBLIC KEY')) {
    return crypto.createPublicKey(publicKey);
  }

  const keyBuffer = Buffer.from(publicKey, isHex(publicKey) ? 'hex' : 'base64');
  if (keyBuffer.length === 32) {
    // Telnyx portal keys are the raw 32-byte ed25519 key; wrap it as SPKI DER.
    const spkiPrefix = Buffer.from('302a300506032b6570032100', 'hex');
    return crypto.createPublicKey({ key: Buffer.concat([spkiPrefix, keyBuffer]), format: 'der', type: 'spki' });
  }
  return crypto.createPublicKey({ key: keyBuffer, format: 'der', type: 'spki' });
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

export function extractTelnyxEventMeta(payload: unknown): TelnyxEventMeta {
  const data = asRecord(asRecord(payload)?.data);
  if (!data) {
    return {};
  }

  const eventType = getString(data.event_type);
  const eventPayload = asRecord(data.payload);
  if (!eventPayload) {
    return { eventType };
  }

  return {
    eventType,
    callControlId: getString(eventPayload.call_control_id),
    direction: getString(eventPayload.direction),
    hangupCause: getString(eventPayload.hangup_cause),
  };
}

export function extractTelnyxEventMetaFromRawBody(rawBody: Buffer): TelnyxEventMeta {
  if (rawBody.length === 0) {
    return {};
  }

  try {
    return extractTelnyxEventMeta(JSON.parse(rawBody.toString('utf8')));
  } catch {
    return {};
  }
}

function verifyHmacSignature(message: Buffer, signature: string, secret: string): boolean {
  const digest = crypto.createHmac('sha256', secret).update(message).digest();
  const signatureBuffer = Buffer.from(signature, isHex(signature) ? 'hex' : 'base64');

  if (signatureBuffer.length !== digest.length) {
    return false;
  }

  return crypto.timingSafeEqual(digest, signatureBuffer);
}

export function verifyTelnyxSignature(input: TelnyxSignatureInput): TelnyxSignatureCheck {
  if (env.TELNYX_SKIP_SIGNATURE) {
    return { ok: true, skipped: true };
  }

  const signature = input.signature.trim();
  const timestamp = input.timestamp.trim();
  if (!signature || !timestamp) {
    return { ok: false, skipped: false };
  }

  const parsedTimestamp = Number.parseInt(timestamp, 10);
  if (!Number.isFinite(parsedTimestamp)) {
    return { ok: false, skipped: false };
  }

  const now = input.nowEpochSeconds ?? Math.floor(Date.now() / 1000);
  const normalizedTimestamp = parsedTimestamp > 1_000_000_000_000 ? Math.floor(parsedTimestamp / 1000) : parsedTimestamp;
  if (Math.abs(now - normalizedTimestamp) > MAX_SKEW_SECONDS) {
    return { ok: false, skipped: false };
  }

  const message = Buffer.concat([Buffer.from(`${timestamp}|`, 'utf8'), input.rawBody]);

  try {
    if (input.scheme === 'hmac-sha256') {
      const secret = (input.hmacSecret ?? env.TELNYX_WEBHOOK_SECRET)?.trim();
      if (!secret) {
        return { ok: false, skipped: false };
      }
      return { ok: verifyHmacSignature(message, signature, secret), skipped: false };
    }

    const publicKey = parsePublicKey((input.publicKey ?? env.TELNYX_PUBLIC_KEY).trim());
    const signatureBuffer = Buffer.from(signature, isHex(signature) ? 'hex' : 'base64');
    return { ok: crypto.verify(null, message, publicKey, signatureBuffer), skipped: false };
  } catch {
    return { ok: false, skipped: false };
  }
}
