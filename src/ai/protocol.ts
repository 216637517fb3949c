// Realtime speech endpoint wire protocol: JSON events over a WebSocket.
// Accepts both the `response.audio.*` and `response.output_audio.*` event names.

import { UnsupportedFormatError } from '../errors';
import { type AudioFormat, formatLabel } from '../media/types';
import type { ToolDefinition } from '../tools/types';

export type RealtimeAudioFormat = 'pcm16' | 'g711_ulaw';

export type RealtimeServerMessage =
  | { kind: 'session_created'; sessionId?: string }
  | { kind: 'session_updated' }
  | { kind: 'audio_delta'; delta: string; itemId?: string; contentIndex: number; responseId?: string }
  | { kind: 'audio_done'; itemId?: string }
  | { kind: 'speech_started'; audioStartMs?: number; itemId?: string }
  | { kind: 'speech_stopped'; audioEndMs?: number }
  | { kind: 'function_call'; callId: string; name: string; arguments: Record<string, unknown> }
  | { kind: 'response_created'; responseId?: string }
  | { kind: 'response_done'; responseId?: string; status?: string }
  | { kind: 'transcript'; role: 'caller' | 'assistant'; text: string; itemId?: string }
  | { kind: 'transcription_failed'; message: string }
  | { kind: 'error'; message: string; code?: string; eventId?: string }
  | { kind: 'ignored'; type: string };

export function asRecord(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  const record: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    record[key] = entry;
  }
  return record;
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function getNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function rawToString(raw: unknown): string | undefined {
  if (typeof raw === 'string') return raw;
  if (Buffer.isBuffer(raw)) return raw.toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  if (Array.isArray(raw) && raw.every((part) => Buffer.isBuffer(part))) {
    return Buffer.concat(raw).toString('utf8');
  }
  return undefined;
}

export function parseToolArguments(raw: unknown): Record<string, unknown> {
  if (typeof raw === 'string') {
    try {
      return asRecord(JSON.parse(raw)) ?? {};
    } catch {
      return {};
    }
  }
  return asRecord(raw) ?? {};
}

export function parseServerMessage(raw: unknown): RealtimeServerMessage | null {
  const text = rawToString(raw);
  if (text === undefined) {
    return null;
  }

  let event: Record<string, unknown> | undefined;
  try {
    event = asRecord(JSON.parse(text));
  } catch {
    return null;
  }
  const type = getString(event?.type);
  if (!event || !type) {
    return null;
  }

  switch (type) {
    case 'session.created':
      return { kind: 'session_created', sessionId: getString(asRecord(event.session)?.id) };
    case 'session.updated':
      return { kind: 'session_updated' };
    case 'response.audio.delta':
    case 'response.output_audio.delta': {
      const delta = getString(event.delta);
      if (!delta) return { kind: 'ignored', type };
      return {
        kind: 'audio_delta',
        delta,
        itemId: getString(event.item_id),
        contentIndex: getNumber(event.content_index) ?? 0,
        responseId: getString(event.response_id),
      };
    }
    case 'response.audio.done':
    case 'response.output_audio.done':
      return { kind: 'audio_done', itemId: getString(event.item_id) };
    case 'input_audio_buffer.speech_started':
      return {
        kind: 'speech_started',
        audioStartMs: getNumber(event.audio_start_ms),
        itemId: getString(event.item_id),
      };
    case 'input_audio_buffer.speech_stopped':
      return { kind: 'speech_stopped', audioEndMs: getNumber(event.audio_end_ms) };
    case 'response.function_call_arguments.done': {
      const callId = getString(event.call_id);
      const name = getString(event.name);
      if (!callId || !name) return { kind: 'ignored', type };
      return { kind: 'function_call', callId, name, arguments: parseToolArguments(event.arguments) };
    }
    case 'response.created':
      return { kind: 'response_created', responseId: getString(asRecord(event.response)?.id) };
    case 'response.done': {
      const response = asRecord(event.response);
      return { kind: 'response_done', responseId: getString(response?.id), status: getString(response?.status) };
    }
    case 'conversation.item.input_audio_transcription.completed':
      return {
        kind: 'transcript',
        role: 'caller',
        text: getString(event.transcript) ?? '',
        itemId: getString(event.item_id),
      };
    case 'conversation.item.input_audio_transcription.failed':
      return {
        kind: 'transcription_failed',
        message: getString(asRecord(event.error)?.message) ?? 'transcription failed',
      };
    case 'response.audio_transcript.done':
    case 'response.output_audio_transcript.done':
      return {
        kind: 'transcript',
        role: 'assistant',
        text: getString(event.transcript) ?? '',
        itemId: getString(event.item_id),
      };
    case 'error': {
      const error = asRecord(event.error);
      return {
        kind: 'error',
        message: getString(error?.message) ?? getString(event.message) ?? 'unknown realtime error',
        code: getString(error?.code),
        eventId: getString(error?.event_id) ?? getString(event.event_id),
      };
    }
    default:
      return { kind: 'ignored', type };
  }
}

export function toRealtimeAudioFormat(format: AudioFormat): RealtimeAudioFormat {
  if (format.encoding === 'mulaw' && format.sampleRateHz === 8000) {
    return 'g711_ulaw';
  }
  if (format.encoding === 'pcm16le' && (format.sampleRateHz === 24000 || format.sampleRateHz === 16000)) {
    return 'pcm16';
  }
  throw new UnsupportedFormatError(`realtime endpoint does not accept ${formatLabel(format)}`);
}

export interface SessionUpdateInput {
  instructions: string;
  tools: readonly ToolDefinition[];
  voice: { name: string; type: string; temperature?: number };
  turnDetection: {
    type: string;
    threshold: number;
    prefixPaddingMs: number;
    silenceDurationMs: number;
    removeFillerWords: boolean;
  };
  audioFormat: AudioFormat;
  noiseSuppression: boolean;
  echoCancellation: boolean;
  transcriptionModel?: string;
}

export function sessionUpdate(input: SessionUpdateInput): Record<string, unknown> {
  const wireFormat = toRealtimeAudioFormat(input.audioFormat);
  const session: Record<string, unknown> = {
    instructions: input.instructions,
    tools: input.tools,
    tool_choice: input.tools.length > 0 ? 'auto' : 'none',
    turn_detection: {
      type: input.turnDetection.type,
      threshold: input.turnDetection.threshold,
      prefix_padding_ms: input.turnDetection.prefixPaddingMs,
      silence_duration_ms: input.turnDetection.silenceDurationMs,
      remove_filler_words: input.turnDetection.removeFillerWords,
    },
    voice: input.voice,
    input_audio_format: wireFormat,
    output_audio_format: wireFormat,
  };

  if (wireFormat === 'pcm16') {
    session.input_audio_sampling_rate = input.audioFormat.sampleRateHz;
  }
  if (input.noiseSuppression) {
    session.input_audio_noise_reduction = { type: 'azure_deep_noise_suppression' };
  }
  if (input.echoCancellation) {
    session.input_audio_echo_cancellation = { type: 'server_echo_cancellation' };
  }
  if (input.transcriptionModel) {
    session.input_audio_transcription = { model: input.transcriptionModel };
  }

  return { type: 'session.update', session };
}

export function responseCreate(): Record<string, unknown> {
  return { type: 'response.create' };
}

export function inputAudioAppend(base64Audio: string): Record<string, unknown> {
  return { type: 'input_audio_buffer.append', audio: base64Audio };
}

export function functionCallOutput(callId: string, output: string): Record<string, unknown> {
  return {
    type: 'conversation.item.create',
    item: {
      type: 'function_call_output',
      call_id: callId,
      output,
    },
  };
}

export function responseCancel(eventId: string): Record<string, unknown> {
  return { type: 'response.cancel', event_id: eventId };
}

export function itemTruncate(
  eventId: string,
  itemId: string,
  contentIndex: number,
  audioEndMs: number,
): Record<string, unknown> {
  return {
    type: 'conversation.item.truncate',
    event_id: eventId,
    item_id: itemId,
    content_index: contentIndex,
    audio_end_ms: Math.max(0, Math.floor(audioEndMs)),
  };
}
