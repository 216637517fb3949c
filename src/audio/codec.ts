import { UnsupportedFormatError } from '../errors';
import {
  type AudioFormat,
  type AudioFrame,
  type AudioSource,
  type WireFraming,
  type WirePayload,
  formatLabel,
  sameFormat,
} from '../media/types';
import { decodePcmu, encodePcmu } from './g711';

const SUPPORTED_RATES_HZ = new Set([8000, 16000, 24000]);

export interface InboundContext {
  source: AudioSource;
  sequence: number;
  format: AudioFormat;
  framing: WireFraming;
  itemId?: string;
  contentIndex?: number;
}

/** Transforms frames between the transport's and the AI session's negotiated formats. */
export interface AudioCodec {
  readonly transportFormat: AudioFormat;
  readonly aiFormat: AudioFormat;
  readonly passthrough: boolean;
  toAi(frame: AudioFrame): AudioFrame;
  toCaller(frame: AudioFrame): AudioFrame;
}

export function bytesPerSample(format: AudioFormat): number {
  return format.encoding === 'pcm16le' ? 2 : 1;
}

export function frameDurationMs(format: AudioFormat, byteLength: number): number {
  const samples = Math.floor(byteLength / bytesPerSample(format));
  return (samples / format.sampleRateHz) * 1000;
}

export function decodeInbound(wire: WirePayload, context: InboundContext): AudioFrame {
  let payload: Buffer;
  if (context.framing === 'base64') {
    payload = Buffer.from(typeof wire === 'string' ? wire : wire.toString('utf8'), 'base64');
  } else {
    payload = typeof wire === 'string' ? Buffer.from(wire, 'binary') : wire;
  }

  return {
    source: context.source,
    sequence: context.sequence,
    format: context.format,
    payload,
    itemId: context.itemId,
    contentIndex: context.contentIndex,
  };
}

export function encodeOutbound(frame: AudioFrame, framing: WireFraming): WirePayload {
  return framing === 'base64' ? frame.payload.toString('base64') : frame.payload;
}

function validateFormat(format: AudioFormat, side: string): void {
  if (format.encoding !== 'pcm16le' && format.encoding !== 'mulaw') {
    throw new UnsupportedFormatError(`${side} encoding ${String(format.encoding)} is not supported`);
  }
  if (!SUPPORTED_RATES_HZ.has(format.sampleRateHz)) {
    throw new UnsupportedFormatError(`${side} sample rate ${format.sampleRateHz} is not supported`);
  }
}

function transcode(frame: AudioFrame, target: AudioFormat): AudioFrame {
  if (sameFormat(frame.format, target)) {
    return frame;
  }

  const payload = target.encoding === 'pcm16le' ? decodePcmu(frame.payload) : encodePcmu(frame.payload);
  return { ...frame, format: target, payload };
}

/**
 * Resolves the codec for one call. Runs at setup; a pair that cannot be bridged
 * fails here and never mid-stream.
 */
export function negotiateCodec(transportFormat: AudioFormat, aiFormat: AudioFormat): AudioCodec {
  validateFormat(transportFormat, 'transport');
  validateFormat(aiFormat, 'ai');

  if (transportFormat.sampleRateHz !== aiFormat.sampleRateHz) {
    throw new UnsupportedFormatError(
      `cannot bridge ${formatLabel(transportFormat)} to ${formatLabel(aiFormat)} without resampling`,
    );
  }

  const transport = { ...transportFormat };
  const ai = { ...aiFormat };

  return {
    transportFormat: transport,
    aiFormat: ai,
    passthrough: sameFormat(transport, ai),
    toAi: (frame) => transcode(frame, ai),
    toCaller: (frame) => transcode(frame, transport),
  };
}
