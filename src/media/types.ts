export type AudioEncoding = 'pcm16le' | 'mulaw';

export interface AudioFormat {
  encoding: AudioEncoding;
  sampleRateHz: number;
}

export type AudioSource = 'caller' | 'ai';

export type WireFraming = 'base64' | 'binary';

export type WirePayload = string | Buffer;

export interface AudioFrame {
  source: AudioSource;
  /** Monotonic per direction, starting at 0. */
  sequence: number;
  format: AudioFormat;
  payload: Buffer;
  /** AI frames only: the response item and content part the audio belongs to. */
  itemId?: string;
  contentIndex?: number;
}

export const PCMU_8K: AudioFormat = { encoding: 'mulaw', sampleRateHz: 8000 };
export const PCM16_24K: AudioFormat = { encoding: 'pcm16le', sampleRateHz: 24000 };

export function formatLabel(format: AudioFormat): string {
  return `${format.encoding}@${format.sampleRateHz}`;
}

export function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.encoding === b.encoding && a.sampleRateHz === b.sampleRateHz;
}
