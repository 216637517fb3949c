import type { AudioFormat, AudioFrame } from '../media/types';

export type TransportKind = 'telnyx' | 'browser';

export type TransportState = 'Ringing' | 'Active' | 'Ended';

export type TransportEvent =
  | { type: 'audio'; frame: AudioFrame }
  | { type: 'dtmf'; digit: string }
  | { type: 'speech_started' }
  | { type: 'caller_hangup'; reason: string }
  | { type: 'transport_lost'; message: string };

/** Where outbound playout stands for the AI item currently being written to the wire. */
export interface PlayoutPosition {
  itemId: string;
  contentIndex: number;
  /** Audio written to the far end for this item. */
  sentMs: number;
  /** Epoch ms at which the item's first frame was written. */
  startedAt: number;
}

/** The subset of a `ws` server-side socket a transport relies on. */
export interface MediaSocket {
  readonly readyState: number;
  send(data: string | Buffer, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message' | 'close' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export interface TransportSession {
  readonly id: string;
  readonly kind: TransportKind;
  readonly format: AudioFormat;
  readonly state: TransportState;
  answer(): void;
  sendAudio(frame: AudioFrame): boolean;
  clearAudio(): number;
  queuedAudioFrames(): number;
  /** True while queued or already written audio has not finished playing at the far end. */
  isPlaying(): boolean;
  playoutPosition(): PlayoutPosition | null;
  receiveEvents(): AsyncIterable<TransportEvent>;
  sendTranscript(role: 'caller' | 'assistant', text: string): void;
  hangup(reason: string): Promise<void>;
}
