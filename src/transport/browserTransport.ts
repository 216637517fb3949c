import { randomUUID } from 'crypto';
import { encodeOutbound } from '../audio/codec';
import { asRecord, rawToString } from '../ai/protocol';
import { log } from '../log';
import { PCM16_24K, type AudioFrame } from '../media/types';
import { BaseTransport } from './baseTransport';
import type { MediaSocket, TransportEvent } from './types';

export interface BrowserTransportOptions {
  socket: MediaSocket;
  id?: string;
  sendQueueFrames?: number;
  playoutLeadMs?: number;
}

const NORMAL_CLOSURE = 1000;
const GOING_AWAY = 1001;

function toBuffer(data: unknown): Buffer | undefined {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (Array.isArray(data) && data.every((part) => Buffer.isBuffer(part))) return Buffer.concat(data);
  return undefined;
}

/**
 * Browser test client: binary PCM16 24 kHz frames both ways, JSON text
 * messages for control (`speech_started`, `hangup`, `dtmf` in; `stop_audio`,
 * `transcript` out). The socket is live as soon as it is accepted.
 */
export class BrowserTransport extends BaseTransport {
  public readonly kind = 'browser' as const;

  constructor(options: BrowserTransportOptions) {
    super({
      id: options.id ?? `web-${randomUUID()}`,
      socket: options.socket,
      format: PCM16_24K,
      sendQueueFrames: options.sendQueueFrames,
      playoutLeadMs: options.playoutLeadMs,
    });
  }

  public sendTranscript(role: 'caller' | 'assistant', text: string): void {
    this.sendOnSocket(JSON.stringify({ type: 'transcript', role, text }));
  }

  protected handleSocketMessage(data: unknown, isBinary: boolean): void {
    if (isBinary) {
      const audio = toBuffer(data);
      if (audio) this.emitAudio(audio, 'binary');
      return;
    }

    const text = rawToString(data);
    const message = text === undefined ? undefined : asRecord(JSON.parse(text));
    if (!message) return;
    switch (message.type) {
      case 'speech_started':
        this.emitEvent({ type: 'speech_started' });
        return;
      case 'dtmf':
        if (typeof message.digit === 'string' && message.digit !== '') {
          this.emitEvent({ type: 'dtmf', digit: message.digit });
        }
        return;
      case 'hangup':
        this.endWith({ type: 'caller_hangup', reason: 'browser_hangup' });
        return;
      default:
        log.debug({ event: 'browser_message_ignored', ...this.logContext }, 'ignoring browser control message');
    }
  }

  protected writeAudio(frame: AudioFrame): void {
    this.sendOnSocket(encodeOutbound(frame, 'binary'));
  }

  protected flushFarEnd(): void {
    this.sendOnSocket(JSON.stringify({ type: 'stop_audio' }));
  }

  protected closeEvent(code: number): TransportEvent {
    if (code === NORMAL_CLOSURE || code === GOING_AWAY) {
      return { type: 'caller_hangup', reason: `browser_closed_${code}` };
    }
    return super.closeEvent(code);
  }
}
