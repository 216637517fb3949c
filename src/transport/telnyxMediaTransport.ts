import { encodeOutbound } from '../audio/codec';
import { asRecord, rawToString } from '../ai/protocol';
import { log } from '../log';
import { PCMU_8K, type AudioFrame } from '../media/types';
import type { CallControl } from '../telnyx/telnyxClient';
import { BaseTransport } from './baseTransport';
import type { MediaSocket } from './types';

export interface TelnyxMediaTransportOptions {
  callControlId: string;
  socket: MediaSocket;
  callControl: CallControl;
  sendQueueFrames?: number;
  playoutLeadMs?: number;
}

function getString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Telnyx bidirectional media stream: JSON envelopes carrying base64 PCMU at
 * 8 kHz. The socket is opened by Telnyx after `streaming_start`.
 */
export class TelnyxMediaTransport extends BaseTransport {
  public readonly kind = 'telnyx' as const;
  private readonly callControl: CallControl;
  private streamId: string | undefined;

  constructor(options: TelnyxMediaTransportOptions) {
    super({
      id: options.callControlId,
      socket: options.socket,
      format: PCMU_8K,
      sendQueueFrames: options.sendQueueFrames,
      playoutLeadMs: options.playoutLeadMs,
    });
    this.callControl = options.callControl;
  }

  public sendTranscript(role: 'caller' | 'assistant', text: string): void {
    log.debug({ event: 'transcript', role, chars: text.length, ...this.logContext }, 'transcript');
  }

  protected handleSocketMessage(data: unknown): void {
    const text = rawToString(data);
    const message = text === undefined ? undefined : asRecord(JSON.parse(text));
    const kind = getString(message?.event);
    if (!message || !kind) {
      return;
    }

    switch (kind) {
      case 'connected':
        return;
      case 'start': {
        const start = asRecord(message.start);
        this.streamId = getString(message.stream_id) ?? getString(start?.stream_id);
        const mediaFormat = asRecord(start?.media_format);
        log.info(
          {
            event: 'telnyx_stream_started',
            stream_id: this.streamId,
            encoding: getString(mediaFormat?.encoding),
            sample_rate: mediaFormat?.sample_rate,
            ...this.logContext,
          },
          'telnyx media stream started',
        );
        return;
      }
      case 'media': {
        const media = asRecord(message.media);
        const track = getString(media?.track);
        if (track && track !== 'inbound') {
          return;
        }
        const payload = getString(media?.payload);
        if (!payload) return;
        this.emitAudio(payload, 'base64');
        return;
      }
      case 'dtmf': {
        const digit = getString(asRecord(message.dtmf)?.digit);
        if (digit) this.emitEvent({ type: 'dtmf', digit });
        return;
      }
      case 'stop':
        this.endWith({ type: 'caller_hangup', reason: 'media_stream_stopped' });
        return;
      case 'error':
        log.warn({ event: 'telnyx_stream_error', payload: message.payload, ...this.logContext }, 'telnyx stream error');
        return;
      default:
        return;
    }
  }

  protected writeAudio(frame: AudioFrame): void {
    this.sendOnSocket(JSON.stringify({ event: 'media', media: { payload: encodeOutbound(frame, 'base64') } }));
  }

  protected flushFarEnd(): void {
    this.sendOnSocket(JSON.stringify({ event: 'clear' }));
  }

  protected async releaseRemote(reason: string, endedByCaller: boolean): Promise<void> {
    if (endedByCaller) {
      return;
    }
    log.info({ event: 'telnyx_hangup_requested', reason, ...this.logContext }, 'telnyx hangup requested');
    await this.callControl.hangupCall(this.id);
  }
}
