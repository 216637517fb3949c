import { decodeInbound, frameDurationMs } from '../audio/codec';
import { FrameChannel } from '../audio/frameChannel';
import { env } from '../env';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incAudioFramesDropped } from '../metrics';
import type { AudioFormat, AudioFrame, WireFraming, WirePayload } from '../media/types';
import type {
  MediaSocket,
  PlayoutPosition,
  TransportEvent,
  TransportKind,
  TransportSession,
  TransportState,
} from './types';

export const SOCKET_OPEN = 1;

export interface BaseTransportOptions {
  id: string;
  socket: MediaSocket;
  format: AudioFormat;
  sendQueueFrames?: number;
  playoutLeadMs?: number;
}

/**
 * Shared state machine and paced playout for media sockets. Outbound frames
 * are written no more than `playoutLeadMs` ahead of real time, so most of a
 * response stays in our queue where barge-in can still discard it.
 */
export abstract class BaseTransport implements TransportSession {
  public readonly id: string;
  public readonly format: AudioFormat;
  public abstract readonly kind: TransportKind;

  protected readonly socket: MediaSocket;
  protected readonly logContext: Record<string, unknown>;

  private readonly events = new FrameChannel<TransportEvent>({ capacity: Infinity });
  private readonly outbound: FrameChannel<AudioFrame>;
  private readonly playoutLeadMs: number;
  private currentState: TransportState = 'Ringing';
  private inboundSequence = 0;
  private playoutClockMs = 0;
  private epoch = 0;
  private inHand = false;
  private wake: (() => void) | null = null;
  private position: PlayoutPosition | null = null;
  private hangupPromise: Promise<void> | null = null;
  private endedByCaller = false;

  protected constructor(options: BaseTransportOptions) {
    this.id = options.id;
    this.format = { ...options.format };
    this.socket = options.socket;
    this.playoutLeadMs = options.playoutLeadMs ?? env.PLAYOUT_LEAD_MS;
    this.logContext = { call_id: options.id };
    this.outbound = new FrameChannel<AudioFrame>({
      capacity: options.sendQueueFrames ?? env.TRANSPORT_SEND_QUEUE_FRAMES,
      onOverflow: (_dropped, depth) => {
        incAudioFramesDropped('ai_to_caller', 'transport_queue_full');
        log.warn({ event: 'transport_send_queue_overflow', depth, ...this.logContext }, 'dropped oldest ai frame');
      },
    });

    this.socket.on('message', (data: unknown, isBinary: unknown) => {
      if (this.currentState === 'Ended') return;
      try {
        this.handleSocketMessage(data, isBinary === true);
      } catch (error) {
        log.warn({ err: error, event: 'transport_message_invalid', ...this.logContext }, 'bad media message');
      }
    });
    this.socket.on('close', (code: unknown) => {
      this.handleSocketClose(typeof code === 'number' ? code : 1006);
    });
    this.socket.on('error', (error: unknown) => {
      log.error({ err: error, event: 'transport_socket_error', ...this.logContext }, 'media socket error');
      this.endWith({ type: 'transport_lost', message: `media socket error: ${errorMessage(error)}` });
    });
  }

  public get state(): TransportState {
    return this.currentState;
  }

  public answer(): void {
    if (this.currentState !== 'Ringing') {
      return;
    }
    this.currentState = 'Active';
    this.runPlayout().catch((error: unknown) => {
      log.error({ err: error, event: 'transport_playout_failed', ...this.logContext }, 'playout loop failed');
      this.endWith({ type: 'transport_lost', message: `playout failed: ${errorMessage(error)}` });
    });
    log.info({ event: 'transport_active', kind: this.kind, ...this.logContext }, 'transport active');
  }

  public sendAudio(frame: AudioFrame): boolean {
    if (this.currentState !== 'Active') {
      return false;
    }
    return this.outbound.push(frame);
  }

  public clearAudio(): number {
    if (this.currentState !== 'Active') {
      return 0;
    }
    const discarded = this.outbound.clear() + (this.inHand ? 1 : 0);
    this.epoch += 1;
    this.inHand = false;
    this.playoutClockMs = 0;
    this.position = null;
    this.wake?.();
    this.flushFarEnd();
    log.debug({ event: 'transport_audio_cleared', discarded, ...this.logContext }, 'outbound audio cleared');
    return discarded;
  }

  public queuedAudioFrames(): number {
    return this.outbound.size + (this.inHand ? 1 : 0);
  }

  public isPlaying(): boolean {
    return this.queuedAudioFrames() > 0 || this.playoutClockMs > Date.now();
  }

  public playoutPosition(): PlayoutPosition | null {
    return this.position ? { ...this.position } : null;
  }

  public receiveEvents(): AsyncIterable<TransportEvent> {
    return this.events;
  }

  public abstract sendTranscript(role: 'caller' | 'assistant', text: string): void;

  /** Idempotent. Never rejects; far-end failures are logged. */
  public hangup(reason: string): Promise<void> {
    if (!this.hangupPromise) {
      this.hangupPromise = this.performHangup(reason);
    }
    return this.hangupPromise;
  }

  protected abstract handleSocketMessage(data: unknown, isBinary: boolean): void;

  protected abstract writeAudio(frame: AudioFrame): void;

  /** Tells the far end to drop whatever it has buffered for playout. */
  protected abstract flushFarEnd(): void;

  /** Telephony-side teardown beyond closing the socket. */
  protected async releaseRemote(_reason: string, _endedByCaller: boolean): Promise<void> {
    return undefined;
  }

  /** Event surfaced when the socket closes while the call is live. */
  protected closeEvent(code: number): TransportEvent {
    return { type: 'transport_lost', message: `media socket closed (code ${code})` };
  }

  protected emitAudio(wire: WirePayload, framing: WireFraming): void {
    if (this.currentState === 'Ended' || wire.length === 0) {
      return;
    }
    const frame = decodeInbound(wire, {
      source: 'caller',
      sequence: this.inboundSequence,
      format: this.format,
      framing,
    });
    if (frame.payload.length === 0) {
      return;
    }
    this.inboundSequence += 1;
    this.events.push({ type: 'audio', frame });
  }

  protected emitEvent(event: TransportEvent): void {
    if (this.currentState !== 'Ended') {
      this.events.push(event);
    }
  }

  /** Moves to Ended on a far-end signal and surfaces it as the last event. */
  protected endWith(event: TransportEvent): void {
    if (this.currentState === 'Ended') {
      return;
    }
    this.endedByCaller = event.type === 'caller_hangup';
    this.currentState = 'Ended';
    this.stopPlayout();
    this.events.push(event);
    this.events.close();
    log.info({ event: 'transport_ended', cause: event.type, ...this.logContext }, 'transport ended by far end');
  }

  protected sendOnSocket(data: string | Buffer): void {
    if (this.socket.readyState !== SOCKET_OPEN) {
      return;
    }
    this.socket.send(data, (error) => {
      if (error) {
        log.warn({ err: error, event: 'transport_send_failed', ...this.logContext }, 'media socket send failed');
      }
    });
  }

  private handleSocketClose(code: number): void {
    if (this.currentState === 'Ended') {
      this.events.close();
      return;
    }
    this.endWith(this.closeEvent(code));
  }

  private stopPlayout(): void {
    this.outbound.close({ discard: true });
    this.inHand = false;
    this.wake?.();
  }

  private async performHangup(reason: string): Promise<void> {
    const endedByCaller = this.endedByCaller;
    this.currentState = 'Ended';
    this.stopPlayout();
    this.events.close();

    if (this.socket.readyState === SOCKET_OPEN) {
      try {
        this.socket.close(1000, reason.slice(0, 120));
      } catch (error) {
        log.warn({ err: error, event: 'transport_close_failed', ...this.logContext }, 'media socket close failed');
      }
    }

    try {
      await this.releaseRemote(reason, endedByCaller);
    } catch (error) {
      log.error({ err: error, event: 'transport_release_failed', reason, ...this.logContext }, 'remote hangup failed');
    }
    log.info({ event: 'transport_hangup', reason, ...this.logContext }, 'transport hung up');
  }

  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private async runPlayout(): Promise<void> {
    for await (const frame of this.outbound) {
      this.inHand = true;
      const epoch = this.epoch;
      const aheadMs = this.playoutClockMs - Date.now();
      if (aheadMs > this.playoutLeadMs) {
        await this.pause(aheadMs - this.playoutLeadMs);
      }
      if (this.currentState !== 'Active') {
        break;
      }
      if (epoch !== this.epoch) {
        continue;
      }
      this.inHand = false;

      const durationMs = frameDurationMs(frame.format, frame.payload.length);
      const startAt = Math.max(this.playoutClockMs, Date.now());
      this.playoutClockMs = startAt + durationMs;
      this.trackPosition(frame, durationMs, startAt);
      this.writeAudio(frame);
    }
  }

  private trackPosition(frame: AudioFrame, durationMs: number, startAt: number): void {
    if (frame.itemId === undefined) {
      return;
    }
    const contentIndex = frame.contentIndex ?? 0;
    if (this.position && this.position.itemId === frame.itemId && this.position.contentIndex === contentIndex) {
      this.position.sentMs += durationMs;
      return;
    }
    this.position = { itemId: frame.itemId, contentIndex, sentMs: durationMs, startedAt: startAt };
  }
}
