import { randomUUID } from 'crypto';
import { type AudioCodec, negotiateCodec } from '../audio/codec';
import { FrameChannel } from '../audio/frameChannel';
import type { RealtimeSession, RealtimeSessionEvent } from '../ai/realtimeSession';
import { type SessionConfiguration, aiFormatFor, buildSessionConfiguration } from '../ai/sessionConfig';
import { UnknownRequestIdError, errorMessage } from '../errors';
import { log } from '../log';
import { incAudioFramesDropped, incAudioFramesRelayed, incInterruptions, recordCallCompletion } from '../metrics';
import type { ToolDispatcher } from '../tools/dispatcher';
import type { ToolCallResult } from '../tools/types';
import type { TransportEvent, TransportSession } from '../transport/types';
import type { CallRecord, CallState, LifecycleEvent, TerminationReason } from './types';

export type SessionOpener = (callId: string, config: SessionConfiguration) => Promise<RealtimeSession>;

export interface VoiceBridgeOptions {
  transport: TransportSession;
  openSession: SessionOpener;
  dispatcher: ToolDispatcher;
  sessionOverrides?: Partial<Omit<SessionConfiguration, 'audioFormat'>>;
  correlationId?: string;
  onTerminated?: (record: CallRecord) => void;
}

type ControlEvent =
  | { source: 'ai'; event: Exclude<RealtimeSessionEvent, { type: 'audio' }> }
  | { source: 'transport'; event: Exclude<TransportEvent, { type: 'audio' }> }
  | { source: 'lifecycle'; event: LifecycleEvent }
  | { source: 'tool'; result: ToolCallResult };

function toolOutput(result: ToolCallResult): unknown {
  return result.ok ? result.payload : { error: result.error };
}

/**
 * Owns one call end to end: the transport, its companion AI session, the relay
 * loops between them, and the teardown order when either side goes away.
 */
export class VoiceBridge {
  public readonly callId: string;
  public readonly done: Promise<CallRecord>;

  private readonly transport: TransportSession;
  private readonly openSession: SessionOpener;
  private readonly dispatcher: ToolDispatcher;
  private readonly sessionOverrides: Partial<Omit<SessionConfiguration, 'audioFormat'>>;
  private readonly onTerminated?: (record: CallRecord) => void;
  private readonly record: CallRecord;
  private readonly control = new FrameChannel<ControlEvent>({ capacity: Infinity });
  private readonly truncatedItems = new Set<string>();
  private readonly logContext: Record<string, unknown>;
  private resolveDone: (record: CallRecord) => void = () => undefined;
  private session: RealtimeSession | null = null;
  private pendingSession: Promise<RealtimeSession> | null = null;
  private lastAiItem: { itemId: string; contentIndex: number } | null = null;
  private relayLoops: Promise<void>[] = [];
  private terminatePromise: Promise<CallRecord> | null = null;

  constructor(options: VoiceBridgeOptions) {
    this.transport = options.transport;
    this.callId = options.transport.id;
    this.openSession = options.openSession;
    this.dispatcher = options.dispatcher;
    this.sessionOverrides = options.sessionOverrides ?? {};
    this.onTerminated = options.onTerminated;
    this.record = {
      callId: this.callId,
      correlationId: options.correlationId ?? randomUUID(),
      state: 'Initiated',
      createdAt: new Date(),
      terminationReason: null,
    };
    this.logContext = { call_id: this.callId, correlation_id: this.record.correlationId };
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
    log.info({ event: 'call_initiated', transport: this.transport.kind, ...this.logContext }, 'call initiated');
  }

  public get state(): CallState {
    return this.record.state;
  }

  public snapshot(): CallRecord {
    return { ...this.record };
  }

  /**
   * Answers the transport, negotiates the codec and opens the AI session.
   * Setup failures terminate the call with `SetupFailed`; this never rejects.
   */
  public async start(): Promise<CallState> {
    if (this.record.state !== 'Initiated') {
      return this.record.state;
    }
    this.record.state = 'Connecting';
    this.transport.answer();

    try {
      const codec = negotiateCodec(this.transport.format, aiFormatFor(this.transport.format));
      const config = buildSessionConfiguration({ ...this.sessionOverrides, audioFormat: codec.aiFormat });
      this.pendingSession = this.openSession(this.callId, config);
      const session = await this.pendingSession;
      this.session = session;

      if (this.state !== 'Connecting') {
        await session.close();
        return this.record.state;
      }

      this.record.state = 'Active';
      log.info(
        { event: 'call_active', passthrough: codec.passthrough, ...this.logContext },
        'call active',
      );
      this.relayLoops = [
        this.guardLoop('caller_to_ai', this.runCallerToAi(session, codec)),
        this.guardLoop('ai_to_caller', this.runAiToCaller(session, codec)),
      ];
      this.runControl(session).catch((error: unknown) => {
        log.error({ err: error, event: 'control_loop_failed', ...this.logContext }, 'control loop failed');
        return this.terminate('SessionError', errorMessage(error));
      });
    } catch (error) {
      log.error({ err: error, event: 'call_setup_failed', ...this.logContext }, 'call setup failed');
      await this.terminate('SetupFailed', errorMessage(error));
    }
    return this.record.state;
  }

  /** Inbound contract for the webhook front door. */
  public handleLifecycleEvent(event: LifecycleEvent): void {
    if (this.terminatePromise) {
      return;
    }
    if (event.type === 'call_disconnected' && this.record.state !== 'Active') {
      this.terminate('RemoteHangup', event.cause).catch((error: unknown) => {
        log.error({ err: error, event: 'call_terminate_failed', ...this.logContext }, 'terminate failed');
      });
      return;
    }
    this.control.push({ source: 'lifecycle', event });
  }

  /** Idempotent; resolves with the final record once both sessions are closed. */
  public terminate(reason: TerminationReason, detail?: string): Promise<CallRecord> {
    if (!this.terminatePromise) {
      this.terminatePromise = this.drain(reason, detail);
    }
    return this.terminatePromise;
  }

  private async drain(reason: TerminationReason, detail?: string): Promise<CallRecord> {
    this.record.terminationReason = reason;
    this.record.terminationDetail = detail;
    // A failed setup goes straight from Connecting to Terminated.
    if (reason !== 'SetupFailed') {
      this.record.state = 'Draining';
      log.info({ event: 'call_draining', reason, detail, ...this.logContext }, 'call draining');
    }

    this.dispatcher.cancelAll(reason);
    this.control.close({ discard: true });

    let session = this.session;
    if (!session && this.pendingSession) {
      session = await this.pendingSession.catch(() => null);
    }

    await Promise.allSettled([session ? session.close() : Promise.resolve(), this.transport.hangup(reason)]);
    await Promise.allSettled(this.relayLoops);

    this.record.state = 'Terminated';
    const durationMs = Date.now() - this.record.createdAt.getTime();
    recordCallCompletion(reason, durationMs);
    log.info({ event: 'call_terminated', reason, duration_ms: durationMs, ...this.logContext }, 'call terminated');

    const final = this.snapshot();
    try {
      this.onTerminated?.(final);
    } catch (error) {
      log.warn({ err: error, event: 'call_terminated_hook_failed', ...this.logContext }, 'termination hook failed');
    }
    this.resolveDone(final);
    return final;
  }

  private async guardLoop(name: string, loop: Promise<void>): Promise<void> {
    try {
      await loop;
    } catch (error) {
      log.error({ err: error, event: 'relay_loop_failed', loop: name, ...this.logContext }, 'relay loop failed');
      this.terminate('SessionError', errorMessage(error)).catch((terminateError: unknown) => {
        log.error({ err: terminateError, event: 'call_terminate_failed', ...this.logContext }, 'terminate failed');
      });
    }
  }

  private async runCallerToAi(session: RealtimeSession, codec: AudioCodec): Promise<void> {
    for await (const event of this.transport.receiveEvents()) {
      if (event.type !== 'audio') {
        this.control.push({ source: 'transport', event });
        continue;
      }
      if (session.sendAudio(codec.toAi(event.frame))) {
        incAudioFramesRelayed('caller_to_ai');
      } else {
        incAudioFramesDropped('caller_to_ai', 'session_not_streaming');
      }
    }
  }

  private async runAiToCaller(session: RealtimeSession, codec: AudioCodec): Promise<void> {
    for await (const event of session.receiveEvents()) {
      if (event.type !== 'audio') {
        this.control.push({ source: 'ai', event });
        continue;
      }
      const { frame } = event;
      if (frame.itemId !== undefined) {
        if (this.truncatedItems.has(frame.itemId)) {
          incAudioFramesDropped('ai_to_caller', 'truncated');
          continue;
        }
        this.lastAiItem = { itemId: frame.itemId, contentIndex: frame.contentIndex ?? 0 };
      }
      if (this.transport.sendAudio(codec.toCaller(frame))) {
        incAudioFramesRelayed('ai_to_caller');
      } else {
        incAudioFramesDropped('ai_to_caller', 'transport_not_active');
      }
    }
  }

  private async runControl(session: RealtimeSession): Promise<void> {
    for await (const item of this.control) {
      if (this.record.state !== 'Active') {
        break;
      }
      switch (item.source) {
        case 'ai':
          await this.handleAiEvent(session, item.event);
          break;
        case 'transport':
          await this.handleTransportEvent(session, item.event);
          break;
        case 'lifecycle':
          if (item.event.type === 'call_disconnected') {
            await this.terminate('RemoteHangup', item.event.cause);
          } else {
            this.transport.answer();
            log.info({ event: 'call_connected', ...this.logContext }, 'call connected');
          }
          break;
        case 'tool':
          this.submitToolResult(session, item.result);
          break;
      }
    }
  }

  private async handleAiEvent(
    session: RealtimeSession,
    event: Exclude<RealtimeSessionEvent, { type: 'audio' }>,
  ): Promise<void> {
    switch (event.type) {
      case 'speech_started':
        this.bargeIn(session, 'ai_vad');
        return;
      case 'speech_stopped':
        return;
      case 'tool_call_requested':
        this.dispatcher
          .dispatch({
            callId: this.callId,
            requestId: event.requestId,
            name: event.name,
            arguments: event.arguments,
          })
          .then((result) => {
            this.control.push({ source: 'tool', result });
          }, (error: unknown) => {
            log.error({ err: error, event: 'tool_dispatch_failed', ...this.logContext }, 'tool dispatch failed');
          });
        return;
      case 'response_completed':
        log.debug(
          { event: 'ai_response_completed', response_id: event.responseId, status: event.status, ...this.logContext },
          'ai response completed',
        );
        return;
      case 'transcript':
        this.transport.sendTranscript(event.role, event.text);
        return;
      case 'session_error':
        await this.terminate('SessionError', event.message);
        return;
    }
  }

  private async handleTransportEvent(
    session: RealtimeSession,
    event: Exclude<TransportEvent, { type: 'audio' }>,
  ): Promise<void> {
    switch (event.type) {
      case 'speech_started':
        this.bargeIn(session, 'transport_vad');
        return;
      case 'dtmf':
        log.info({ event: 'call_dtmf', digit: event.digit, ...this.logContext }, 'dtmf received');
        return;
      case 'caller_hangup':
        await this.terminate('CallerHangup', event.reason);
        return;
      case 'transport_lost':
        await this.terminate('TransportLost', event.message);
        return;
    }
  }

  /** Discards queued assistant audio and trims the item to what the caller heard. */
  private bargeIn(session: RealtimeSession, trigger: string): void {
    if (!this.transport.isPlaying()) {
      return;
    }

    const position = this.transport.playoutPosition();
    const discarded = this.transport.clearAudio();
    const item = position ?? (this.lastAiItem ? { ...this.lastAiItem, sentMs: 0, startedAt: Date.now() } : null);
    incInterruptions();

    if (item) {
      const playedMs = Math.max(0, Math.min(item.sentMs, Date.now() - item.startedAt));
      this.truncatedItems.add(item.itemId);
      session.truncate({ itemId: item.itemId, contentIndex: item.contentIndex, playedMs });
    }
    if (this.lastAiItem && this.lastAiItem.itemId !== item?.itemId) {
      this.truncatedItems.add(this.lastAiItem.itemId);
    }

    log.info(
      { event: 'call_barge_in', trigger, discarded_frames: discarded, item_id: item?.itemId, ...this.logContext },
      'caller interrupted assistant',
    );
  }

  private submitToolResult(session: RealtimeSession, result: ToolCallResult): void {
    try {
      session.submitToolResult(result.requestId, toolOutput(result));
    } catch (error) {
      if (error instanceof UnknownRequestIdError) {
        log.warn(
          { event: 'tool_result_unmatched', request_id: result.requestId, ...this.logContext },
          'tool result has no outstanding request',
        );
        return;
      }
      throw error;
    }
  }
}
