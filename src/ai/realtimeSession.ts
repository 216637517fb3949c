import { randomUUID } from 'crypto';
import WebSocket from 'ws';
import { FrameChannel } from '../audio/frameChannel';
import { env } from '../env';
import { SessionSetupError, UnknownRequestIdError, errorMessage } from '../errors';
import { log } from '../log';
import { incAudioFramesDropped } from '../metrics';
import type { AudioFrame } from '../media/types';
import {
  functionCallOutput,
  inputAudioAppend,
  itemTruncate,
  parseServerMessage,
  responseCancel,
  responseCreate,
  sessionUpdate,
} from './protocol';
import type { SessionConfiguration } from './sessionConfig';

export type RealtimeSessionState = 'Connecting' | 'Configured' | 'Streaming' | 'Closing' | 'Closed' | 'Failed';

/** The subset of a `ws` client the session relies on. */
export interface RealtimeSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'open' | 'message' | 'close' | 'error' | 'unexpected-response', listener: (...args: unknown[]) => void): unknown;
}

export type RealtimeSocketFactory = (url: string, headers: Record<string, string>) => RealtimeSocket;

export type RealtimeSessionEvent =
  | { type: 'audio'; frame: AudioFrame }
  | { type: 'speech_started'; audioStartMs?: number }
  | { type: 'speech_stopped' }
  | { type: 'tool_call_requested'; requestId: string; name: string; arguments: Record<string, unknown> }
  | { type: 'response_completed'; responseId?: string; status?: string }
  | { type: 'transcript'; role: 'caller' | 'assistant'; text: string }
  | { type: 'session_error'; message: string };

export interface TruncationNotice {
  itemId: string;
  contentIndex: number;
  playedMs: number;
}

export interface RealtimeSessionOptions {
  callId: string;
  config: SessionConfiguration;
  url?: string;
  apiKey?: string;
  authMode?: 'api-key' | 'bearer';
  setupTimeoutMs?: number;
  sendQueueFrames?: number;
  closeGraceMs?: number;
  socketFactory?: RealtimeSocketFactory;
}

const OPEN = 1;

const defaultSocketFactory: RealtimeSocketFactory = (url, headers) => new WebSocket(url, { headers });

export function buildRealtimeUrl(baseUrl: string, model: string): string {
  const url = new URL(baseUrl);
  if (url.protocol === 'https:') url.protocol = 'wss:';
  if (url.protocol === 'http:') url.protocol = 'ws:';
  if (!url.searchParams.has('model')) {
    url.searchParams.set('model', model);
  }
  return url.toString();
}

export function buildAuthHeaders(authMode: 'api-key' | 'bearer', apiKey: string): Record<string, string> {
  return authMode === 'bearer' ? { Authorization: `Bearer ${apiKey}` } : { 'api-key': apiKey };
}

function statusOf(response: unknown): number | undefined {
  if (typeof response === 'object' && response !== null && 'statusCode' in response) {
    const status = response.statusCode;
    return typeof status === 'number' ? status : undefined;
  }
  return undefined;
}

/**
 * One realtime speech-to-speech conversation. Caller audio is queued and sent
 * in order by a single sender loop; server events are surfaced through
 * `receiveEvents()`, which ends when the session closes or fails.
 */
export class RealtimeSession {
  public readonly callId: string;
  public readonly config: SessionConfiguration;

  private readonly socket: RealtimeSocket;
  private readonly setupTimeoutMs: number;
  private readonly closeGraceMs: number;
  private readonly outbound: FrameChannel<string>;
  private readonly events = new FrameChannel<RealtimeSessionEvent>({ capacity: Infinity });
  private readonly observedRequests = new Set<string>();
  private readonly ownEventIds = new Set<string>();
  private readonly socketClosed: Promise<void>;
  private resolveSocketClosed: () => void = () => undefined;
  private currentState: RealtimeSessionState = 'Connecting';
  private outboundSequence = 0;
  private senderLoop: Promise<void> | null = null;
  private closePromise: Promise<void> | null = null;

  private constructor(options: RealtimeSessionOptions) {
    this.callId = options.callId;
    this.config = options.config;
    this.setupTimeoutMs = options.setupTimeoutMs ?? env.REALTIME_SETUP_TIMEOUT_MS;
    this.closeGraceMs = options.closeGraceMs ?? env.SESSION_CLOSE_GRACE_MS;
    this.outbound = new FrameChannel<string>({
      capacity: options.sendQueueFrames ?? env.AI_SEND_QUEUE_FRAMES,
      onOverflow: (_dropped, depth) => {
        incAudioFramesDropped('caller_to_ai', 'ai_queue_full');
        log.warn({ event: 'ai_send_queue_overflow', call_id: this.callId, depth }, 'dropped oldest caller frame');
      },
    });
    this.socketClosed = new Promise((resolve) => {
      this.resolveSocketClosed = resolve;
    });

    const url = buildRealtimeUrl(options.url ?? env.REALTIME_URL, this.config.model);
    const headers = buildAuthHeaders(
      options.authMode ?? env.REALTIME_AUTH_MODE,
      options.apiKey ?? env.REALTIME_API_KEY,
    );
    this.socket = (options.socketFactory ?? defaultSocketFactory)(url, headers);
  }

  /** Opens and configures a session. Rejects with SessionSetupError on handshake, auth or timeout failure. */
  public static async open(options: RealtimeSessionOptions): Promise<RealtimeSession> {
    const session = new RealtimeSession(options);
    await session.handshake();
    return session;
  }

  public get state(): RealtimeSessionState {
    return this.currentState;
  }

  public get pendingToolRequests(): number {
    return this.observedRequests.size;
  }

  public get queuedAudioFrames(): number {
    return this.outbound.size;
  }

  public receiveEvents(): AsyncIterable<RealtimeSessionEvent> {
    return this.events;
  }

  /** Queues one caller frame. Returns false when the session no longer accepts audio. */
  public sendAudio(frame: AudioFrame): boolean {
    if (this.currentState !== 'Configured' && this.currentState !== 'Streaming') {
      return false;
    }
    this.currentState = 'Streaming';
    return this.outbound.push(JSON.stringify(inputAudioAppend(frame.payload.toString('base64'))));
  }

  public submitToolResult(requestId: string, output: unknown): void {
    if (!this.observedRequests.delete(requestId)) {
      throw new UnknownRequestIdError(requestId);
    }
    if (!this.isWritable()) {
      log.warn({ event: 'tool_result_dropped', call_id: this.callId, request_id: requestId }, 'session not writable');
      return;
    }
    const serialized = typeof output === 'string' ? output : JSON.stringify(output);
    this.sendControl(functionCallOutput(requestId, serialized));
    if (this.observedRequests.size === 0) {
      this.sendControl(responseCreate());
    }
  }

  /** Cancels the in-flight response and trims the item to what the caller actually heard. */
  public truncate(notice: TruncationNotice): void {
    if (!this.isWritable()) {
      return;
    }
    const cancelId = `evt_${randomUUID()}`;
    const truncateId = `evt_${randomUUID()}`;
    this.ownEventIds.add(cancelId);
    this.ownEventIds.add(truncateId);
    this.sendControl(responseCancel(cancelId));
    this.sendControl(itemTruncate(truncateId, notice.itemId, notice.contentIndex, notice.playedMs));
    log.info(
      {
        event: 'ai_response_truncated',
        call_id: this.callId,
        item_id: notice.itemId,
        played_ms: Math.floor(notice.playedMs),
      },
      'assistant response truncated',
    );
  }

  /** Idempotent. Resolves once the socket is closed or terminated after the grace period. */
  public close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }
    this.closePromise = this.shutdown();
    return this.closePromise;
  }

  private async shutdown(): Promise<void> {
    const alreadyDone = this.currentState === 'Closed' || this.currentState === 'Failed';
    if (!alreadyDone) {
      this.currentState = 'Closing';
    }
    this.outbound.close({ discard: true });
    this.observedRequests.clear();

    if (this.socket.readyState === OPEN || this.socket.readyState === 0) {
      try {
        this.socket.close(1000, 'bridge closing');
      } catch (error) {
        log.warn({ err: error, event: 'ai_socket_close_failed', call_id: this.callId }, 'socket close failed');
      }
      let graceTimer: NodeJS.Timeout | undefined;
      const graceElapsed = new Promise<'timeout'>((resolve) => {
        graceTimer = setTimeout(() => resolve('timeout'), this.closeGraceMs);
      });
      const outcome = await Promise.race([this.socketClosed.then(() => 'closed' as const), graceElapsed]);
      clearTimeout(graceTimer);
      if (outcome === 'timeout') {
        log.warn({ event: 'ai_socket_terminated', call_id: this.callId }, 'socket did not close in time');
        this.socket.terminate();
      }
    }

    await this.senderLoop;
    if (this.currentState !== 'Failed') {
      this.currentState = 'Closed';
    }
    this.events.close();
  }

  private handshake(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const fail = (error: SessionSetupError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.currentState = 'Failed';
        this.outbound.close({ discard: true });
        this.events.close();
        try {
          this.socket.terminate();
        } catch (terminateError) {
          log.debug({ err: terminateError, call_id: this.callId }, 'terminate after setup failure');
        }
        log.error({ err: error, event: 'ai_session_setup_failed', call_id: this.callId }, 'realtime setup failed');
        reject(error);
      };

      const timer = setTimeout(() => {
        fail(new SessionSetupError(`realtime session not ready within ${this.setupTimeoutMs} ms`));
      }, this.setupTimeoutMs);

      this.socket.on('unexpected-response', (_request: unknown, response: unknown) => {
        const status = statusOf(response);
        fail(new SessionSetupError(`realtime handshake rejected with status ${status ?? 'unknown'}`, { status }));
      });

      this.socket.on('open', () => {
        if (settled) return;
        try {
          this.sendControl(sessionUpdate(this.config));
          if (this.config.greetFirst) {
            this.sendControl(responseCreate());
          }
        } catch (error) {
          fail(new SessionSetupError(`could not configure realtime session: ${errorMessage(error)}`, { cause: error }));
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.currentState = 'Configured';
        this.senderLoop = this.runSender();
        log.info({ event: 'ai_session_configured', call_id: this.callId, model: this.config.model }, 'realtime session configured');
        resolve();
      });

      this.socket.on('message', (data: unknown) => {
        this.handleMessage(data);
      });

      this.socket.on('error', (error: unknown) => {
        if (!settled) {
          fail(new SessionSetupError(`realtime connection failed: ${errorMessage(error)}`, { cause: error }));
          return;
        }
        this.failSession(`realtime socket error: ${errorMessage(error)}`);
      });

      this.socket.on('close', (code: unknown) => {
        this.resolveSocketClosed();
        if (!settled) {
          fail(new SessionSetupError(`realtime socket closed during setup (code ${String(code)})`));
          return;
        }
        if (this.currentState === 'Configured' || this.currentState === 'Streaming') {
          this.failSession(`realtime socket closed unexpectedly (code ${String(code)})`);
        }
      });
    });
  }

  private async runSender(): Promise<void> {
    for await (const message of this.outbound) {
      if (!this.isWritable()) {
        break;
      }
      try {
        await new Promise<void>((resolve, reject) => {
          this.socket.send(message, (error) => (error ? reject(error) : resolve()));
        });
      } catch (error) {
        this.failSession(`realtime send failed: ${errorMessage(error)}`);
        break;
      }
    }
  }

  private handleMessage(data: unknown): void {
    const message = parseServerMessage(data);
    if (!message) {
      log.debug({ event: 'ai_message_unparsed', call_id: this.callId }, 'ignoring non-json realtime message');
      return;
    }

    switch (message.kind) {
      case 'audio_delta': {
        const payload = Buffer.from(message.delta, 'base64');
        if (payload.length === 0) return;
        if (this.currentState === 'Configured') {
          this.currentState = 'Streaming';
        }
        this.events.push({
          type: 'audio',
          frame: {
            source: 'ai',
            sequence: this.outboundSequence++,
            format: this.config.audioFormat,
            payload,
            itemId: message.itemId,
            contentIndex: message.contentIndex,
          },
        });
        return;
      }
      case 'speech_started':
        this.events.push({ type: 'speech_started', audioStartMs: message.audioStartMs });
        return;
      case 'speech_stopped':
        this.events.push({ type: 'speech_stopped' });
        return;
      case 'function_call':
        this.observedRequests.add(message.callId);
        this.events.push({
          type: 'tool_call_requested',
          requestId: message.callId,
          name: message.name,
          arguments: message.arguments,
        });
        return;
      case 'response_done':
        this.events.push({ type: 'response_completed', responseId: message.responseId, status: message.status });
        return;
      case 'transcript':
        if (message.text !== '') {
          this.events.push({ type: 'transcript', role: message.role, text: message.text });
        }
        return;
      case 'transcription_failed':
        log.warn({ event: 'ai_transcription_failed', call_id: this.callId, reason: message.message }, 'transcription failed');
        return;
      case 'error':
        if (message.eventId && this.ownEventIds.has(message.eventId)) {
          log.debug(
            { event: 'ai_control_rejected', call_id: this.callId, code: message.code, reason: message.message },
            'realtime endpoint rejected a control message',
          );
          return;
        }
        log.warn(
          { event: 'ai_server_error', call_id: this.callId, code: message.code, reason: message.message },
          'realtime endpoint reported an error',
        );
        return;
      case 'session_created':
      case 'session_updated':
        log.debug({ event: `ai_${message.kind}`, call_id: this.callId }, 'realtime session event');
        return;
      default:
        return;
    }
  }

  private failSession(reason: string): void {
    if (this.currentState === 'Failed' || this.currentState === 'Closed' || this.currentState === 'Closing') {
      return;
    }
    this.currentState = 'Failed';
    log.error({ event: 'ai_session_failed', call_id: this.callId, reason }, 'realtime session failed');
    this.outbound.close({ discard: true });
    this.events.push({ type: 'session_error', message: reason });
    this.events.close();
  }

  private isWritable(): boolean {
    return (
      (this.currentState === 'Configured' || this.currentState === 'Streaming') && this.socket.readyState === OPEN
    );
  }

  private sendControl(message: Record<string, unknown>): void {
    this.socket.send(JSON.stringify(message), (error) => {
      if (error) {
        this.failSession(`realtime send failed: ${errorMessage(error)}`);
      }
    });
  }
}
