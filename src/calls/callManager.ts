import { RealtimeSession } from '../ai/realtimeSession';
import { env } from '../env';
import { DuplicateCallError } from '../errors';
import { type CapacityResult, release, tryAcquire } from '../limits/capacity';
import { log } from '../log';
import type { CallControl } from '../telnyx/telnyxClient';
import { ToolDispatcher } from '../tools/dispatcher';
import { type ToolRegistry, createToolRegistry } from '../tools/handlers';
import type { ToolCollaborators } from '../tools/types';
import { BrowserTransport } from '../transport/browserTransport';
import { TelnyxMediaTransport } from '../transport/telnyxMediaTransport';
import type { MediaSocket, TransportSession } from '../transport/types';
import { CallRegistry } from './callRegistry';
import type { CallId, LifecycleEvent } from './types';
import { type SessionOpener, VoiceBridge } from './voiceBridge';

export interface CapacityGate {
  tryAcquire(callId: CallId): Promise<CapacityResult>;
  release(callId: CallId): Promise<void>;
}

export interface CallManagerOptions {
  callControl: CallControl;
  collaborators: ToolCollaborators;
  registry?: CallRegistry;
  openSession?: SessionOpener;
  tools?: ToolRegistry;
  capacity?: CapacityGate;
  publicBaseUrl?: string;
  mediaStreamToken?: string;
}

export const TELNYX_MEDIA_PATH_PREFIX = '/v1/telnyx/media/';

const defaultOpener: SessionOpener = (callId, config) => RealtimeSession.open({ callId, config });

const redisCapacity: CapacityGate = {
  tryAcquire: (callId) => tryAcquire({ callId }),
  release: (callId) => release({ callId }),
};

export function buildMediaStreamUrl(publicBaseUrl: string, callControlId: string, token: string): string {
  const trimmedBase = publicBaseUrl.replace(/\/$/, '');
  let wsBase = trimmedBase;
  if (trimmedBase.startsWith('https://')) {
    wsBase = `wss://${trimmedBase.slice('https://'.length)}`;
  } else if (trimmedBase.startsWith('http://')) {
    wsBase = `ws://${trimmedBase.slice('http://'.length)}`;
  } else if (!trimmedBase.startsWith('ws://') && !trimmedBase.startsWith('wss://')) {
    wsBase = `wss://${trimmedBase}`;
  }
  return `${wsBase}${TELNYX_MEDIA_PATH_PREFIX}${encodeURIComponent(callControlId)}?token=${encodeURIComponent(token)}`;
}

/**
 * Glue between the front doors (webhooks, media sockets) and the bridges.
 * Webhook work for one call id is serialized through the registry.
 */
export class CallManager {
  public readonly registry: CallRegistry;

  private readonly callControl: CallControl;
  private readonly collaborators: ToolCollaborators;
  private readonly openSession: SessionOpener;
  private readonly tools: ToolRegistry;
  private readonly capacity: CapacityGate;
  private readonly publicBaseUrl: string;
  private readonly mediaStreamToken: string;
  /** Telnyx calls holding capacity whose media socket has not connected yet. */
  private readonly admitted = new Set<CallId>();

  constructor(options: CallManagerOptions) {
    this.callControl = options.callControl;
    this.collaborators = options.collaborators;
    this.registry = options.registry ?? new CallRegistry();
    this.openSession = options.openSession ?? defaultOpener;
    this.tools = options.tools ?? createToolRegistry();
    this.capacity = options.capacity ?? redisCapacity;
    this.publicBaseUrl = options.publicBaseUrl ?? env.PUBLIC_BASE_URL;
    this.mediaStreamToken = options.mediaStreamToken ?? env.MEDIA_STREAM_TOKEN;
  }

  public isAdmitted(callId: CallId): boolean {
    return this.admitted.has(callId);
  }

  /** `call.initiated`: reserve capacity, answer, and ask Telnyx to open the media stream. */
  public handleIncomingCall(callControlId: CallId): Promise<void> {
    return this.registry.withKey(callControlId, async () => {
      if (this.admitted.has(callControlId) || this.registry.lookup(callControlId)) {
        log.info({ event: 'incoming_call_duplicate', call_id: callControlId }, 'incoming call already handled');
        return;
      }

      let capacity: CapacityResult;
      try {
        capacity = await this.capacity.tryAcquire(callControlId);
      } catch (error) {
        log.error({ err: error, event: 'capacity_check_failed', call_id: callControlId }, 'capacity check failed');
        capacity = { ok: false, reason: 'capacity_unavailable' };
      }

      if (!capacity.ok) {
        log.warn({ event: 'incoming_call_rejected', reason: capacity.reason, call_id: callControlId }, 'call rejected');
        await this.callControl.hangupCall(callControlId);
        return;
      }

      this.admitted.add(callControlId);
      try {
        await this.callControl.answerCall(callControlId);
        await this.callControl.startStreaming(
          callControlId,
          buildMediaStreamUrl(this.publicBaseUrl, callControlId, this.mediaStreamToken),
        );
      } catch (error) {
        this.admitted.delete(callControlId);
        await this.capacity.release(callControlId);
        throw error;
      }
    });
  }

  /** `call.answered` / `call.hangup` for a call the webhook already knows about. */
  public handleLifecycle(callId: CallId, event: LifecycleEvent): Promise<void> {
    return this.registry.withKey(callId, async () => {
      const bridge = this.registry.lookup(callId);
      if (bridge) {
        bridge.handleLifecycleEvent(event);
        return;
      }
      if (event.type === 'call_disconnected' && this.admitted.delete(callId)) {
        log.info({ event: 'call_ended_before_media', call_id: callId }, 'call ended before media connected');
        await this.capacity.release(callId);
      }
    });
  }

  /** A Telnyx media socket connected for an admitted call. Returns null when it is refused. */
  public attachTelnyxMedia(callControlId: CallId, socket: MediaSocket): VoiceBridge | null {
    if (!this.admitted.has(callControlId)) {
      log.warn({ event: 'media_refused_unknown_call', call_id: callControlId }, 'media socket for unknown call');
      return null;
    }
    const transport = new TelnyxMediaTransport({ callControlId, socket, callControl: this.callControl });
    const bridge = this.launch(transport, () => this.capacity.release(callControlId));
    if (bridge) {
      this.admitted.delete(callControlId);
    }
    return bridge;
  }

  public attachBrowser(socket: MediaSocket): VoiceBridge | null {
    return this.launch(new BrowserTransport({ socket }));
  }

  public async shutdown(): Promise<void> {
    await this.registry.closeAll('Shutdown');
    const pending = Array.from(this.admitted);
    this.admitted.clear();
    await Promise.all(pending.map((callId) => this.capacity.release(callId)));
  }

  private launch(transport: TransportSession, onReleased?: () => Promise<void>): VoiceBridge | null {
    const dispatcher = new ToolDispatcher({
      callId: transport.id,
      registry: this.tools,
      collaborators: this.collaborators,
      timeoutMs: env.TOOL_TIMEOUT_MS,
      maxConcurrent: env.TOOL_MAX_CONCURRENT,
    });

    const bridge = new VoiceBridge({
      transport,
      openSession: this.openSession,
      dispatcher,
      onTerminated: (record) => {
        this.registry.deregister(record.callId, bridge);
        if (onReleased) {
          onReleased().catch((error: unknown) => {
            log.error({ err: error, event: 'call_release_failed', call_id: record.callId }, 'release failed');
          });
        }
      },
    });

    try {
      this.registry.register(bridge);
    } catch (error) {
      if (error instanceof DuplicateCallError) {
        log.warn({ event: 'media_refused_duplicate', call_id: transport.id }, 'call already has a live bridge');
        return null;
      }
      throw error;
    }

    bridge.start().catch((error: unknown) => {
      log.error({ err: error, event: 'call_start_failed', call_id: transport.id }, 'call start failed');
    });
    return bridge;
  }
}
