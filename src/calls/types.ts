export type CallId = string;

export type CallState = 'Initiated' | 'Connecting' | 'Active' | 'Draining' | 'Terminated';

export type TerminationReason =
  | 'SetupFailed'
  | 'CallerHangup'
  | 'TransportLost'
  | 'SessionError'
  | 'RemoteHangup'
  | 'Shutdown';

/** Webhook events routed to a live bridge. */
export type LifecycleEvent =
  | { type: 'call_connected' }
  | { type: 'call_disconnected'; cause?: string };

export interface CallRecord {
  callId: CallId;
  /** Correlates asynchronous callbacks (webhooks, tool results) with this call. */
  correlationId: string;
  state: CallState;
  createdAt: Date;
  terminationReason: TerminationReason | null;
  terminationDetail?: string;
}
