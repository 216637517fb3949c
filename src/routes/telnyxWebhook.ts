import { Request, Router } from 'express';
import type { CallManager } from '../calls/callManager';
import type { LifecycleEvent } from '../calls/types';
import { log } from '../log';
import { extractTelnyxEventMeta, extractTelnyxEventMetaFromRawBody, verifyTelnyxSignature } from '../telnyx/telnyxVerify';

export type RequestWithRawBody = Request & { rawBody?: Buffer; id?: string };

function determineAction(eventType?: string, callControlId?: string): string {
  if (!eventType) {
    return 'ignored_unknown_event';
  }
  if (!callControlId) {
    return 'ignored_missing_call_control_id';
  }
  switch (eventType) {
    case 'call.initiated':
      return 'incoming_call';
    case 'call.answered':
      return 'call_connected';
    case 'call.hangup':
      return 'call_disconnected';
    default:
      return 'ignored_unhandled_event';
  }
}

function toLifecycleEvent(eventType: string, hangupCause?: string): LifecycleEvent | null {
  switch (eventType) {
    case 'call.answered':
      return { type: 'call_connected' };
    case 'call.hangup':
      return { type: 'call_disconnected', cause: hangupCause };
    default:
      return null;
  }
}

export type WebhookCalls = Pick<CallManager, 'handleIncomingCall' | 'handleLifecycle'>;

export interface TelnyxWebhookInput {
  requestId?: string;
  rawBody: Buffer;
  body: unknown;
  header: (name: string) => string | undefined;
}

export interface TelnyxWebhookResponse {
  status: number;
  body: Record<string, unknown>;
  /** Settles once the call manager has handled the event. */
  work: Promise<void>;
}

/**
 * Telnyx call-control webhooks. Acknowledges immediately and hands the work
 * to the call manager, which serializes it per call.
 */
export function processTelnyxWebhook(calls: WebhookCalls, input: TelnyxWebhookInput): TelnyxWebhookResponse {
  const { requestId, rawBody } = input;
  const signatureEd25519 = input.header('telnyx-signature-ed25519');
  const signatureHmac = input.header('telnyx-signature');
  const signature = signatureEd25519 ?? signatureHmac ?? '';
  const timestamp = input.header('telnyx-timestamp') ?? '';
  const scheme = signatureEd25519 ? 'ed25519' : signatureHmac ? 'hmac-sha256' : undefined;

  const rawMeta = extractTelnyxEventMetaFromRawBody(rawBody);
  const signatureCheck = verifyTelnyxSignature({ rawBody, signature, timestamp, scheme });

  if (signatureCheck.skipped) {
    log.warn({ requestId, event_type: rawMeta.eventType }, 'telnyx signature check skipped (dev)');
  }

  if (!signatureCheck.ok) {
    log.warn(
      {
        event: 'telnyx_webhook_rejected',
        requestId,
        event_type: rawMeta.eventType,
        call_control_id: rawMeta.callControlId,
        action_taken: 'reject_invalid_signature',
      },
      'telnyx webhook ack',
    );
    return { status: 401, body: { error: 'invalid_signature' }, work: Promise.resolve() };
  }

  const parsedMeta = extractTelnyxEventMeta(input.body);
  const eventType = parsedMeta.eventType ?? rawMeta.eventType;
  const callControlId = parsedMeta.callControlId ?? rawMeta.callControlId;
  const actionTaken = determineAction(eventType, callControlId);

  let work = Promise.resolve();
  if (eventType && callControlId) {
    const hangupCause = parsedMeta.hangupCause ?? rawMeta.hangupCause;
    work = (
      eventType === 'call.initiated'
        ? calls.handleIncomingCall(callControlId)
        : dispatchLifecycle(calls, callControlId, toLifecycleEvent(eventType, hangupCause))
    ).catch((error: unknown) => {
      log.error(
        { err: error, event: 'webhook_dispatch_failed', event_type: eventType, call_control_id: callControlId },
        'webhook dispatch failed',
      );
    });
  }

  log.info(
    {
      event: 'telnyx_webhook_ack',
      requestId,
      event_type: eventType,
      call_control_id: callControlId,
      action_taken: actionTaken,
    },
    'telnyx webhook ack',
  );

  return { status: 200, body: { ok: true }, work };
}

export function createTelnyxWebhookRouter(calls: WebhookCalls): Router {
  const router = Router();

  router.post('/', (req: RequestWithRawBody, res) => {
    const result = processTelnyxWebhook(calls, {
      requestId: req.id,
      rawBody: req.rawBody ?? Buffer.from(''),
      body: req.body,
      header: (name) => req.header(name),
    });
    res.status(result.status).json(result.body);
  });

  return router;
}

function dispatchLifecycle(calls: WebhookCalls, callId: string, event: LifecycleEvent | null): Promise<void> {
  return event ? calls.handleLifecycle(callId, event) : Promise.resolve();
}
