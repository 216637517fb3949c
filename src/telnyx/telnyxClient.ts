import { env } from '../env';
import { log } from '../log';

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2';
const TELNYX_TIMEOUT_MS = 8000;
const TELNYX_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call-control is latency-sensitive)
const TELNYX_RETRY_BASE_MS = 250;
const TELNYX_RETRY_MAX_MS = 1500;

/** Call-control actions the bridge issues; routes and transports depend on this, not on fetch. */
export interface CallControl {
  answerCall(callControlId: string): Promise<void>;
  startStreaming(callControlId: string, streamUrl: string): Promise<void>;
  hangupCall(callControlId: string): Promise<void>;
}

export class TelnyxApiError extends Error {
  public readonly status: number;
  public readonly responseBody: unknown;

  constructor(message: string, status: number, responseBody: unknown) {
    super(message);
    this.name = 'TelnyxApiError';
    this.status = status;
    this.responseBody = responseBody;
  }
}

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(TELNYX_RETRY_MAX_MS, TELNYX_RETRY_BASE_MS * Math.pow(2, attempt));
  return exp + Math.floor(Math.random() * 120);
}

function truncateForLog(value: unknown, max = 800): string {
  const s = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  if (s.length <= max) return s;
  return `${s.slice(0, max)}…(truncated)`;
}

/** 422 responses for a call that already hung up are expected during teardown. */
function isCallEndedResponse(status: number, body: unknown): boolean {
  if (status !== 422) {
    return false;
  }
  const text = typeof body === 'string' ? body : JSON.stringify(body) ?? '';
  return /already ended|no longer active/i.test(text);
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      // fall through to text
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

export function redactStreamUrl(streamUrl: string): string {
  try {
    const parsed = new URL(streamUrl);
    if (parsed.searchParams.has('token')) {
      parsed.searchParams.set('token', '[redacted]');
    }
    return parsed.toString();
  } catch {
    return streamUrl.replace(/token=[^&]+/g, 'token=[redacted]');
  }
}

async function callControlRequest(
  callControlId: string,
  action: string,
  body: Record<string, unknown> | undefined,
  attempt: number,
  logContext: Record<string, unknown>,
): Promise<unknown> {
  const url = `${TELNYX_BASE_URL}/calls/${encodeURIComponent(callControlId)}/actions/${action}`;
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), TELNYX_TIMEOUT_MS);
  const startedAt = Date.now();

  log.debug(
    {
      event: 'telnyx_call_control_request',
      action,
      call_control_id: callControlId,
      telnyx_api_key_fingerprint: maskTelnyxKey(env.TELNYX_API_KEY),
      attempt,
      ...logContext,
    },
    'telnyx call-control request',
  );

  try {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${env.TELNYX_API_KEY}`,
      Accept: 'application/json',
      'User-Agent': 'realtime-voice-bridge/0.1.0',
    };

    let payload: string | undefined;
    if (body && Object.keys(body).length > 0) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body);
    }

    const response = await fetch(url, {
      method: 'POST',
      headers,
      body: payload,
      signal: controller.signal,
    });

    const responseBody = await safeReadBody(response);
    const durationMs = Date.now() - startedAt;

    if (!response.ok) {
      const logBody = truncateForLog(responseBody, 1000);

      if (isCallEndedResponse(response.status, responseBody)) {
        log.warn(
          {
            event: 'telnyx_call_control_ignored_post_end',
            action,
            call_control_id: callControlId,
            status: response.status,
            duration_ms: durationMs,
            ...logContext,
          },
          'telnyx call-control ignored post end',
        );
        return responseBody;
      }

      if (shouldRetry(response.status) && attempt < TELNYX_MAX_RETRIES) {
        const waitMs = backoffMs(attempt);
        log.warn(
          {
            event: 'telnyx_call_control_retry',
            action,
            call_control_id: callControlId,
            status: response.status,
            wait_ms: waitMs,
            attempt,
            body: logBody,
            ...logContext,
          },
          'telnyx call-control retry',
        );
        await sleep(waitMs);
        return callControlRequest(callControlId, action, body, attempt + 1, logContext);
      }

      log.error(
        {
          event: 'telnyx_call_control_failed',
          action,
          call_control_id: callControlId,
          status: response.status,
          duration_ms: durationMs,
          body: logBody,
          ...logContext,
        },
        'telnyx call-control failed',
      );
      throw new TelnyxApiError(
        `Telnyx call-control ${action} failed: ${response.status} ${truncateForLog(responseBody, 1200)}`,
        response.status,
        responseBody,
      );
    }

    log.info(
      {
        event: 'telnyx_call_control_completed',
        action,
        call_control_id: callControlId,
        status: response.status,
        duration_ms: durationMs,
        ...logContext,
      },
      'telnyx call-control completed',
    );
    return responseBody;
  } catch (error) {
    if (error instanceof TelnyxApiError) {
      throw error;
    }

    // Abort means the API is slow or our timeout is too low; retrying makes it worse
    if (!isAbortError(error) && attempt < TELNYX_MAX_RETRIES) {
      const waitMs = backoffMs(attempt);
      log.warn(
        {
          event: 'telnyx_call_control_error_retry',
          action,
          call_control_id: callControlId,
          attempt,
          wait_ms: waitMs,
          err: error,
          ...logContext,
        },
        'telnyx call-control error retry',
      );
      await sleep(waitMs);
      return callControlRequest(callControlId, action, body, attempt + 1, logContext);
    }

    log.error(
      { event: 'telnyx_call_control_error', action, call_control_id: callControlId, err: error, ...logContext },
      'telnyx call-control error',
    );
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

export class TelnyxClient implements CallControl {
  private readonly logContext: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.logContext = context;
  }

  public async answerCall(callControlId: string): Promise<void> {
    await callControlRequest(callControlId, 'answer', undefined, 0, this.logContext);
    log.info({ event: 'telnyx_answer_call', call_control_id: callControlId, ...this.logContext }, 'telnyx call answered');
  }

  public async startStreaming(callControlId: string, streamUrl: string): Promise<void> {
    const requestBody = {
      stream_url: streamUrl,
      stream_track: env.TELNYX_STREAM_TRACK,
      stream_codec: 'PCMU',
      stream_bidirectional_mode: 'rtp',
      stream_bidirectional_codec: 'PCMU',
    };
    log.info(
      {
        event: 'telnyx_streaming_start_request',
        call_control_id: callControlId,
        request_body: { ...requestBody, stream_url: redactStreamUrl(streamUrl) },
        ...this.logContext,
      },
      'telnyx streaming start request',
    );
    await callControlRequest(callControlId, 'streaming_start', requestBody, 0, this.logContext);
  }

  public async hangupCall(callControlId: string): Promise<void> {
    await callControlRequest(callControlId, 'hangup', undefined, 0, this.logContext);
    log.info({ event: 'telnyx_hangup_call', call_control_id: callControlId, ...this.logContext }, 'telnyx call hangup');
  }
}
