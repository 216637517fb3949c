import { log } from '../log';
import { recordToolCall } from '../metrics';
import { errorMessage } from '../errors';
import type { ToolRegistry } from './handlers';
import {
  type ToolCallRequest,
  type ToolCallResult,
  type ToolCollaborators,
  type ToolOutcome,
  toolError,
} from './types';

export interface ToolDispatcherOptions {
  callId: string;
  registry: ToolRegistry;
  collaborators: ToolCollaborators;
  timeoutMs: number;
  maxConcurrent: number;
}

interface OutstandingCall {
  name: string;
  cancel: (reason: string) => void;
}

/**
 * Runs tool calls for one call. `dispatch` never rejects: every failure mode,
 * including timeouts and cancellation, settles exactly once as an error result.
 */
export class ToolDispatcher {
  private readonly callId: string;
  private readonly registry: ToolRegistry;
  private readonly collaborators: ToolCollaborators;
  private readonly timeoutMs: number;
  private readonly maxConcurrent: number;
  private readonly outstanding = new Map<string, OutstandingCall>();
  private closedReason: string | null = null;

  constructor(options: ToolDispatcherOptions) {
    this.callId = options.callId;
    this.registry = options.registry;
    this.collaborators = options.collaborators;
    this.timeoutMs = Math.max(1, options.timeoutMs);
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
  }

  public get outstandingCount(): number {
    return this.outstanding.size;
  }

  public dispatch(request: ToolCallRequest): Promise<ToolCallResult> {
    const { requestId, name } = request;
    const logContext = { call_id: this.callId, request_id: requestId, tool: name };

    if (this.closedReason !== null) {
      return Promise.resolve(this.reject(request, toolError('Cancelled', `tool calls closed: ${this.closedReason}`)));
    }

    const tool = this.registry.get(name);
    if (!tool) {
      log.warn({ event: 'tool_unknown', ...logContext }, 'unknown tool requested');
      return Promise.resolve(this.reject(request, toolError('UnknownTool', `Unknown tool: ${name}`)));
    }

    if (this.outstanding.has(requestId)) {
      return Promise.resolve(
        this.reject(request, toolError('DuplicateRequestId', `request ${requestId} is already running`)),
      );
    }

    if (this.outstanding.size >= this.maxConcurrent) {
      log.warn(
        { event: 'tool_concurrency_exceeded', outstanding: this.outstanding.size, ...logContext },
        'too many outstanding tool calls',
      );
      return Promise.resolve(
        this.reject(
          request,
          toolError('TooManyToolCalls', `at most ${this.maxConcurrent} tool calls may run at once`),
        ),
      );
    }

    const controller = new AbortController();
    const startedAt = Date.now();
    log.info({ event: 'tool_call_started', args: request.arguments, ...logContext }, 'tool call started');

    return new Promise<ToolCallResult>((resolve) => {
      let settled = false;

      const finish = (outcome: ToolOutcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        this.outstanding.delete(requestId);

        const durationMs = Date.now() - startedAt;
        const label = outcome.ok ? 'ok' : outcome.error.code;
        recordToolCall(name, label, durationMs);
        log.info(
          { event: 'tool_call_finished', outcome: label, duration_ms: durationMs, ...logContext },
          'tool call finished',
        );
        resolve({ requestId, ...outcome });
      };

      const timer = setTimeout(() => {
        controller.abort();
        finish(toolError('ToolTimeout', `${name} did not finish within ${this.timeoutMs} ms`));
      }, this.timeoutMs);

      this.outstanding.set(requestId, {
        name,
        cancel: (reason) => {
          controller.abort();
          finish(toolError('Cancelled', `tool call cancelled: ${reason}`));
        },
      });

      Promise.resolve()
        .then(() =>
          tool.execute(request.arguments, {
            callId: this.callId,
            requestId,
            signal: controller.signal,
            collaborators: this.collaborators,
          }),
        )
        .then(finish, (error: unknown) => {
          log.error({ err: error, event: 'tool_call_failed', ...logContext }, 'tool call failed');
          finish(toolError('ToolFailed', errorMessage(error)));
        });
    });
  }

  /** Aborts every outstanding call and refuses new ones. */
  public cancelAll(reason: string): number {
    this.closedReason = reason;
    const pending = Array.from(this.outstanding.values());
    for (const call of pending) {
      call.cancel(reason);
    }
    if (pending.length > 0) {
      log.info(
        { event: 'tool_calls_cancelled', call_id: this.callId, count: pending.length, reason },
        'outstanding tool calls cancelled',
      );
    }
    return pending.length;
  }

  private reject(request: ToolCallRequest, outcome: ToolOutcome): ToolCallResult {
    const toolLabel = this.registry.has(request.name) ? request.name : 'unknown';
    recordToolCall(toolLabel, outcome.ok ? 'ok' : outcome.error.code, 0);
    return { requestId: request.requestId, ...outcome };
  }
}
