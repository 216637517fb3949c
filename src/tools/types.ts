import type { ClientRepository } from '../persistence/types';
import type { Notifier } from '../notifications/types';

export type ToolName = 'lookup_client' | 'create_support_case' | 'send_conversation_summary';

export type ToolErrorCode =
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'ToolTimeout'
  | 'ToolFailed'
  | 'TooManyToolCalls'
  | 'DuplicateRequestId'
  | 'Cancelled'
  | 'NotFound';

export interface ToolError {
  code: ToolErrorCode;
  message: string;
}

export type ToolPayload = Record<string, unknown>;

export type ToolOutcome = { ok: true; payload: ToolPayload } | { ok: false; error: ToolError };

export interface ToolCallRequest {
  callId: string;
  /** Unique within the call; correlates the eventual result. */
  requestId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ToolCallResult = ToolOutcome & { requestId: string };

export interface ToolDefinition {
  type: 'function';
  name: ToolName;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, { type: string; description: string }>;
    required: string[];
  };
}

export interface ToolCollaborators {
  clients: ClientRepository;
  notifier: Notifier;
  supportEmail: string;
}

export interface ToolContext {
  callId: string;
  requestId: string;
  signal: AbortSignal;
  collaborators: ToolCollaborators;
}

/** A registered tool: validates its own arguments, then runs. */
export interface RegisteredTool {
  name: ToolName;
  execute(rawArgs: Record<string, unknown>, context: ToolContext): Promise<ToolOutcome>;
}

export function toolError(code: ToolErrorCode, message: string): ToolOutcome {
  return { ok: false, error: { code, message } };
}
