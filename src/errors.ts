export type BridgeErrorCode =
  | 'SessionSetupError'
  | 'UnsupportedFormat'
  | 'UnknownRequestId'
  | 'DuplicateCall';

export class BridgeError extends Error {
  public readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Handshake, auth or timeout failure while opening the AI session. Never retried. */
export class SessionSetupError extends BridgeError {
  public readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super('SessionSetupError', message, { cause: options.cause });
    this.status = options.status;
  }
}

export class UnsupportedFormatError extends BridgeError {
  constructor(message: string) {
    super('UnsupportedFormat', message);
  }
}

export class UnknownRequestIdError extends BridgeError {
  public readonly requestId: string;

  constructor(requestId: string) {
    super('UnknownRequestId', `no outstanding tool call with request id ${requestId}`);
    this.requestId = requestId;
  }
}

export class DuplicateCallError extends BridgeError {
  constructor(callId: string) {
    super('DuplicateCall', `call ${callId} is already registered`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return 'unknown_error';
}
