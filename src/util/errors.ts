export type ErrorKind =
  | "InvalidArgumentError"
  | "AuthError"
  | "NotFoundError"
  | "ActionError"
  | "BridgeUnavailableError"
  | "ConnectionError"
  | "BridgeHttpError"
  | "ProtocolError";

/** Base class for every failure the bridge client reports. */
export abstract class BridgeError extends Error {
  constructor(readonly kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = kind;
  }
}

/** Rejected before any request was sent. */
export class InvalidArgumentError extends BridgeError {
  constructor(message: string) {
    super("InvalidArgumentError", message);
  }
}

export class AuthError extends BridgeError {
  constructor(message = "Bond token rejected (HTTP 401)") {
    super("AuthError", message);
  }
}

export class NotFoundError extends BridgeError {
  constructor(message: string) {
    super("NotFoundError", message);
  }
}

export class ActionError extends BridgeError {
  constructor(message: string, readonly status?: number, options?: ErrorOptions) {
    super("ActionError", message, options);
  }
}

/** Network failure or timeout on a single attempt. */
export class ConnectionError extends BridgeError {
  constructor(message: string, readonly timedOut: boolean, options?: ErrorOptions) {
    super("ConnectionError", message, options);
  }
}

export class BridgeHttpError extends BridgeError {
  constructor(readonly status: number, readonly body: string, path: string) {
    super("BridgeHttpError", `Bond API error ${status} on ${path}${body ? `: ${body.slice(0, 200)}` : ""}`);
  }

  get transient(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class ProtocolError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super("ProtocolError", message, options);
  }
}

export class BridgeUnavailableError extends BridgeError {
  constructor(message: string, readonly attempts: number, options?: ErrorOptions) {
    super("BridgeUnavailableError", message, options);
  }
}

export type TransientError = ConnectionError | BridgeHttpError;

export function isTransient(err: unknown): err is TransientError {
  return err instanceof ConnectionError || (err instanceof BridgeHttpError && err.transient);
}

/** Kind reported to callers; anything that is not a BridgeError is an internal failure. */
export type FailureKind = ErrorKind | "InternalError";

export function describeFailure(err: unknown): { kind: FailureKind; message: string } {
  if (err instanceof BridgeError) return { kind: err.kind, message: err.message };
  if (err instanceof Error) return { kind: "InternalError", message: err.message };
  return { kind: "InternalError", message: String(err) };
}
