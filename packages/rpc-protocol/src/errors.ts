/**
 * Error classes shared by the codec and the client.
 */

export class RpcError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RpcError";
  }
}

/** The stream could not be opened, failed, or was closed. */
export class ConnectionError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static closed(): ConnectionError {
    return new ConnectionError("Connection closed");
  }
}

/** The peer sent something this client cannot interpret. Fatal to the connection. */
export class ProtocolError extends RpcError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProtocolError";
  }
}

/** A value that has no msgpack representation under the current codec. */
export class EncodingError extends RpcError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
  }
}

/**
 * A response carried a non-null error.
 *
 * Neovim sends errors as `[errorTypeId, message]`; the message is lifted
 * from that shape when present and the raw payload is kept in `payload`.
 */
export class RemoteError extends RpcError {
  readonly payload: unknown;

  constructor(payload: unknown, method?: string) {
    const detail = describeRemoteError(payload);
    super(method ? `${method}: ${detail}` : detail);
    this.name = "RemoteError";
    this.payload = payload;
  }
}

/** A local request handler failed; sent back to the peer as a response error. */
export class HandlerError extends RpcError {
  readonly method: string;

  constructor(method: string, cause: unknown) {
    super(describeError(cause), { cause });
    this.name = "HandlerError";
    this.method = method;
  }
}

export class DuplicateHandlerError extends RpcError {
  readonly method: string;

  constructor(method: string) {
    super(`Handler already registered for method: ${method}`);
    this.name = "DuplicateHandlerError";
    this.method = method;
  }
}

export class RequestTimeoutError extends RpcError {
  constructor(method: string, timeout: number) {
    super(`Request ${method} timed out after ${timeout}ms`);
    this.name = "RequestTimeoutError";
  }
}

/**
 * Describe a thrown value as a single line: `Name: message` for errors,
 * `String(value)` otherwise.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message ? `${err.name}: ${err.message}` : err.name;
  }
  return String(err);
}

function describeRemoteError(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  if (
    Array.isArray(payload) &&
    payload.length === 2 &&
    typeof payload[1] === "string"
  ) {
    return payload[1];
  }
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}
