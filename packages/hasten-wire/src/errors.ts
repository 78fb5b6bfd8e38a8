// Error taxonomy shared by both ends of a session.

/** Why the frame layer gave up on a stream. */
export type ProtocolErrorKind = "violation" | "unexpectedEof";

/**
 * A framing failure. This is the only condition that tears a session down;
 * everything else stays contained to one request.
 */
export class ProtocolError extends Error {
  constructor(
    public readonly kind: ProtocolErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "ProtocolError";
  }

  static violation(message: string): ProtocolError {
    return new ProtocolError("violation", message);
  }

  static unexpectedEof(buffered: number): ProtocolError {
    return new ProtocolError(
      "unexpectedEof",
      `stream ended with ${buffered} bytes of an incomplete frame buffered`,
    );
  }
}

/** Error frame codes. */
export const ErrorCode = {
  UnknownMethod: 1,
  DecodeError: 2,
  HandlerFailure: 3,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export function isErrorCode(value: number): value is ErrorCode {
  return value === 1 || value === 2 || value === 3;
}

export type RpcErrorKind =
  | "protocolViolation"
  | "decodeError"
  | "unknownMethod"
  | "timeout"
  | "sessionClosed"
  | "handlerFailure"
  | "overloaded"
  | "duplicateHandler";

/**
 * The single error a failed call ends with.
 *
 * `code` is the application error code for `handlerFailure` (0 when the
 * handler gave none) and 0 for every other kind.
 */
export class RpcError extends Error {
  constructor(
    public readonly kind: RpcErrorKind,
    message: string,
    public readonly code: number = 0,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RpcError";
  }

  static protocolViolation(message: string, cause?: unknown): RpcError {
    return new RpcError("protocolViolation", message, 0, { cause });
  }

  static decodeError(message: string, cause?: unknown): RpcError {
    return new RpcError("decodeError", message, 0, { cause });
  }

  static unknownMethod(serviceId: number, methodId: number): RpcError {
    return new RpcError("unknownMethod", `no handler for service ${serviceId} method ${methodId}`);
  }

  static timeout(requestId: number, timeoutMs: number): RpcError {
    return new RpcError("timeout", `request ${requestId} timed out after ${timeoutMs}ms`);
  }

  static sessionClosed(reason?: string): RpcError {
    return new RpcError("sessionClosed", reason ? `session closed: ${reason}` : "session closed");
  }

  static handlerFailure(code: number, message: string): RpcError {
    return new RpcError("handlerFailure", message, code);
  }

  static overloaded(limit: number): RpcError {
    return new RpcError("overloaded", `${limit} calls already pending`);
  }

  static duplicateHandler(serviceId: number, methodId: number): RpcError {
    return new RpcError(
      "duplicateHandler",
      `a handler for service ${serviceId} method ${methodId} is already registered`,
    );
  }
}

/**
 * Thrown by a handler to fail its request with an application code.
 *
 * Any other thrown `Error` fails the request too, with code 0.
 */
export class HandlerFailure extends Error {
  constructor(
    message: string,
    public readonly code: number = 0,
  ) {
    super(message);
    this.name = "HandlerFailure";
  }
}
