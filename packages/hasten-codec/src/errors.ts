// Codec error types.

/** Why a decode failed. */
export type DecodeErrorKind =
  /** Ran out of bytes before the value was complete. */
  | "eof"
  /** A length, count or numeric tag is outside the allowed range. */
  | "range"
  /** Bytes are well-formed but do not match the expected schema. */
  | "invalid"
  /** Bytes remain after the top-level value. */
  | "trailing";

/**
 * Raised when bytes cannot be decoded into the expected shape.
 *
 * `path` names the position inside the schema ("<root>", "items.[2].name"),
 * `offset` the byte at which decoding failed.
 */
export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    public readonly detail: string,
    public readonly offset: number,
    public readonly path: string | null = null,
  ) {
    super(
      path === null
        ? `${detail} at offset ${offset}`
        : `${detail} at offset ${offset} (path: ${path})`,
    );
    this.name = "DecodeError";
  }

  static eof(what: string, offset: number, needed: number, available: number): DecodeError {
    return new DecodeError(
      "eof",
      `${what}: need ${needed} bytes, ${available} available`,
      offset,
    );
  }

  static range(detail: string, offset: number): DecodeError {
    return new DecodeError("range", detail, offset);
  }

  static invalid(detail: string, offset: number): DecodeError {
    return new DecodeError("invalid", detail, offset);
  }

  static trailing(consumed: number, total: number): DecodeError {
    return new DecodeError(
      "trailing",
      `${total - consumed} trailing bytes after value`,
      consumed,
      "<root>",
    );
  }

  /** Copy of this error annotated with a schema path. */
  withPath(path: string): DecodeError {
    return new DecodeError(this.kind, this.detail, this.offset, path);
  }
}

/**
 * Raised when a JS value does not have the shape its schema declares.
 *
 * Generated code is responsible for passing well-shaped values, so this
 * signals a bug on the calling side rather than a wire condition.
 */
export class EncodeError extends Error {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(`${message} (path: ${path})`);
    this.name = "EncodeError";
  }
}
