/**
 * Byte stream abstraction.
 *
 * A session needs nothing from its transport beyond ordered, reliable
 * bytes in both directions. Framing happens above this layer.
 *
 * Implementations:
 * - createMemoryStreamPair() for in-process peers and tests
 * - SocketStream (@hasten/uds) for Unix domain sockets
 */
export interface ByteStream {
  /**
   * Next chunk of bytes. Chunk boundaries carry no meaning.
   *
   * Resolves to null at end of stream; rejects on transport failure.
   */
  read(): Promise<Uint8Array | null>;

  /** Write all of `bytes`, resolving once the transport accepted them. */
  write(bytes: Uint8Array): Promise<void>;

  /** Close both directions. Idempotent. */
  close(): void;
}
