// In-process byte stream pair.

import { createChannel, type Channel } from "./channel.ts";
import type { ByteStream } from "./transport.ts";

export interface MemoryStreamOptions {
  /** Split every write into chunks of at most this many bytes. */
  chunkSize?: number;
}

class MemoryStream implements ByteStream {
  private peer: MemoryStream | null = null;
  private closed = false;

  constructor(
    readonly inbound: Channel<Uint8Array>,
    private readonly chunkSize: number,
  ) {}

  connect(peer: MemoryStream): void {
    this.peer = peer;
  }

  read(): Promise<Uint8Array | null> {
    return this.inbound.recv();
  }

  async write(bytes: Uint8Array): Promise<void> {
    const target = this.peer?.inbound;
    if (this.closed || !target || target.isClosed()) {
      throw new Error("memory stream closed");
    }
    // Copy so the writer may reuse its buffer.
    for (let offset = 0; offset < bytes.length; offset += this.chunkSize) {
      target.send(bytes.slice(offset, offset + this.chunkSize));
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.inbound.close();
    // The peer drains what was already sent, then reads end of stream.
    this.peer?.inbound.close();
  }
}

/**
 * Two connected streams: bytes written to one are read from the other.
 *
 * Closing either end ends the stream for both.
 */
export function createMemoryStreamPair(
  options: MemoryStreamOptions = {},
): [ByteStream, ByteStream] {
  const chunkSize = options.chunkSize ?? Number.MAX_SAFE_INTEGER;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  const a = new MemoryStream(createChannel(), chunkSize);
  const b = new MemoryStream(createChannel(), chunkSize);
  a.connect(b);
  b.connect(a);
  return [a, b];
}
