// ByteStream over a Node duplex stream.

import type { Duplex } from "node:stream";
import { type ByteStream, type Channel, createChannel } from "@hasten/core";

const encoder = new TextEncoder();

/**
 * Adapts a Node `Duplex` (a `net.Socket`, usually) to `ByteStream`.
 *
 * Incoming chunks queue until read. `read` resolves to null once the peer
 * ends the stream, and rejects with the socket's error if it failed.
 */
export class SocketStream implements ByteStream {
  private readonly inbound: Channel<Uint8Array> = createChannel();
  private error: Error | null = null;
  private closed = false;

  constructor(private readonly socket: Duplex) {
    socket.on("data", (chunk: unknown) => {
      if (chunk instanceof Uint8Array) {
        // A plain view: the session never needs Buffer's API.
        this.inbound.send(new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength));
      } else if (typeof chunk === "string") {
        this.inbound.send(encoder.encode(chunk));
      }
    });

    socket.on("error", (err: Error) => {
      this.error = err;
      this.inbound.close();
    });

    socket.on("end", () => {
      this.inbound.close();
    });

    socket.on("close", () => {
      this.inbound.close();
    });
  }

  async read(): Promise<Uint8Array | null> {
    const chunk = await this.inbound.recv();
    if (chunk === null && this.error) {
      throw this.error;
    }
    return chunk;
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this.closed || this.socket.destroyed) {
      return Promise.reject(new Error("socket closed"));
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.write(bytes, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
    this.inbound.close();
  }
}
