// Incremental frame reassembly.

import { ProtocolError } from "./errors.ts";
import {
  DEFAULT_MAX_FRAME_SIZE,
  type Frame,
  HEADER_SIZE,
  HEADER_TAIL_SIZE,
  LENGTH_PREFIX_SIZE,
  isFrameKind,
} from "./frame.ts";

/**
 * Turns arbitrary byte chunks back into frames.
 *
 * Partial frames stay buffered between `feed` calls as the chunks they
 * arrived in; a frame's bytes are joined once, when all of them are here.
 * A header that breaks the framing rules poisons the decoder: every later
 * call rethrows the same ProtocolError.
 */
export class FrameDecoder {
  private chunks: Uint8Array[] = [];
  private length = 0;
  // The first chunk is a view left over from a partly consumed input.
  private headIsView = false;
  private failure: ProtocolError | null = null;

  constructor(private readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE) {}

  /** Bytes held for an incomplete frame. */
  get buffered(): number {
    return this.length;
  }

  /**
   * Append bytes and return every frame they complete, in stream order.
   *
   * @throws ProtocolError on an oversized, undersized or unknown-kind frame
   */
  feed(bytes: Uint8Array): Frame[] {
    if (this.failure) {
      throw this.failure;
    }
    if (bytes.length > 0) {
      this.chunks.push(bytes);
      this.length += bytes.length;
    }

    const frames: Frame[] = [];
    try {
      for (let frame = this.next(); frame !== null; frame = this.next()) {
        frames.push(frame);
      }
    } catch (e) {
      if (e instanceof ProtocolError) {
        this.failure = e;
        this.chunks = [];
        this.length = 0;
      }
      throw e;
    }

    // Copy the remainder so a small tail never pins a large chunk.
    const head = this.chunks[0];
    if (this.headIsView && head !== undefined) {
      this.chunks[0] = head.slice();
    }
    this.headIsView = false;
    return frames;
  }

  /**
   * Signal end of stream.
   *
   * @throws ProtocolError if a partial frame is still buffered
   */
  finish(): void {
    if (this.failure) {
      throw this.failure;
    }
    if (this.length > 0) {
      this.failure = ProtocolError.unexpectedEof(this.length);
      throw this.failure;
    }
  }

  private next(): Frame | null {
    if (this.length < LENGTH_PREFIX_SIZE) {
      return null;
    }
    const prefix = this.peek(LENGTH_PREFIX_SIZE);
    const totalLength = new DataView(prefix.buffer, prefix.byteOffset, LENGTH_PREFIX_SIZE).getUint32(
      0,
      true,
    );

    // Checked before buffering the body so a bogus length cannot grow memory.
    if (totalLength > this.maxFrameSize) {
      throw ProtocolError.violation(
        `frame length ${totalLength} exceeds the maximum of ${this.maxFrameSize}`,
      );
    }
    if (totalLength < HEADER_TAIL_SIZE) {
      throw ProtocolError.violation(
        `frame length ${totalLength} is shorter than the ${HEADER_TAIL_SIZE}-byte header`,
      );
    }
    if (this.length < LENGTH_PREFIX_SIZE + totalLength) {
      return null;
    }

    const raw = this.take(LENGTH_PREFIX_SIZE + totalLength);
    const view = new DataView(raw.buffer, raw.byteOffset, raw.length);
    const kind = view.getUint8(4);
    if (!isFrameKind(kind)) {
      throw ProtocolError.violation(`unknown frame kind ${kind}`);
    }
    return {
      kind,
      requestId: view.getUint32(5, true),
      serviceId: view.getUint32(9, true),
      methodId: view.getUint32(13, true),
      payload: raw.subarray(HEADER_SIZE),
    };
  }

  // First n buffered bytes without consuming them; n is at most a few bytes.
  private peek(n: number): Uint8Array {
    const head = this.chunks[0];
    if (head !== undefined && head.length >= n) {
      return head.subarray(0, n);
    }
    const out = new Uint8Array(n);
    let filled = 0;
    for (const chunk of this.chunks) {
      const used = Math.min(chunk.length, n - filled);
      out.set(chunk.subarray(0, used), filled);
      filled += used;
      if (filled === n) break;
    }
    return out;
  }

  // Remove n buffered bytes into a fresh array that owns them.
  private take(n: number): Uint8Array {
    const out = new Uint8Array(n);
    let filled = 0;
    while (filled < n) {
      const head = this.chunks[0];
      if (head === undefined) {
        throw new Error(`frame decoder lost track of its buffer at ${filled} of ${n} bytes`);
      }
      const used = Math.min(head.length, n - filled);
      out.set(head.subarray(0, used), filled);
      filled += used;
      if (used === head.length) {
        this.chunks.shift();
        this.headIsView = false;
      } else {
        this.chunks[0] = head.subarray(used);
        this.headIsView = true;
      }
    }
    this.length -= n;
    return out;
  }
}
