// One connection's framing, routing and write path.

import { DecodeError } from "@hasten/codec";
import {
  DEFAULT_MAX_FRAME_SIZE,
  ErrorCode,
  type Frame,
  FrameDecoder,
  FrameKind,
  LENGTH_PREFIX_SIZE,
  ProtocolError,
  RpcError,
  decodeGoodbyeReason,
  decodeWireError,
  describeFrame,
  encodeGoodbyeReason,
  encodeWireError,
  errorFrame,
  goodbyeFrame,
  pongFrame,
  rpcErrorFromWire,
  serializeFrame,
} from "@hasten/wire";
import type { CallTable } from "./call_table.ts";
import { DEFAULT_CLOSE_TIMEOUT_MS } from "./config.ts";
import { type Logger, createLogger, errorFields } from "./logging.ts";
import type { ByteStream } from "./transport.ts";

/**
 * Lifecycle: connecting -> open -> closing -> closed. A session never reopens.
 */
export type SessionState = "connecting" | "open" | "closing" | "closed";

/** Receives the server-side traffic of a session. */
export interface RequestSink {
  onRequest(frame: Frame): void;
  /** The caller gave up on a request. */
  onCancel(frame: Frame): void;
  /** The session closed; abandon in-flight work. */
  onClosed(reason: Error | null): void;
}

export interface SessionOptions {
  /** Receives Response, Error and Pong frames. */
  callTable: CallTable;
  /** Receives Request and Cancel frames. Without one, requests are answered with UnknownMethod. */
  sink?: RequestSink;
  maxFrameSize?: number;
  /** How long close() waits for the Goodbye to drain. Defaults to 1000. */
  closeTimeoutMs?: number;
  logger?: Logger;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Frames a byte stream and routes what arrives.
 *
 * One reader loop drains the stream and answers Ping frames itself. Writes
 * go through a single promise chain so concurrent senders never interleave
 * bytes. A framing violation is fatal: the session says Goodbye with the
 * reason and closes.
 */
export class Session {
  private stateValue: SessionState = "connecting";
  private readonly decoder: FrameDecoder;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly log: Logger;
  private resolveClosed: (reason: Error | null) => void = () => {};

  /** Resolves once closed: null for a clean shutdown, else what killed the session. */
  readonly closed: Promise<Error | null>;
  readonly maxFrameSize: number;

  constructor(
    private readonly stream: ByteStream,
    private readonly options: SessionOptions,
  ) {
    this.maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE;
    this.decoder = new FrameDecoder(this.maxFrameSize);
    this.log = options.logger ?? createLogger().child("session");
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  get state(): SessionState {
    return this.stateValue;
  }

  /** Open the session and start reading. */
  start(): void {
    if (this.stateValue !== "connecting") {
      throw new Error(`session cannot start: already ${this.stateValue}`);
    }
    this.stateValue = "open";
    this.log.debug("open", { maxFrameSize: this.maxFrameSize });
    this.readLoop().catch((e: unknown) => {
      this.log.error("read loop failed", errorFields(e));
      this.terminate(toError(e));
    });
  }

  /**
   * Queue a frame for writing.
   *
   * Rejects with RpcError (sessionClosed) unless the session is open, and
   * with RpcError (protocolViolation) if the frame exceeds maxFrameSize.
   */
  send(frame: Frame): Promise<void> {
    if (this.stateValue !== "open") {
      return Promise.reject(RpcError.sessionClosed(`session is ${this.stateValue}`));
    }
    let bytes: Uint8Array;
    try {
      bytes = serializeFrame(frame);
    } catch (e) {
      return Promise.reject(e);
    }
    const totalLength = bytes.length - LENGTH_PREFIX_SIZE;
    if (totalLength > this.maxFrameSize) {
      return Promise.reject(
        RpcError.protocolViolation(
          `frame length ${totalLength} exceeds the maximum of ${this.maxFrameSize}`,
        ),
      );
    }
    this.log.debug("send", { frame: describeFrame(frame) });
    return this.enqueue(bytes);
  }

  /**
   * Say Goodbye, let queued writes drain, then close the stream.
   */
  async close(reason = "closing"): Promise<void> {
    if (this.stateValue === "connecting") {
      this.terminate(null);
      return;
    }
    if (this.stateValue !== "open") {
      await this.closed;
      return;
    }
    this.stateValue = "closing";
    this.log.debug("closing", { reason });
    await this.sayGoodbye(reason);
    this.terminate(null);
  }

  private enqueue(bytes: Uint8Array): Promise<void> {
    const write = this.writeChain.then(() => this.stream.write(bytes));
    this.writeChain = write.catch((e: unknown) => {
      this.log.warn("transport write failed", errorFields(e));
      this.terminate(toError(e));
    });
    return write;
  }

  private async sendGoodbye(reason: string): Promise<void> {
    try {
      await this.enqueue(serializeFrame(goodbyeFrame(encodeGoodbyeReason(reason))));
    } catch (e) {
      this.log.debug("goodbye not delivered", errorFields(e));
    }
  }

  // A peer that stopped reading can stall the write chain forever.
  private async sayGoodbye(reason: string): Promise<void> {
    const closeTimeoutMs = this.options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.log.warn("writes did not drain before close", { closeTimeoutMs });
        resolve();
      }, closeTimeoutMs);
    });
    try {
      await Promise.race([this.sendGoodbye(reason), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async readLoop(): Promise<void> {
    try {
      for (;;) {
        const chunk = await this.stream.read();
        if (this.stateValue === "closed") {
          return;
        }
        if (chunk === null) {
          this.decoder.finish();
          this.log.debug("end of stream");
          this.terminate(null, "end of stream");
          return;
        }
        for (const frame of this.decoder.feed(chunk)) {
          this.route(frame);
        }
      }
    } catch (e) {
      if (e instanceof ProtocolError) {
        await this.failProtocol(e);
        return;
      }
      if (this.stateValue !== "closed") {
        this.log.warn("transport read failed", errorFields(e));
      }
      this.terminate(toError(e));
    }
  }

  private async failProtocol(error: ProtocolError): Promise<void> {
    this.log.warn("protocol violation", { kind: error.kind, message: error.message });
    if (this.stateValue === "open") {
      this.stateValue = "closing";
      await this.sayGoodbye(error.message);
    }
    this.terminate(error);
  }

  private route(frame: Frame): void {
    this.log.debug("recv", { frame: describeFrame(frame) });
    switch (frame.kind) {
      case FrameKind.Response:
        this.options.callTable.resolve(frame.requestId, { ok: true, payload: frame.payload });
        return;
      case FrameKind.Error:
        this.options.callTable.resolve(frame.requestId, {
          ok: false,
          error: this.errorFromFrame(frame),
        });
        return;
      case FrameKind.Request:
        if (this.stateValue !== "open") return;
        if (this.options.sink) {
          this.options.sink.onRequest(frame);
        } else {
          this.rejectRequest(frame);
        }
        return;
      case FrameKind.Cancel:
        if (this.stateValue !== "open") return;
        this.options.sink?.onCancel(frame);
        return;
      case FrameKind.Goodbye:
        this.onGoodbye(frame);
        return;
      case FrameKind.Ping:
        if (this.stateValue !== "open") return;
        this.send(pongFrame(frame)).catch((e: unknown) => {
          this.log.debug("pong not sent", { requestId: frame.requestId, ...errorFields(e) });
        });
        return;
      case FrameKind.Pong:
        this.options.callTable.resolve(frame.requestId, { ok: true, payload: frame.payload });
        return;
    }
  }

  private errorFromFrame(frame: Frame): RpcError {
    try {
      return rpcErrorFromWire(decodeWireError(frame.payload));
    } catch (e) {
      if (e instanceof DecodeError) {
        this.log.warn("malformed error payload", { requestId: frame.requestId, message: e.message });
        return RpcError.decodeError(`malformed error payload: ${e.message}`, e);
      }
      throw e;
    }
  }

  private rejectRequest(frame: Frame): void {
    const payload = encodeWireError({
      code: ErrorCode.UnknownMethod,
      appCode: 0,
      message: "this peer does not serve requests",
    });
    this.send(errorFrame(frame.requestId, frame.serviceId, payload)).catch((e: unknown) => {
      this.log.debug("error reply not sent", { requestId: frame.requestId, ...errorFields(e) });
    });
  }

  private onGoodbye(frame: Frame): void {
    let reason: string;
    try {
      reason = decodeGoodbyeReason(frame.payload);
    } catch (e) {
      this.log.warn("malformed goodbye payload", errorFields(e));
      reason = "unreadable reason";
    }
    this.log.debug("peer said goodbye", { reason });
    this.terminate(null, `peer said goodbye: ${reason}`);
  }

  private terminate(reason: Error | null, detail?: string): void {
    if (this.stateValue === "closed") return;
    this.stateValue = "closed";
    this.stream.close();
    this.options.callTable.failAll(RpcError.sessionClosed(reason?.message ?? detail));
    this.options.sink?.onClosed(reason);
    this.log.debug("closed", reason ? errorFields(reason) : { detail: detail ?? "clean" });
    this.resolveClosed(reason);
  }
}
