// Runtime facade: one session, both call and serve roles.

import { decodeValue, encodeValue } from "@hasten/codec";
import {
  type Frame,
  HEADER_TAIL_SIZE,
  RpcError,
  cancelFrame,
  pingFrame,
  requestFrame,
} from "@hasten/wire";
import { CallTable } from "./call_table.ts";
import type { Caller, CallerRequest } from "./caller.ts";
import { MiddlewareCaller } from "./caller.ts";
import { type RuntimeConfig, resolveRuntimeConfig } from "./config.ts";
import type { MethodDescriptor } from "./descriptor.ts";
import { Dispatcher, handlerFailureFrame } from "./dispatcher.ts";
import { type Logger, createLogger, errorFields } from "./logging.ts";
import type { ClientMiddleware } from "./middleware.ts";
import { Session, type SessionState } from "./session.ts";
import type { ByteStream } from "./transport.ts";
import { WorkerPool } from "./worker_pool.ts";

export interface RuntimeOptions {
  config?: Partial<RuntimeConfig>;
  /** Handlers for inbound requests. Frozen when the runtime starts. */
  dispatcher?: Dispatcher;
  /** Root logger; components log under its `session`, `calls` and `runtime` children. */
  logger?: Logger;
  /** Clock for call deadlines. Defaults to Date.now. */
  now?: () => number;
}

export interface CallOptions {
  /** Overrides config.callTimeoutMs for this call. */
  timeoutMs?: number;
}

/**
 * A session plus everything needed to call and serve over it.
 *
 * @example
 * ```typescript
 * const runtime = new Runtime(stream, { dispatcher });
 * runtime.start();
 * const doubled = await runtime.call(Calculator.double, 5n);
 * await runtime.close();
 * ```
 */
export class Runtime {
  readonly config: RuntimeConfig;
  private readonly session: Session;
  private readonly calls: CallTable;
  private readonly dispatcher: Dispatcher;
  private readonly pool: WorkerPool;
  private readonly inflight = new Map<number, AbortController>();
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(stream: ByteStream, options: RuntimeOptions = {}) {
    this.config = resolveRuntimeConfig(options.config);
    this.now = options.now ?? (() => Date.now());
    const root = options.logger ?? createLogger();
    this.log = root.child("runtime");
    this.dispatcher = options.dispatcher ?? new Dispatcher({ logger: root.child("dispatch") });
    this.pool = new WorkerPool(this.config.dispatchWorkerConcurrency);
    this.calls = new CallTable({
      callTimeoutMs: this.config.callTimeoutMs,
      maxPendingCalls: this.config.maxPendingCalls,
      graceMs: this.config.resolvedIdGraceMs,
      logger: root.child("calls"),
      now: this.now,
    });
    this.session = new Session(stream, {
      callTable: this.calls,
      maxFrameSize: this.config.maxFrameSize,
      closeTimeoutMs: this.config.closeTimeoutMs,
      logger: root.child("session"),
      sink: {
        onRequest: (frame) => this.onRequest(frame),
        onCancel: (frame) => this.onCancel(frame),
        onClosed: () => this.abandonInflight(),
      },
    });
  }

  get state(): SessionState {
    return this.session.state;
  }

  /** Resolves once the session closes: null when clean, else the cause. */
  get closed(): Promise<Error | null> {
    return this.session.closed;
  }

  /** Calls waiting for a response. */
  get pendingCalls(): number {
    return this.calls.size;
  }

  /** Freeze the dispatcher and start reading. */
  start(): void {
    this.dispatcher.freeze();
    this.session.start();
  }

  /** Start if needed and wait for the session to close. */
  async run(): Promise<Error | null> {
    if (this.session.state === "connecting") {
      this.start();
    }
    return this.session.closed;
  }

  close(reason?: string): Promise<void> {
    return this.session.close(reason);
  }

  /**
   * Call a method: encode args, send, wait, decode the result.
   *
   * @throws RpcError; EncodeError if args do not match the method's schema
   */
  async call(method: MethodDescriptor, args: unknown, options: CallOptions = {}): Promise<unknown> {
    const payload = encodeValue(args, method.args, method.registry);
    const response = await this.callRaw(method.serviceId, method.methodId, payload, options);
    try {
      return decodeValue(response, method.result, method.registry);
    } catch (e) {
      throw RpcError.decodeError(
        `${method.name}: response does not decode: ${e instanceof Error ? e.message : String(e)}`,
        e,
      );
    }
  }

  /**
   * Call with an already-encoded payload and get the raw response payload.
   *
   * On timeout a Cancel frame tells the peer to stop; the call itself has
   * already failed.
   */
  async callRaw(
    serviceId: number,
    methodId: number,
    payload: Uint8Array,
    options: CallOptions = {},
  ): Promise<Uint8Array> {
    if (this.session.state !== "open") {
      throw RpcError.sessionClosed(`session is ${this.session.state}`);
    }
    if (HEADER_TAIL_SIZE + payload.length > this.config.maxFrameSize) {
      throw RpcError.protocolViolation(
        `request of ${payload.length} bytes exceeds the frame limit of ${this.config.maxFrameSize}`,
      );
    }

    const { requestId, response } = this.calls.issue(options.timeoutMs);
    this.sendTracked(requestFrame(requestId, serviceId, methodId, payload));

    try {
      return await response;
    } catch (e) {
      if (e instanceof RpcError && e.kind === "timeout") {
        this.sendCancel(requestId, serviceId);
      }
      throw e;
    }
  }

  /**
   * Check that the peer is alive. Its session answers without involving
   * any handler.
   *
   * @returns round-trip time in milliseconds
   * @throws RpcError (timeout) if no Pong arrives in time
   */
  async ping(options: CallOptions = {}): Promise<number> {
    if (this.session.state !== "open") {
      throw RpcError.sessionClosed(`session is ${this.session.state}`);
    }
    const started = this.now();
    const { requestId, response } = this.calls.issue(options.timeoutMs);
    this.sendTracked(pingFrame(requestId));
    await response;
    return this.now() - started;
  }

  /** A Caller for generated clients; compose middleware with `with()`. */
  asCaller(): Caller {
    return new RuntimeCaller(this);
  }

  // A failed write ends the call; if it already ended, resolve() is a no-op.
  private sendTracked(frame: Frame): void {
    this.session.send(frame).catch((e: unknown) => {
      const error =
        e instanceof RpcError ? e : RpcError.sessionClosed(e instanceof Error ? e.message : String(e));
      this.calls.resolve(frame.requestId, { ok: false, error });
    });
  }

  private sendCancel(requestId: number, serviceId: number): void {
    if (this.session.state !== "open") return;
    this.session.send(cancelFrame(requestId, serviceId)).catch((e: unknown) => {
      this.log.debug("cancel not sent", { requestId, ...errorFields(e) });
    });
  }

  private onRequest(frame: Frame): void {
    const controller = new AbortController();
    this.inflight.set(frame.requestId, controller);
    this.pool
      .run(() => this.serve(frame, controller))
      .catch((e: unknown) => {
        this.log.error("request task failed", { requestId: frame.requestId, ...errorFields(e) });
      })
      .finally(() => {
        if (this.inflight.get(frame.requestId) === controller) {
          this.inflight.delete(frame.requestId);
        }
      });
  }

  private async serve(frame: Frame, controller: AbortController): Promise<void> {
    // Queued behind other handlers while the caller gave up or the session closed.
    if (controller.signal.aborted) return;

    let reply: Frame;
    try {
      reply = await this.dispatcher.dispatch(frame, controller.signal);
    } catch (e) {
      // The caller must hear back even if a dispatcher breaks its contract.
      this.log.error("dispatch rejected", { requestId: frame.requestId, ...errorFields(e) });
      reply = handlerFailureFrame(frame, e instanceof Error ? e.message : String(e));
    }
    if (controller.signal.aborted) {
      this.log.debug("dropping reply to abandoned request", { requestId: frame.requestId });
      return;
    }
    if (HEADER_TAIL_SIZE + reply.payload.length > this.config.maxFrameSize) {
      this.log.warn("reply exceeds the frame limit", {
        requestId: frame.requestId,
        bytes: reply.payload.length,
      });
      reply = handlerFailureFrame(
        frame,
        `reply of ${reply.payload.length} bytes exceeds the frame limit`,
      );
    }
    try {
      await this.session.send(reply);
    } catch (e) {
      this.log.debug("reply not sent", { requestId: frame.requestId, ...errorFields(e) });
    }
  }

  private onCancel(frame: Frame): void {
    const controller = this.inflight.get(frame.requestId);
    if (!controller) {
      this.log.debug("cancel for unknown request", { requestId: frame.requestId });
      return;
    }
    this.log.debug("request cancelled by caller", { requestId: frame.requestId });
    controller.abort(new Error(`request ${frame.requestId} cancelled by caller`));
  }

  private abandonInflight(): void {
    const reason = RpcError.sessionClosed();
    for (const controller of this.inflight.values()) {
      controller.abort(reason);
    }
    this.inflight.clear();
  }
}

/**
 * Caller backed by a Runtime.
 */
export class RuntimeCaller implements Caller {
  constructor(private readonly runtime: Runtime) {}

  call(request: CallerRequest): Promise<unknown> {
    return this.runtime.call(request.method, request.args, { timeoutMs: request.timeoutMs });
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}
