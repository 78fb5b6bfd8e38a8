// Server-side request routing.

import { DecodeError, decodeValue, encodeValue, hexWindow } from "@hasten/codec";
import {
  ErrorCode,
  type Frame,
  HandlerFailure,
  RpcError,
  encodeWireError,
  errorFrame,
  responseFrame,
} from "@hasten/wire";
import type { MethodDescriptor } from "./descriptor.ts";
import { type Logger, createLogger, errorFields } from "./logging.ts";

/**
 * Explicit handler result: a value, or an application failure.
 */
export type Outcome<T> = { ok: true; value: T } | { ok: false; code: number; message: string };

export function ok<T>(value: T): Outcome<T> {
  return { ok: true, value };
}

/** Fail the request with an application code (carried in the Error frame). */
export function err(code: number, message: string): Outcome<never> {
  return { ok: false, code, message };
}

/** What a handler knows about the request it serves. */
export interface HandlerContext {
  requestId: number;
  serviceId: number;
  methodId: number;
  /** Aborted when the caller cancels or the session closes. */
  signal: AbortSignal;
}

/** Handler over raw payload bytes. */
export type RawHandler = (
  payload: Uint8Array,
  ctx: HandlerContext,
) => Uint8Array | Outcome<Uint8Array> | Promise<Uint8Array | Outcome<Uint8Array>>;

/**
 * Handler over decoded arguments.
 *
 * Arguments arrive as decoded by the method's `args` schema; typed
 * skeletons narrow them before calling user code.
 */
export type MethodHandler = (
  args: unknown,
  ctx: HandlerContext,
) => Outcome<unknown> | Promise<Outcome<unknown>>;

export interface HandlerEntry {
  serviceId: number;
  methodId: number;
  name: string;
  invoke: RawHandler;
}

export interface DispatcherOptions {
  logger?: Logger;
}

function handlerKey(serviceId: number, methodId: number): string {
  return `${serviceId}:${methodId}`;
}

function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff_ffff;
}

/** HandlerFailure reply with application code 0. */
export function handlerFailureFrame(frame: Frame, message: string): Frame {
  return errorFrame(
    frame.requestId,
    frame.serviceId,
    encodeWireError({ code: ErrorCode.HandlerFailure, appCode: 0, message }),
  );
}

/**
 * Table of handlers keyed by (serviceId, methodId).
 *
 * Filled during setup, then frozen; dispatch only reads it, so one
 * dispatcher can serve any number of sessions.
 */
export class Dispatcher {
  private readonly handlers = new Map<string, HandlerEntry>();
  private frozen = false;
  private readonly log: Logger;

  constructor(options: DispatcherOptions = {}) {
    this.log = options.logger ?? createLogger().child("dispatch");
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get size(): number {
    return this.handlers.size;
  }

  /**
   * Register a raw handler.
   *
   * @throws RpcError (duplicateHandler) if the pair is already registered
   * @throws Error after freeze()
   */
  register(serviceId: number, methodId: number, handler: RawHandler, name?: string): void {
    if (this.frozen) {
      throw new Error(
        `cannot register service ${serviceId} method ${methodId}: dispatcher is frozen`,
      );
    }
    const key = handlerKey(serviceId, methodId);
    if (this.handlers.has(key)) {
      throw RpcError.duplicateHandler(serviceId, methodId);
    }
    this.handlers.set(key, {
      serviceId,
      methodId,
      name: name ?? `${serviceId}.${methodId}`,
      invoke: handler,
    });
  }

  /**
   * Register a handler that receives decoded arguments and returns a value
   * encoded with the method's result schema.
   */
  registerMethod(method: MethodDescriptor, handler: MethodHandler): void {
    this.register(
      method.serviceId,
      method.methodId,
      async (payload, ctx) => {
        const args = decodeValue(payload, method.args, method.registry);
        const outcome = await handler(args, ctx);
        if (!outcome.ok) {
          return outcome;
        }
        return encodeValue(outcome.value, method.result, method.registry);
      },
      method.name,
    );
  }

  /** Make the table read-only. */
  freeze(): void {
    this.frozen = true;
  }

  lookup(serviceId: number, methodId: number): HandlerEntry | undefined {
    return this.handlers.get(handlerKey(serviceId, methodId));
  }

  /**
   * Run the handler for a Request frame and produce its reply.
   *
   * Never rejects: every failure becomes an Error frame.
   */
  async dispatch(
    frame: Frame,
    signal: AbortSignal = new AbortController().signal,
  ): Promise<Frame> {
    try {
      return await this.invoke(frame, signal);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return handlerFailureFrame(frame, `request ${frame.requestId} failed: ${message}`);
    }
  }

  private async invoke(frame: Frame, signal: AbortSignal): Promise<Frame> {
    const { requestId, serviceId, methodId } = frame;
    const entry = this.lookup(serviceId, methodId);
    if (!entry) {
      this.log.warn("unknown method", { requestId, serviceId, methodId });
      const message = RpcError.unknownMethod(serviceId, methodId).message;
      return this.failure(frame, ErrorCode.UnknownMethod, 0, message);
    }

    const ctx: HandlerContext = { requestId, serviceId, methodId, signal };
    try {
      const result = await entry.invoke(frame.payload, ctx);
      if (result instanceof Uint8Array) {
        return responseFrame(requestId, serviceId, result);
      }
      if (result.ok) {
        return responseFrame(requestId, serviceId, result.value);
      }
      this.log.debug("handler returned failure", {
        method: entry.name,
        requestId,
        code: result.code,
        message: result.message,
      });
      return this.failure(frame, ErrorCode.HandlerFailure, result.code, result.message);
    } catch (e) {
      if (e instanceof DecodeError) {
        this.log.warn("request payload does not decode", {
          method: entry.name,
          requestId,
          message: e.message,
          bytes: hexWindow(frame.payload, e.offset),
        });
        return this.failure(frame, ErrorCode.DecodeError, 0, e.message);
      }
      this.log.error("handler threw", { method: entry.name, requestId, ...errorFields(e) });
      if (e instanceof HandlerFailure) {
        return this.failure(frame, ErrorCode.HandlerFailure, e.code, e.message);
      }
      const message = e instanceof Error ? e.message : String(e);
      return this.failure(frame, ErrorCode.HandlerFailure, 0, message);
    }
  }

  // Application codes travel as u32; anything else is sent as 0.
  private failure(frame: Frame, code: ErrorCode, appCode: number, message: string): Frame {
    if (!isU32(appCode)) {
      this.log.warn("application code is not a u32, sending 0", {
        requestId: frame.requestId,
        appCode,
      });
    }
    return errorFrame(
      frame.requestId,
      frame.serviceId,
      encodeWireError({ code, appCode: isU32(appCode) ? appCode : 0, message }),
    );
  }
}
