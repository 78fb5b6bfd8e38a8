// Caller abstraction used by typed clients.
//
// Supports middleware composition via with().

import type { MethodDescriptor } from "./descriptor.ts";
import { type Logger, createLogger, errorFields } from "./logging.ts";
import {
  type CallOutcome,
  type CallRequest,
  type ClientMiddleware,
  RejectionError,
} from "./middleware.ts";

/**
 * A call as Caller implementations receive it.
 */
export interface CallerRequest {
  /** Carries the ids and the schemas for args and result. */
  method: MethodDescriptor;
  args: unknown;
  timeoutMs?: number;
}

/**
 * What typed clients call through. Implementations speak the wire
 * protocol; middleware composes with with().
 */
export interface Caller {
  /** Make a call and return the decoded result. */
  call(request: CallerRequest): Promise<unknown>;

  /**
   * Wrap this caller with middleware. The first middleware added runs
   * first on pre and last on post.
   */
  with(middleware: ClientMiddleware): Caller;
}

/**
 * Runs middleware around another Caller. Pre hooks may reject or modify
 * the request; post hooks see the outcome; the inner result or error is
 * passed through unchanged.
 */
export class MiddlewareCaller implements Caller {
  private readonly log: Logger;

  constructor(
    private readonly inner: Caller,
    private readonly middlewares: ClientMiddleware[],
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger().child("caller");
  }

  async call(request: CallerRequest): Promise<unknown> {
    const callRequest: CallRequest = {
      method: request.method.name,
      args: request.args,
      timeoutMs: request.timeoutMs,
      state: new Map(),
    };

    for (const mw of this.middlewares) {
      const rejection = await mw.pre?.(callRequest);
      if (rejection) {
        const error = new RejectionError(rejection);
        await this.runPostHooks(callRequest, { ok: false, error });
        throw error;
      }
    }

    let outcome: CallOutcome;
    try {
      const value = await this.inner.call({
        method: request.method,
        args: callRequest.args,
        timeoutMs: callRequest.timeoutMs,
      });
      outcome = { ok: true, value };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(callRequest, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(callRequest, outcome);
    return outcome.value;
  }

  private async runPostHooks(request: CallRequest, outcome: CallOutcome): Promise<void> {
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw?.post) {
        try {
          await mw.post(request, outcome);
        } catch (e) {
          // Every post hook runs; a failing one does not change the outcome.
          this.log.warn("post hook failed", { method: request.method, ...errorFields(e) });
        }
      }
    }
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this.inner, [...this.middlewares, middleware], this.log);
  }
}
