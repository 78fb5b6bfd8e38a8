// Logging middleware for clients: one record per request and per outcome,
// with timing.

import { RpcError } from "@hasten/wire";
import { type Logger, createLogger } from "./logging.ts";
import type { CallOutcome, CallRequest, ClientMiddleware } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

export interface LoggingOptions {
  /** Defaults to a logger on the "hasten:rpc" namespace. */
  logger?: Logger;

  /** Log request arguments. Defaults to true. */
  logArgs?: boolean;

  /** Log response values. Defaults to true. */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log a response. Faster calls are skipped.
   * Defaults to 0.
   */
  minDuration?: number;
}

/**
 * Log every call with timing. Silent unless the logger's namespace is
 * enabled (DEBUG=hasten:rpc).
 *
 * @example
 * ```typescript
 * const caller = runtime.asCaller().with(loggingMiddleware());
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const log = options.logger ?? createLogger("hasten:rpc");
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(request: CallRequest): void {
      request.state.set(START_TIME, performance.now());

      if (!log.enabled) return;

      const fields: Record<string, unknown> = { method: request.method };
      if (logArgs && request.args !== undefined) {
        fields.args = request.args;
      }
      log.debug(`-> ${request.method}`, fields);
    },

    post(request: CallRequest, outcome: CallOutcome): void {
      const startTime = request.state.get(START_TIME);
      if (typeof startTime !== "number") return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!log.enabled) return;

      const fields: Record<string, unknown> = {
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logResults && outcome.value !== undefined) {
          fields.result = outcome.value;
        }
        log.debug(`<- ${request.method}: ok`, fields);
        return;
      }

      const error = outcome.error;
      if (error instanceof RpcError) {
        fields.errorKind = error.kind;
        if (error.code !== 0) {
          fields.errorCode = error.code;
        }
      }
      fields.error = { name: error.name, message: error.message };
      log.debug(`<- ${request.method}: failed`, fields);
    },
  };
}
