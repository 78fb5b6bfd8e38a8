// Client-side middleware: hooks around every call a Caller makes.

/**
 * An outgoing call as middleware sees it.
 */
export interface CallRequest {
  /** Qualified method name, e.g. "Calculator.double". */
  readonly method: string;

  /** The argument value. Pre hooks may replace it before encoding. */
  args: unknown;

  /** Per-call timeout override. Pre hooks may set or change it. */
  timeoutMs?: number;

  /** Scratch space shared by the hooks of this call, keyed by each middleware's own symbol. */
  readonly state: Map<symbol, unknown>;
}

export type CallOutcome = { ok: true; value: unknown } | { ok: false; error: Error };

/** Returned by a pre hook to stop the call before it is sent. */
export interface Rejection {
  code: string;
  message: string;
}

export class RejectionError extends Error {
  readonly code: string;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }
}

/**
 * Client middleware.
 *
 * Pre hooks run in the order middleware was added; post hooks in reverse.
 *
 * @example
 * ```typescript
 * const noNegatives: ClientMiddleware = {
 *   pre(request) {
 *     if (typeof request.args === "bigint" && request.args < 0n) {
 *       return { code: "invalid-request", message: "negative input" };
 *     }
 *   },
 * };
 * ```
 */
export interface ClientMiddleware {
  /** Called before the request is sent. Return a Rejection to abort the call. */
  pre?(request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /** Called with the result or error. Cannot change the outcome. */
  post?(request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
