// Outbound request correlation.

import { RpcError } from "@hasten/wire";
import { type Logger, createLogger } from "./logging.ts";

/** How a pending call ends. */
export type CallResolution = { ok: true; payload: Uint8Array } | { ok: false; error: RpcError };

export interface IssuedCall {
  requestId: number;
  /** Settles exactly once: payload, or the RpcError that ended the call. */
  response: Promise<Uint8Array>;
}

export interface CallTableOptions {
  callTimeoutMs: number;
  maxPendingCalls: number;
  /** How long a finished id stays reserved. */
  graceMs: number;
  logger?: Logger;
  /** Clock in milliseconds. Defaults to Date.now. */
  now?: () => number;
}

interface PendingCall {
  requestId: number;
  deadline: number;
  timeoutMs: number;
  resolve: (payload: Uint8Array) => void;
  reject: (error: RpcError) => void;
}

const MAX_REQUEST_ID = 0xffff_ffff;
// Largest delay setTimeout honours.
const MAX_TIMEOUT_MS = 0x7fff_ffff;

/**
 * Pending outbound calls keyed by request id.
 *
 * Every call ends exactly once: the first of resolve, expiry and failAll
 * wins. Finished ids are kept in a grace list so a late response can never
 * be matched to a newer call that reused the id.
 */
export class CallTable {
  private readonly pending = new Map<number, PendingCall>();
  // id -> end of grace. Insertion order is expiry order since graceMs is fixed.
  private readonly grace = new Map<number, number>();
  /** Most recently issued id; the next one follows it, wrapping to 1. */
  protected lastId = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timerDeadline = Infinity;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly options: CallTableOptions) {
    this.log = options.logger ?? createLogger().child("calls");
    this.now = options.now ?? (() => Date.now());
  }

  /** Calls currently waiting for a response. */
  get size(): number {
    return this.pending.size;
  }

  has(requestId: number): boolean {
    return this.pending.has(requestId);
  }

  /**
   * Allocate a request id and start waiting for its response.
   *
   * @throws RangeError if timeoutMs is not an integer in [1, 2147483647]
   * @throws RpcError (overloaded) when maxPendingCalls calls are outstanding
   */
  issue(timeoutMs?: number): IssuedCall {
    if (
      timeoutMs !== undefined &&
      (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMEOUT_MS)
    ) {
      throw new RangeError(
        `call timeout must be an integer in [1, ${MAX_TIMEOUT_MS}] ms, got ${timeoutMs}`,
      );
    }
    const now = this.now();
    this.expireDue(now);

    if (this.pending.size >= this.options.maxPendingCalls) {
      throw RpcError.overloaded(this.options.maxPendingCalls);
    }

    const requestId = this.nextId(now);
    const timeout = timeoutMs ?? this.options.callTimeoutMs;
    const response = new Promise<Uint8Array>((resolve, reject) => {
      this.pending.set(requestId, {
        requestId,
        deadline: now + timeout,
        timeoutMs: timeout,
        resolve,
        reject,
      });
    });
    this.armTimer(now);
    return { requestId, response };
  }

  /**
   * Complete the call waiting on `requestId`.
   *
   * @returns false if no such call is pending (stale or unknown id)
   */
  resolve(requestId: number, resolution: CallResolution): boolean {
    const call = this.pending.get(requestId);
    if (!call) {
      this.log.debug("discarding response for unknown request", {
        requestId,
        reserved: this.grace.has(requestId),
      });
      return false;
    }

    this.pending.delete(requestId);
    this.reserve(requestId, this.now());
    if (this.pending.size === 0) {
      this.clearTimer();
    }
    if (resolution.ok) {
      call.resolve(resolution.payload);
    } else {
      call.reject(resolution.error);
    }
    return true;
  }

  /**
   * Fail every call whose deadline is at or before `now` with a timeout.
   *
   * @returns the expired request ids
   */
  expireDue(now: number = this.now()): number[] {
    const expired: PendingCall[] = [];
    for (const call of this.pending.values()) {
      if (call.deadline <= now) {
        expired.push(call);
      }
    }

    for (const call of expired) {
      this.pending.delete(call.requestId);
      this.reserve(call.requestId, now);
      this.log.debug("request timed out", {
        requestId: call.requestId,
        timeoutMs: call.timeoutMs,
      });
      call.reject(RpcError.timeout(call.requestId, call.timeoutMs));
    }

    if (expired.length > 0) {
      this.armTimer(now);
    }
    return expired.map((call) => call.requestId);
  }

  /** Fail every pending call, e.g. because the session closed. */
  failAll(error: RpcError): void {
    this.clearTimer();
    const calls = [...this.pending.values()];
    this.pending.clear();
    if (calls.length > 0) {
      this.log.debug("failing pending requests", { count: calls.length, reason: error.message });
    }
    for (const call of calls) {
      call.reject(error);
    }
  }

  private nextId(now: number): number {
    this.pruneGrace(now);
    for (let attempts = 0; attempts < MAX_REQUEST_ID; attempts++) {
      this.lastId = this.lastId >= MAX_REQUEST_ID ? 1 : this.lastId + 1;
      if (!this.pending.has(this.lastId) && !this.grace.has(this.lastId)) {
        return this.lastId;
      }
    }
    throw RpcError.overloaded(this.options.maxPendingCalls);
  }

  private reserve(requestId: number, now: number): void {
    this.grace.delete(requestId);
    this.grace.set(requestId, now + this.options.graceMs);
  }

  private pruneGrace(now: number): void {
    for (const [requestId, until] of this.grace) {
      if (until > now) break;
      this.grace.delete(requestId);
    }
  }

  // One timer, armed for the earliest deadline.
  private armTimer(now: number): void {
    let earliest = Infinity;
    for (const call of this.pending.values()) {
      earliest = Math.min(earliest, call.deadline);
    }

    if (earliest === Infinity) {
      this.clearTimer();
      return;
    }
    if (this.timer !== null && this.timerDeadline <= earliest) {
      return;
    }

    this.clearTimer();
    this.timerDeadline = earliest;
    this.timer = setTimeout(
      () => {
        this.timer = null;
        this.timerDeadline = Infinity;
        this.expireDue();
        this.armTimer(this.now());
      },
      Math.max(0, earliest - now),
    );
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
      this.timerDeadline = Infinity;
    }
  }
}
