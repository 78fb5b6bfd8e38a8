import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RpcError } from "@hasten/wire";
import { CallTable } from "./call_table.ts";

const bytes = (...values: number[]) => Uint8Array.from(values);

// Resolves to the payload or the error, so no rejection goes unhandled.
function settle(response: Promise<Uint8Array>): Promise<Uint8Array | unknown> {
  return response.catch((e: unknown) => e);
}

function table(overrides: Partial<ConstructorParameters<typeof CallTable>[0]> = {}): CallTable {
  return new CallTable({ callTimeoutMs: 1000, maxPendingCalls: 4, graceMs: 2000, ...overrides });
}

class JumpingCallTable extends CallTable {
  jumpTo(requestId: number): void {
    this.lastId = requestId;
  }
}

describe("CallTable", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("allocates increasing request ids starting at 1", () => {
    const calls = table();
    const first = calls.issue();
    const second = calls.issue();
    const outcomes = [settle(first.response), settle(second.response)];
    expect(first.requestId).toBe(1);
    expect(second.requestId).toBe(2);
    expect(calls.size).toBe(2);
    calls.failAll(RpcError.sessionClosed());
    return Promise.all(outcomes);
  });

  it("resolves a call exactly once", async () => {
    const calls = table();
    const { requestId, response } = calls.issue();

    expect(calls.resolve(requestId, { ok: true, payload: bytes(7) })).toBe(true);
    expect(calls.resolve(requestId, { ok: true, payload: bytes(8) })).toBe(false);
    await expect(response).resolves.toEqual(bytes(7));
    expect(calls.size).toBe(0);
    expect(calls.has(requestId)).toBe(false);
  });

  it("rejects with the RpcError carried by a failed resolution", async () => {
    const calls = table();
    const { requestId, response } = calls.issue();
    const error = RpcError.handlerFailure(3, "nope");

    calls.resolve(requestId, { ok: false, error });
    await expect(response).rejects.toBe(error);
  });

  it("ignores responses for ids it never issued", () => {
    const calls = table();
    expect(calls.resolve(99, { ok: true, payload: bytes() })).toBe(false);
  });

  it("times out a call at its deadline", async () => {
    const calls = table();
    const { requestId, response } = calls.issue();
    const outcome = settle(response);

    vi.advanceTimersByTime(999);
    expect(calls.has(requestId)).toBe(true);
    vi.advanceTimersByTime(1);

    const error = await outcome;
    expect(error).toBeInstanceOf(RpcError);
    expect(error).toMatchObject({ kind: "timeout", message: "request 1 timed out after 1000ms" });
    expect(calls.size).toBe(0);
    // A response after the deadline changes nothing.
    expect(calls.resolve(requestId, { ok: true, payload: bytes(1) })).toBe(false);
  });

  it("honours a per-call timeout", async () => {
    const calls = table();
    const slow = calls.issue();
    const fast = calls.issue(50);
    const slowOutcome = settle(slow.response);
    const fastOutcome = settle(fast.response);

    vi.advanceTimersByTime(50);
    await expect(fastOutcome).resolves.toMatchObject({
      kind: "timeout",
      message: "request 2 timed out after 50ms",
    });
    expect(calls.has(slow.requestId)).toBe(true);

    calls.resolve(slow.requestId, { ok: true, payload: bytes(2) });
    await expect(slowOutcome).resolves.toEqual(bytes(2));
  });

  it("expires due calls when a new one is issued", async () => {
    let now = 0;
    const calls = table({ now: () => now });
    const first = calls.issue(10);
    const outcome = settle(first.response);

    now = 10;
    const second = calls.issue();
    await expect(outcome).resolves.toMatchObject({ kind: "timeout" });
    expect(calls.size).toBe(1);

    calls.resolve(second.requestId, { ok: true, payload: bytes() });
  });

  it("rejects per-call timeouts that are not a positive 31-bit integer", () => {
    const calls = table();
    for (const timeoutMs of [Number.NaN, 0, -5, 1.5, 0x8000_0000, Infinity]) {
      expect(() => calls.issue(timeoutMs)).toThrow(RangeError);
    }
    expect(() => calls.issue(Number.NaN)).toThrow(
      "call timeout must be an integer in [1, 2147483647] ms, got NaN",
    );
    expect(calls.size).toBe(0);
    expect(vi.getTimerCount()).toBe(0);

    const longest = calls.issue(0x7fff_ffff);
    const outcome = settle(longest.response);
    expect(longest.requestId).toBe(1);
    calls.failAll(RpcError.sessionClosed());
    return outcome;
  });

  it("wraps ids after 0xffffffff and skips ids pending or in their grace window", async () => {
    let now = 0;
    const calls = new JumpingCallTable({
      callTimeoutMs: 1000,
      maxPendingCalls: 4,
      graceMs: 100,
      now: () => now,
    });
    const pending = calls.issue();
    const finished = calls.issue();
    expect([pending.requestId, finished.requestId]).toEqual([1, 2]);
    calls.resolve(finished.requestId, { ok: true, payload: bytes() });

    calls.jumpTo(0xffff_fffe);
    const last = calls.issue();
    const wrapped = calls.issue();
    expect(last.requestId).toBe(0xffff_ffff);
    expect(wrapped.requestId).toBe(3);
    // A late response for the reserved id matches nothing.
    expect(calls.resolve(2, { ok: true, payload: bytes(9) })).toBe(false);

    now = 100;
    calls.jumpTo(0xffff_ffff);
    const reused = calls.issue();
    expect(reused.requestId).toBe(2);

    const outcomes = [pending, last, wrapped, reused].map((c) => settle(c.response));
    calls.failAll(RpcError.sessionClosed());
    for (const outcome of outcomes) {
      await expect(outcome).resolves.toBeInstanceOf(RpcError);
    }
  });

  it("refuses calls beyond maxPendingCalls", () => {
    const calls = table({ maxPendingCalls: 2 });
    const first = calls.issue();
    const second = calls.issue();
    const secondOutcome = settle(second.response);

    expect(() => calls.issue()).toThrow(RpcError);
    expect(() => calls.issue()).toThrow("2 calls already pending");

    calls.resolve(first.requestId, { ok: true, payload: bytes() });
    const third = calls.issue();
    expect(third.requestId).toBe(3);

    const thirdOutcome = settle(third.response);
    calls.failAll(RpcError.sessionClosed());
    return Promise.all([secondOutcome, thirdOutcome]);
  });

  it("fails every pending call with the given error", async () => {
    const calls = table();
    const outcomes = [calls.issue(), calls.issue(), calls.issue()].map((c) => settle(c.response));
    const error = RpcError.sessionClosed("end of stream");

    calls.failAll(error);
    expect(calls.size).toBe(0);
    for (const outcome of outcomes) {
      await expect(outcome).resolves.toBe(error);
    }
  });

  it("keeps no timer armed once nothing is pending", () => {
    const calls = table();
    const { requestId } = calls.issue();
    expect(vi.getTimerCount()).toBe(1);

    calls.resolve(requestId, { ok: true, payload: bytes() });
    expect(vi.getTimerCount()).toBe(0);
  });

  it("arms a single timer for the earliest deadline", async () => {
    const calls = table();
    const late = calls.issue(500);
    const early = calls.issue(100);
    const lateOutcome = settle(late.response);
    const earlyOutcome = settle(early.response);
    expect(vi.getTimerCount()).toBe(1);

    vi.advanceTimersByTime(100);
    await expect(earlyOutcome).resolves.toMatchObject({ kind: "timeout" });
    expect(calls.has(late.requestId)).toBe(true);

    vi.advanceTimersByTime(400);
    await expect(lateOutcome).resolves.toMatchObject({ kind: "timeout" });
    expect(vi.getTimerCount()).toBe(0);
  });
});
