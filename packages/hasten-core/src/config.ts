// Runtime configuration.

import { DEFAULT_MAX_FRAME_SIZE, HEADER_TAIL_SIZE } from "@hasten/wire";

export interface RuntimeConfig {
  /** Largest accepted total_length in bytes. */
  maxFrameSize: number;
  /** Default deadline for outbound calls. */
  callTimeoutMs: number;
  /** Outbound calls allowed in flight before `call` fails with `overloaded`. */
  maxPendingCalls: number;
  /** Handlers allowed to run at once; further requests queue. */
  dispatchWorkerConcurrency: number;
  /** How long a finished request id stays reserved. */
  resolvedIdGraceMs: number;
  /** How long close() waits for queued writes and the Goodbye to drain. */
  closeTimeoutMs: number;
}

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_PENDING_CALLS = 1024;
export const DEFAULT_DISPATCH_CONCURRENCY = 16;
export const DEFAULT_CLOSE_TIMEOUT_MS = 1000;

export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    maxFrameSize: DEFAULT_MAX_FRAME_SIZE,
    callTimeoutMs: DEFAULT_CALL_TIMEOUT_MS,
    maxPendingCalls: DEFAULT_MAX_PENDING_CALLS,
    dispatchWorkerConcurrency: DEFAULT_DISPATCH_CONCURRENCY,
    resolvedIdGraceMs: 2 * DEFAULT_CALL_TIMEOUT_MS,
    closeTimeoutMs: DEFAULT_CLOSE_TIMEOUT_MS,
  };
}

function checkInteger(name: keyof RuntimeConfig, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

/**
 * Fill in defaults and validate.
 *
 * The grace window defaults to twice the resolved call timeout.
 *
 * @throws RangeError if a value is out of range
 */
export function resolveRuntimeConfig(partial: Partial<RuntimeConfig> = {}): RuntimeConfig {
  const defaults = defaultRuntimeConfig();
  const callTimeoutMs = partial.callTimeoutMs ?? defaults.callTimeoutMs;
  const config: RuntimeConfig = {
    maxFrameSize: partial.maxFrameSize ?? defaults.maxFrameSize,
    callTimeoutMs,
    maxPendingCalls: partial.maxPendingCalls ?? defaults.maxPendingCalls,
    dispatchWorkerConcurrency: partial.dispatchWorkerConcurrency ?? defaults.dispatchWorkerConcurrency,
    resolvedIdGraceMs: partial.resolvedIdGraceMs ?? 2 * callTimeoutMs,
    closeTimeoutMs: partial.closeTimeoutMs ?? defaults.closeTimeoutMs,
  };

  checkInteger("maxFrameSize", config.maxFrameSize, HEADER_TAIL_SIZE, 0xffff_ffff);
  checkInteger("callTimeoutMs", config.callTimeoutMs, 1, 0x7fff_ffff);
  checkInteger("maxPendingCalls", config.maxPendingCalls, 1, 0xffff_fffe);
  checkInteger("dispatchWorkerConcurrency", config.dispatchWorkerConcurrency, 1, 0xffff);
  checkInteger("resolvedIdGraceMs", config.resolvedIdGraceMs, 0, Number.MAX_SAFE_INTEGER);
  checkInteger("closeTimeoutMs", config.closeTimeoutMs, 0, 0x7fff_ffff);
  return config;
}

const ENV_KEYS: Array<[string, keyof RuntimeConfig]> = [
  ["HASTEN_MAX_FRAME_SIZE", "maxFrameSize"],
  ["HASTEN_CALL_TIMEOUT_MS", "callTimeoutMs"],
  ["HASTEN_MAX_PENDING_CALLS", "maxPendingCalls"],
  ["HASTEN_DISPATCH_CONCURRENCY", "dispatchWorkerConcurrency"],
  ["HASTEN_CLOSE_TIMEOUT_MS", "closeTimeoutMs"],
];

/**
 * Read overrides from the environment. Unset or empty variables are skipped.
 *
 * @example
 * ```typescript
 * const config = resolveRuntimeConfig({ ...runtimeConfigFromEnv(), callTimeoutMs: 5000 });
 * ```
 *
 * @throws RangeError if a variable is not a decimal integer
 */
export function runtimeConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): Partial<RuntimeConfig> {
  const partial: Partial<RuntimeConfig> = {};
  for (const [variable, key] of ENV_KEYS) {
    const raw = env[variable]?.trim();
    if (!raw) continue;
    if (!/^\d+$/.test(raw)) {
      throw new RangeError(`${variable} must be a non-negative integer, got "${raw}"`);
    }
    partial[key] = Number(raw);
  }
  return partial;
}
