/**
 * @module tracing
 * @description Opt-in instrumentation for algorithm calls. The algorithms stay
 * free of logging; wrap the predicate with `countCalls` and the call with
 * `traced` when you want to see how much work a search did.
 *
 * @example
 * ```typescript
 * const { logger } = loggerFactory({ level: "debug" });
 * const counted = countCalls((a: number, b: number) => a < b);
 * const hit = traced(logger, "lowerBound", () =>
 *   lowerBound(first, last, 42, counted.fn), counted);
 * // debug: "lowerBound completed" { algorithm, elapsedMs, calls }
 * ```
 *
 * @since 2026-10-19
 */

import type { BaseLogger } from "@rangewise/logger";

export interface CallCounter<F> {
  /** Drop-in replacement for the wrapped function. */
  readonly fn: F;
  calls(): number;
  reset(): void;
}

/**
 * Wrap a predicate or comparator so its invocations are counted.
 */
export const countCalls = <Args extends unknown[], R>(
  fn: (...args: Args) => R,
): CallCounter<(...args: Args) => R> => {
  let count = 0;
  return {
    fn: (...args: Args) => {
      count++;
      return fn(...args);
    },
    calls: () => count,
    reset: () => {
      count = 0;
    },
  };
};

/**
 * Run one algorithm call and log a debug record for it. Errors are logged at
 * error level and re-thrown unchanged.
 */
export const traced = <R,>(
  logger: Pick<BaseLogger, "debug" | "error">,
  algorithm: string,
  run: () => R,
  counter?: Pick<CallCounter<unknown>, "calls">,
): R => {
  const start = performance.now();
  const callsBefore = counter?.calls() ?? 0;
  try {
    const result = run();
    logger.debug(`${algorithm} completed`, {
      algorithm,
      elapsedMs: performance.now() - start,
      ...(counter ? { calls: counter.calls() - callsBefore } : {}),
    });
    return result;
  } catch (error) {
    logger.error(error instanceof Error ? error : String(error), {
      algorithm,
      elapsedMs: performance.now() - start,
    });
    throw error;
  }
};
