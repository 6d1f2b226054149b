import type { Instrumentation } from "@locus-sdk/types";

/**
 * Times a unit of work and reports it under `name`, whether it succeeds or throws.
 *
 * @example
 * const rows = await timed(instrumentation, "orders.load", () => repository.load());
 */
export async function timed<T>(
  instrumentation: Instrumentation,
  name: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  const startTime = new Date();
  try {
    return await fn();
  } finally {
    instrumentation.report(name, startTime, new Date());
  }
}

/**
 * Times a whole enumeration, from the first pull until the source is
 * exhausted, fails, or the consumer stops early.
 */
export async function* timedIterable<T>(
  instrumentation: Instrumentation,
  name: string,
  source: () => AsyncIterable<T>,
): AsyncGenerator<T, void, undefined> {
  const startTime = new Date();
  try {
    yield* source();
  } finally {
    instrumentation.report(name, startTime, new Date());
  }
}

/** Counts a unit of work under `name` once it completes successfully. */
export async function counted<T>(
  instrumentation: Instrumentation,
  name: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  const result = await fn();
  instrumentation.increaseCounter(name, 1);
  return result;
}

/**
 * Wraps a function so every call is timed. The report is registered once, up front.
 * The report name defaults to the function's own name.
 */
export function instrumentTimer<A extends unknown[], R>(
  instrumentation: Instrumentation,
  fn: (...args: A) => R | Promise<R>,
  name: string = reportName(fn),
): (...args: A) => Promise<R> {
  instrumentation.registerReport(name);
  return (...args: A) => timed(instrumentation, name, () => fn(...args));
}

/** Wraps a function so every successful call increments a counter. */
export function instrumentCounter<A extends unknown[], R>(
  instrumentation: Instrumentation,
  fn: (...args: A) => R | Promise<R>,
  name: string = reportName(fn),
): (...args: A) => Promise<R> {
  instrumentation.registerCounter(name);
  return (...args: A) => counted(instrumentation, name, () => fn(...args));
}

function reportName(fn: { name: string }): string {
  return fn.name || "anonymous";
}
