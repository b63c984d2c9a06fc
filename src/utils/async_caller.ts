import PQueue from "p-queue";
import { EvaluationAbortedError } from "./error.js";

export interface AsyncCallerParams {
  /**
   * The maximum number of concurrent calls that can be made.
   * Defaults to `Infinity`, which means no limit.
   */
  maxConcurrency?: number;
}

/**
 * Runs async calls through a queue that bounds how many of them are in
 * flight at once.
 *
 * Concurrent calls are limited by the `maxConcurrency` parameter, which
 * defaults to `Infinity`. Calls are not retried.
 */
export class AsyncCaller {
  protected maxConcurrency: number;

  queue: PQueue;

  constructor(params: AsyncCallerParams = {}) {
    this.maxConcurrency = params.maxConcurrency ?? Infinity;
    this.queue = new PQueue({ concurrency: this.maxConcurrency });
  }

  call<A extends unknown[], R>(
    callable: (...args: A) => Promise<R>,
    ...args: A
  ): Promise<R> {
    return this.queue.add(() => callable(...args));
  }
}

/**
 * Settles like `promise`, or rejects with `EvaluationAbortedError` as soon
 * as `signal` aborts. Adds at most one listener to the signal.
 */
export function raceWithSignal<T>(
  promise: Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new EvaluationAbortedError());
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(new EvaluationAbortedError());
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return Promise.race([promise, aborted]).finally(() => {
    if (onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  });
}
