import type { EvaluationRecord, EvaluationSummary } from "../schemas.js";
import { AsyncCaller, raceWithSignal } from "../utils/async_caller.js";
import { getDefaultMaxConcurrency } from "../utils/env.js";
import { EvaluationAbortedError } from "../utils/error.js";
import {
  EvaluateCallOptions,
  EvaluatorLike,
  toEvaluator,
} from "./evaluator.js";

export interface EvaluateAllOptions {
  /**
   * How many evaluations may run at once. 0 runs them one after another.
   * Defaults to JUDGE_MAX_CONCURRENCY, or 0 when unset.
   */
  maxConcurrency?: number;
  signal?: AbortSignal;
}

/**
 * Evaluates every actual value with the same evaluator. Records come back
 * in input order regardless of completion order.
 */
export async function evaluateAll(
  evaluator: EvaluatorLike,
  actuals: Iterable<string>,
  options: EvaluateAllOptions = {}
): Promise<EvaluationRecord[]> {
  const target = toEvaluator(evaluator);
  const maxConcurrency = options.maxConcurrency ?? getDefaultMaxConcurrency();
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 0) {
    throw new RangeError(
      `maxConcurrency must be a non-negative integer, got ${maxConcurrency}`
    );
  }
  const callOptions: EvaluateCallOptions = options.signal
    ? { signal: options.signal }
    : {};

  if (maxConcurrency === 0) {
    const records: EvaluationRecord[] = [];
    for (const actual of actuals) {
      records.push(await target.evaluate(actual, callOptions));
    }
    return records;
  }

  if (options.signal?.aborted) {
    throw new EvaluationAbortedError();
  }

  // Queued evaluations check the signal when they start, so one listener
  // for the whole batch is enough to reject early.
  const caller = new AsyncCaller({ maxConcurrency });
  const futures: Promise<EvaluationRecord>[] = [];
  for (const actual of actuals) {
    futures.push(
      caller.call(
        (value: string) => target.evaluate(value, callOptions),
        actual
      )
    );
  }
  return raceWithSignal(Promise.all(futures), options.signal);
}

export function summarize(records: EvaluationRecord[]): EvaluationSummary {
  const total = records.length;
  const correct = records.filter((r) => r.status === "correct").length;
  const wrong = records.filter((r) => r.status === "wrong").length;
  return {
    total,
    correct,
    wrong,
    internalErrors: total - correct - wrong,
    accuracy: total === 0 ? 0 : correct / total,
  };
}
