import { v4 as uuidv4 } from "uuid";
import type {
  EvaluationRecord,
  EvaluationResult,
  EvaluationStatus,
} from "../schemas.js";
import { getDebugEnabled } from "../utils/env.js";
import {
  EvaluationAbortedError,
  getErrorMessage,
  printErrorStackTrace,
} from "../utils/error.js";
import { createMessage, createResult, isEvaluationResult } from "./result.js";

export const INTERNAL_ERROR_STUDENT_MESSAGE =
  "Your answer could not be evaluated. Please contact the course staff.";

/**
 * A plain evaluator function: takes the actual value, returns a verdict.
 */
export type EvaluatorFunction = (
  actual: string
) => EvaluationResult | Promise<EvaluationResult>;

export interface EvaluateCallOptions {
  signal?: AbortSignal;
}

export interface Evaluator {
  name: string;
  evaluate(
    actual: string,
    options?: EvaluateCallOptions
  ): Promise<EvaluationRecord>;
}

export type EvaluatorLike = Evaluator | EvaluatorFunction;

export interface RunEvaluatorOptions {
  name?: string;
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : typeof value;
}

export function internalErrorResult(
  actual: string,
  error: unknown
): EvaluationResult {
  return createResult(false, {
    readableActual: actual,
    messages: [
      createMessage(getErrorMessage(error), "text", "staff"),
      createMessage(INTERNAL_ERROR_STUDENT_MESSAGE),
    ],
  });
}

/**
 * Wraps an evaluator function + implements the Evaluator interface.
 */
export class DynamicEvaluator implements Evaluator {
  readonly name: string;

  func: EvaluatorFunction;

  constructor(func: EvaluatorFunction, options: RunEvaluatorOptions = {}) {
    this.func = func;
    this.name = options.name ?? (func.name || "evaluator");
  }

  /**
   * Evaluates one actual value. Errors thrown by the wrapped function, and
   * values that are not evaluation results, produce an "internal error"
   * record instead of a rejection.
   * @throws {EvaluationAbortedError} when `options.signal` is aborted
   */
  async evaluate(
    actual: string,
    options: EvaluateCallOptions = {}
  ): Promise<EvaluationRecord> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new EvaluationAbortedError();
    }

    const id = uuidv4();
    const started = Date.now();
    let evaluation: EvaluationResult;
    let status: EvaluationStatus;
    try {
      const output: unknown = await this.func(actual);
      if (!isEvaluationResult(output)) {
        const got = describeValue(output);
        throw new TypeError(
          `Evaluator "${this.name}" must return an evaluation result, ` +
            `got ${got}.`
        );
      }
      evaluation = output;
      status = output.result ? "correct" : "wrong";
    } catch (e) {
      console.error(
        `Error running evaluator ${this.name} on evaluation ${id}: ${e}`
      );
      printErrorStackTrace(e);
      evaluation = internalErrorResult(actual, e);
      status = "internal error";
    }

    if (signal?.aborted) {
      throw new EvaluationAbortedError();
    }

    const durationMs = Date.now() - started;
    if (getDebugEnabled()) {
      console.debug(
        `[${this.name}] evaluation ${id} finished as "${status}" ` +
          `in ${durationMs}ms`
      );
    }

    return {
      id,
      evaluator: this.name,
      actual,
      status,
      evaluation,
      durationMs,
    };
  }
}

export function runEvaluator(
  func: EvaluatorFunction,
  options?: RunEvaluatorOptions
): Evaluator {
  return new DynamicEvaluator(func, options);
}

export function toEvaluator(
  evaluator: EvaluatorLike,
  name?: string
): Evaluator {
  if (typeof evaluator === "function") {
    return runEvaluator(evaluator, name !== undefined ? { name } : {});
  }
  return evaluator;
}
