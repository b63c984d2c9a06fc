import {
  afterEach,
  beforeEach,
  describe,
  expect,
  jest,
  test,
} from "@jest/globals";
import {
  INTERNAL_ERROR_STUDENT_MESSAGE,
  runEvaluator,
  toEvaluator,
} from "../evaluation/evaluator.js";
import { evaluate as evaluateEcho } from "../evaluation/echo_evaluator.js";
import { createResult } from "../evaluation/result.js";
import type { EvaluationResult } from "../schemas.js";
import { EvaluationAbortedError } from "../utils/error.js";

const UUID_V4_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe("runEvaluator", () => {
  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("wraps a sync evaluator into a record", async () => {
    const evaluator = runEvaluator(evaluateEcho, { name: "echo" });
    const record = await evaluator.evaluate("correct");

    expect(record.id).toMatch(UUID_V4_REGEX);
    expect(record.evaluator).toBe("echo");
    expect(record.actual).toBe("correct");
    expect(record.status).toBe("correct");
    expect(record.evaluation).toEqual(evaluateEcho("correct"));
    expect(record.durationMs).toBeGreaterThanOrEqual(0);
  });

  test("wrong answers get the wrong status", async () => {
    const record = await runEvaluator(evaluateEcho).evaluate("nope");
    expect(record.status).toBe("wrong");
    expect(record.evaluation.result).toBe(false);
  });

  test("awaits async evaluators", async () => {
    const evaluator = runEvaluator(async (actual: string) =>
      createResult(actual.length > 3)
    );
    const record = await evaluator.evaluate("long enough");
    expect(record.status).toBe("correct");
    expect(record.evaluation).toEqual({ result: true, messages: [] });
  });

  test("takes the name from the function when none is given", async () => {
    function lengthCheck(actual: string): EvaluationResult {
      return createResult(actual.length === 0);
    }
    expect(runEvaluator(lengthCheck).name).toBe("lengthCheck");
    expect(runEvaluator(lengthCheck, { name: "empty" }).name).toBe("empty");
  });

  test("ids differ between calls", async () => {
    const evaluator = runEvaluator(evaluateEcho);
    const first = await evaluator.evaluate("correct");
    const second = await evaluator.evaluate("correct");
    expect(first.id).not.toBe(second.id);
  });

  test("a thrown error becomes an internal error record", async () => {
    const evaluator = runEvaluator(
      () => {
        throw new Error("expected value file is missing");
      },
      { name: "broken" }
    );

    const record = await evaluator.evaluate("42");

    expect(record.status).toBe("internal error");
    expect(record.evaluation).toEqual({
      result: false,
      readableActual: "42",
      messages: [
        {
          description: "expected value file is missing",
          format: "text",
          permission: "staff",
        },
        { description: INTERNAL_ERROR_STUDENT_MESSAGE },
      ],
    });
    expect(console.error).toHaveBeenCalledWith(
      `Error running evaluator broken on evaluation ${record.id}: Error: expected value file is missing`
    );
  });

  test("a rejected promise becomes an internal error record", async () => {
    const evaluator = runEvaluator(() => Promise.reject(new Error("timeout")));
    const record = await evaluator.evaluate("x");
    expect(record.status).toBe("internal error");
    expect(record.evaluation.messages[0].description).toBe("timeout");
  });

  test("a non-result return becomes an internal error", async () => {
    const notAnEvaluator = (): EvaluationResult => JSON.parse('{"score": 1}');
    const record = await runEvaluator(notAnEvaluator, {
      name: "scorer",
    }).evaluate("x");

    expect(record.status).toBe("internal error");
    expect(record.evaluation.messages[0]).toEqual({
      description:
        'Evaluator "scorer" must return an evaluation result, got an object.',
      format: "text",
      permission: "staff",
    });
  });

  test("logs timing when JUDGE_DEBUG is on", async () => {
    const debug = jest
      .spyOn(console, "debug")
      .mockImplementation(() => undefined);
    process.env.JUDGE_DEBUG = "true";
    try {
      const record = await runEvaluator(evaluateEcho, {
        name: "echo",
      }).evaluate("correct");
      expect(debug).toHaveBeenCalledWith(
        `[echo] evaluation ${record.id} finished as "correct" in ${record.durationMs}ms`
      );
    } finally {
      delete process.env.JUDGE_DEBUG;
    }
  });

  test("rejects when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const evaluator = runEvaluator(evaluateEcho);

    await expect(
      evaluator.evaluate("correct", { signal: controller.signal })
    ).rejects.toBeInstanceOf(EvaluationAbortedError);
  });
});

describe("toEvaluator", () => {
  test("returns evaluator objects unchanged", () => {
    const evaluator = runEvaluator(evaluateEcho, { name: "echo" });
    expect(toEvaluator(evaluator, "other")).toBe(evaluator);
  });

  test("wraps functions under the given name", () => {
    expect(toEvaluator(evaluateEcho, "echo").name).toBe("echo");
  });
});
