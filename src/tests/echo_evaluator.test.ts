import { describe, expect, test } from "@jest/globals";
import { evaluate } from "../evaluation/echo_evaluator.js";

describe("echo evaluator", () => {
  test("accepts the exact expected answer", () => {
    expect(evaluate("correct")).toEqual({
      result: true,
      readableExpected: "correct",
      readableActual: "correct",
      messages: [{ description: "Hallo" }],
    });
  });

  test("rejects a different answer", () => {
    expect(evaluate("incorrect")).toEqual({
      result: false,
      readableExpected: "correct",
      readableActual: "incorrect",
      messages: [{ description: "Hallo" }],
    });
  });

  test("rejects the empty string", () => {
    const evaluation = evaluate("");
    expect(evaluation.result).toBe(false);
    expect(evaluation.readableActual).toBe("");
  });

  test.each(["Correct", "CORRECT", "correct ", " correct", "correct\n"])(
    "comparison is exact for %j",
    (actual) => {
      const evaluation = evaluate(actual);
      expect(evaluation.result).toBe(false);
      expect(evaluation.readableActual).toBe(actual);
    }
  );

  test("the message has no format or permission", () => {
    const [message] = evaluate("anything").messages;
    expect(Object.keys(message)).toEqual(["description"]);
    expect(message.format).toBeUndefined();
    expect(message.permission).toBeUndefined();
  });

  test("every call builds a new result", () => {
    const first = evaluate("correct");
    const second = evaluate("correct");
    expect(first).not.toBe(second);
    expect(first.messages).not.toBe(second.messages);
    expect(first).toEqual(second);
  });
});
