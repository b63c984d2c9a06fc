import type { EvaluationResult } from "../schemas.js";
import { createMessage, createResult } from "./result.js";

export const ECHO_EXPECTED = "correct";
export const ECHO_FEEDBACK = "Hallo";

/**
 * Accepts exactly the string "correct" (case-sensitive, no trimming) and
 * always attaches one feedback message.
 */
export function evaluate(actual: string): EvaluationResult {
  return createResult(actual === ECHO_EXPECTED, {
    readableExpected: ECHO_EXPECTED,
    readableActual: actual,
    messages: [createMessage(ECHO_FEEDBACK)],
  });
}
