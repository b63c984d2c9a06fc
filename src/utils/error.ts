function getErrorStackTrace(e: unknown) {
  if (typeof e !== "object" || e == null) return undefined;
  if (!("stack" in e) || typeof e.stack !== "string") return undefined;

  let stack = e.stack;

  const firstLine = `${e}`;
  if (stack.startsWith(firstLine)) {
    stack = stack.slice(firstLine.length);
  }

  if (stack.startsWith("\n")) {
    stack = stack.slice(1);
  }

  return stack;
}

export function printErrorStackTrace(e: unknown) {
  const stack = getErrorStackTrace(e);
  if (stack == null) return;
  console.error(stack);
}

export function getErrorMessage(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  return String(e);
}

/**
 * UnknownEvaluatorError
 *
 * Thrown when an evaluator is looked up by a name that was never
 * registered.
 *
 * @example
 * try {
 *   registry.get("echo-v2");
 * } catch (error) {
 *   if (isUnknownEvaluatorError(error)) {
 *     console.error(error.message);
 *   }
 * }
 */
export class UnknownEvaluatorError extends Error {
  readonly evaluatorName: string;

  constructor(evaluatorName: string, knownNames: string[]) {
    super(
      `Unknown evaluator "${evaluatorName}". Known evaluators: ${
        knownNames.length > 0 ? knownNames.join(", ") : "(none)"
      }`
    );
    this.name = "UnknownEvaluatorError";
    this.evaluatorName = evaluatorName;
  }
}

export function isUnknownEvaluatorError(
  error: unknown
): error is UnknownEvaluatorError {
  return (
    error != null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "UnknownEvaluatorError"
  );
}

/**
 * Raised when an evaluated result document does not have the shape the
 * grading harness expects. `path` points at the offending field, e.g.
 * `messages[0].permission`.
 */
export class InvalidWireFormatError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(path ? `Invalid evaluation result at ${path}: ${reason}` : reason);
    this.name = "InvalidWireFormatError";
    this.path = path;
  }
}

export function isInvalidWireFormatError(
  error: unknown
): error is InvalidWireFormatError {
  return (
    error != null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "InvalidWireFormatError"
  );
}

export class EvaluationAbortedError extends Error {
  constructor() {
    super("AbortError: evaluation was aborted");
    this.name = "EvaluationAbortedError";
  }
}

export function isEvaluationAbortedError(
  error: unknown
): error is EvaluationAbortedError {
  return (
    error != null &&
    typeof error === "object" &&
    "name" in error &&
    error.name === "EvaluationAbortedError"
  );
}
