// Evaluation methods
export { evaluate, ECHO_EXPECTED, ECHO_FEEDBACK } from "./echo_evaluator.js";
export {
  DynamicEvaluator,
  runEvaluator,
  toEvaluator,
  internalErrorResult,
  INTERNAL_ERROR_STUDENT_MESSAGE,
  type Evaluator,
  type EvaluatorFunction,
  type EvaluatorLike,
  type EvaluateCallOptions,
  type RunEvaluatorOptions,
} from "./evaluator.js";
export {
  createMessage,
  createResult,
  isEvaluationResult,
  isMessage,
  isPermission,
} from "./result.js";
export { EvaluatorRegistry, defaultRegistry } from "./registry.js";
export { evaluateAll, summarize, type EvaluateAllOptions } from "./runner.js";
export { toWire, fromWire, serializeResult, parseResult } from "./wire.js";
