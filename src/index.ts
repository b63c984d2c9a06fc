export * from "./evaluation/index.js";

export type {
  EvaluationRecord,
  EvaluationResult,
  EvaluationStatus,
  EvaluationSummary,
  Message,
  MessageFormat,
  Permission,
  WireEvaluationResult,
  WireMessage,
} from "./schemas.js";

export {
  UnknownEvaluatorError,
  InvalidWireFormatError,
  EvaluationAbortedError,
  isUnknownEvaluatorError,
  isInvalidWireFormatError,
  isEvaluationAbortedError,
} from "./utils/error.js";

export const __version__ = "0.1.0";
