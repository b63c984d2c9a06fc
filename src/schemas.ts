/**
 * Who may see a feedback message. Messages without a permission are
 * visible to everyone.
 */
export type Permission = "student" | "staff" | "zeus";

export const PERMISSIONS: readonly Permission[] = ["student", "staff", "zeus"];

// How the grading harness renders a message description.
// "text" is assumed when no format is given.
export type MessageFormat =
  | "text"
  | "code"
  | "markdown"
  | "html"
  | (string & {});

export const DEFAULT_MESSAGE_FORMAT = "text";

/**
 * A single piece of feedback attached to an evaluation result.
 */
export interface Message {
  /**
   * The feedback text.
   */
  description: string;
  format?: MessageFormat;
  permission?: Permission;
}

/**
 * The outcome of comparing a submitted answer to an expected answer.
 */
export interface EvaluationResult {
  /**
   * Whether the actual value is accepted.
   */
  result: boolean;
  /**
   * The expected value, as shown to the student.
   */
  readableExpected?: string;
  /**
   * The actual value, as shown to the student.
   */
  readableActual?: string;
  /**
   * Feedback messages, in display order.
   */
  messages: Message[];
}

export type EvaluationStatus = "correct" | "wrong" | "internal error";

/**
 * An evaluation result together with the bookkeeping of the call that
 * produced it.
 */
export interface EvaluationRecord {
  // v4 UUID of this evaluation
  id: string;
  // Name of the evaluator that ran
  evaluator: string;
  // The value handed to the evaluator
  actual: string;
  status: EvaluationStatus;
  evaluation: EvaluationResult;
  durationMs: number;
}

export interface EvaluationSummary {
  total: number;
  correct: number;
  wrong: number;
  internalErrors: number;
  accuracy: number;
}

/**
 * Evaluated result as the grading harness reads it.
 */
export interface WireMessage {
  description: string;
  format: string;
  permission: Permission | null;
}

export interface WireEvaluationResult {
  result: boolean;
  readable_expected: string | null;
  readable_actual: string | null;
  messages: WireMessage[];
}
