import type {
  EvaluationResult,
  Message,
  MessageFormat,
  Permission,
} from "../schemas.js";
import { isKVMap, isOptionalString } from "../utils/asserts.js";

export const isPermission = (x: unknown): x is Permission =>
  x === "student" || x === "staff" || x === "zeus";

export function createMessage(
  description: string,
  format?: MessageFormat,
  permission?: Permission
): Message {
  const message: Message = { description };
  if (format !== undefined) {
    message.format = format;
  }
  if (permission !== undefined) {
    message.permission = permission;
  }
  return message;
}

export function createResult(
  result: boolean,
  fields: Partial<Omit<EvaluationResult, "result">> = {}
): EvaluationResult {
  const evaluation: EvaluationResult = {
    result,
    messages: fields.messages ?? [],
  };
  if (fields.readableExpected !== undefined) {
    evaluation.readableExpected = fields.readableExpected;
  }
  if (fields.readableActual !== undefined) {
    evaluation.readableActual = fields.readableActual;
  }
  return evaluation;
}

export function isMessage(x: unknown): x is Message {
  return (
    isKVMap(x) &&
    typeof x.description === "string" &&
    isOptionalString(x.format) &&
    (x.permission === undefined || isPermission(x.permission))
  );
}

// Check the shape, since results may come from evaluator code we don't control
export function isEvaluationResult(x: unknown): x is EvaluationResult {
  return (
    isKVMap(x) &&
    typeof x.result === "boolean" &&
    isOptionalString(x.readableExpected) &&
    isOptionalString(x.readableActual) &&
    Array.isArray(x.messages) &&
    x.messages.every(isMessage)
  );
}
