import {
  DEFAULT_MESSAGE_FORMAT,
  EvaluationResult,
  Message,
  PERMISSIONS,
  Permission,
  WireEvaluationResult,
  WireMessage,
} from "../schemas.js";
import { isKVMap } from "../utils/asserts.js";
import { getErrorMessage, InvalidWireFormatError } from "../utils/error.js";
import { createMessage, createResult, isPermission } from "./result.js";

export function toWire(evaluation: EvaluationResult): WireEvaluationResult {
  return {
    result: evaluation.result,
    readable_expected: evaluation.readableExpected ?? null,
    readable_actual: evaluation.readableActual ?? null,
    messages: evaluation.messages.map(
      (message): WireMessage => ({
        description: message.description,
        format: message.format ?? DEFAULT_MESSAGE_FORMAT,
        permission: message.permission ?? null,
      })
    ),
  };
}

export function serializeResult(
  evaluation: EvaluationResult,
  options: { pretty?: boolean } = {}
): string {
  return JSON.stringify(
    toWire(evaluation),
    null,
    options.pretty ? 2 : undefined
  );
}

function readNullableString(
  row: Record<string, unknown>,
  key: string,
  path: string
): string | undefined {
  const value = row[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new InvalidWireFormatError(path, "expected a string or null");
  }
  return value;
}

function fromWireMessage(value: unknown, path: string): Message {
  if (!isKVMap(value)) {
    throw new InvalidWireFormatError(path, "expected an object");
  }
  const description = value.description;
  if (typeof description !== "string") {
    throw new InvalidWireFormatError(
      `${path}.description`,
      "expected a string"
    );
  }
  const format = readNullableString(value, "format", `${path}.format`);
  const rawPermission = value.permission;
  let permission: Permission | undefined;
  if (rawPermission !== undefined && rawPermission !== null) {
    if (!isPermission(rawPermission)) {
      throw new InvalidWireFormatError(
        `${path}.permission`,
        `expected one of ${PERMISSIONS.join(", ")} or null`
      );
    }
    permission = rawPermission;
  }
  return createMessage(description, format, permission);
}

export function fromWire(value: unknown): EvaluationResult {
  if (!isKVMap(value)) {
    throw new InvalidWireFormatError("", "Expected a JSON object");
  }
  const result = value.result;
  if (typeof result !== "boolean") {
    throw new InvalidWireFormatError("result", "expected a boolean");
  }
  const rawMessages = value.messages;
  if (!Array.isArray(rawMessages)) {
    throw new InvalidWireFormatError("messages", "expected an array");
  }
  const messages = rawMessages.map((message: unknown, i: number) =>
    fromWireMessage(message, `messages[${i}]`)
  );
  const readableExpected = readNullableString(
    value,
    "readable_expected",
    "readable_expected"
  );
  const readableActual = readNullableString(
    value,
    "readable_actual",
    "readable_actual"
  );
  return createResult(result, {
    readableExpected,
    readableActual,
    messages,
  });
}

export function parseResult(text: string): EvaluationResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new InvalidWireFormatError("", `Invalid JSON: ${getErrorMessage(e)}`);
  }
  return fromWire(parsed);
}
