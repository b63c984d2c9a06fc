import { warnOnce } from "./warn.js";

export const DEFAULT_EVALUATOR_NAME = "echo";

export function getEnvironmentVariable(name: string): string | undefined {
  try {
    return typeof process !== "undefined"
      ? // eslint-disable-next-line no-process-env
        process.env?.[name]
      : undefined;
  } catch {
    return undefined;
  }
}

export function getJudgeEnvironmentVariable(name: string): string | undefined {
  return getEnvironmentVariable(`JUDGE_${name}`);
}

export function getDefaultEvaluatorName(): string {
  const name = getJudgeEnvironmentVariable("EVALUATOR")?.trim();
  return name ? name : DEFAULT_EVALUATOR_NAME;
}

/**
 * Default concurrency for batch evaluation. 0 means sequential.
 */
export function getDefaultMaxConcurrency(): number {
  const raw = getJudgeEnvironmentVariable("MAX_CONCURRENCY");
  if (raw === undefined || raw.trim() === "") {
    return 0;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    warnOnce(
      `Ignoring JUDGE_MAX_CONCURRENCY="${raw}": ` +
        "expected a non-negative integer."
    );
    return 0;
  }
  return parsed;
}

export function getDebugEnabled(): boolean {
  return getJudgeEnvironmentVariable("DEBUG") === "true";
}
