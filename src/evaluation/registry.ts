import { UnknownEvaluatorError } from "../utils/error.js";
import { warnOnce } from "../utils/warn.js";
import { evaluate as evaluateEcho } from "./echo_evaluator.js";
import { Evaluator, EvaluatorLike, toEvaluator } from "./evaluator.js";

/**
 * Name to evaluator lookup used by the command line and by harness code
 * that selects evaluators from configuration.
 */
export class EvaluatorRegistry {
  private evaluators = new Map<string, Evaluator>();

  register(name: string, evaluator: EvaluatorLike): this {
    if (this.evaluators.has(name)) {
      warnOnce(`Evaluator "${name}" was registered twice; using the latest.`);
    }
    this.evaluators.set(name, toEvaluator(evaluator, name));
    return this;
  }

  has(name: string): boolean {
    return this.evaluators.has(name);
  }

  get(name: string): Evaluator {
    const evaluator = this.evaluators.get(name);
    if (evaluator === undefined) {
      throw new UnknownEvaluatorError(name, this.names());
    }
    return evaluator;
  }

  names(): string[] {
    return [...this.evaluators.keys()].sort();
  }
}

export function defaultRegistry(): EvaluatorRegistry {
  return new EvaluatorRegistry().register("echo", evaluateEcho);
}
