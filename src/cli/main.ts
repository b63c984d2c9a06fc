#!/usr/bin/env node
import { Command } from "commander";

import type { Evaluator } from "../evaluation/evaluator.js";
import { defaultRegistry, EvaluatorRegistry } from "../evaluation/registry.js";
import { serializeResult } from "../evaluation/wire.js";
import { __version__ } from "../index.js";
import { getDefaultEvaluatorName } from "../utils/env.js";
import { isUnknownEvaluatorError } from "../utils/error.js";

export const EXIT_INTERNAL_ERROR = 1;
export const EXIT_UNKNOWN_EVALUATOR = 2;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readStdin: () => Promise<string>;
  setExitCode: (code: number) => void;
}

async function readProcessStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readStdin: readProcessStdin,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

interface EvaluateOptions {
  evaluator: string;
  pretty?: boolean;
  record?: boolean;
}

export function createProgram(
  fields: { io?: CliIO; registry?: EvaluatorRegistry } = {}
): Command {
  const io = fields.io ?? processIO;
  const registry = fields.registry ?? defaultRegistry();

  const evaluateCommand = new Command("evaluate")
    .description("Evaluate an answer and print the evaluated result as JSON")
    .argument(
      "[actual]",
      "The answer to evaluate. Read from standard input when omitted."
    )
    .option(
      "-e, --evaluator <name>",
      "Which registered evaluator to use",
      getDefaultEvaluatorName()
    )
    .option("--pretty", "Indent the JSON output")
    .option(
      "--record",
      "Print the full evaluation record instead of the evaluated result"
    )
    .action(async (actual: string | undefined, opts: EvaluateOptions) => {
      let evaluator: Evaluator;
      try {
        evaluator = registry.get(opts.evaluator);
      } catch (e) {
        if (isUnknownEvaluatorError(e)) {
          io.stderr(`${e.message}\n`);
          io.setExitCode(EXIT_UNKNOWN_EVALUATOR);
          return;
        }
        throw e;
      }

      // Only the newline a shell pipe appends is dropped.
      const value = actual ?? (await io.readStdin()).replace(/\r?\n$/, "");
      const record = await evaluator.evaluate(value);
      const indent = opts.pretty ? 2 : undefined;
      io.stdout(
        (opts.record
          ? JSON.stringify(record, null, indent)
          : serializeResult(record.evaluation, { pretty: opts.pretty })) +
          "\n"
      );
      if (record.status === "internal error") {
        io.setExitCode(EXIT_INTERNAL_ERROR);
      }
    });

  const listCommand = new Command("list")
    .description("List the registered evaluators")
    .action(() => {
      for (const name of registry.names()) {
        io.stdout(`${name}\n`);
      }
    });

  return new Command("exercise-judge")
    .description("Evaluate exercise answers")
    .version(__version__)
    .addCommand(evaluateCommand)
    .addCommand(listCommand);
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error(e);
      process.exitCode = EXIT_INTERNAL_ERROR;
    });
}
