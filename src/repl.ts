import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { safeEvaluate } from "./evaluate";
import type { EvaluateOptions, Evaluation, Rng } from "./types";

export const PROMPT = "What would you like to roll?\n";

export type ReplOptions = {
  input: Readable;
  output: Writable;
  rng?: Rng;
};

export type CliArgs = {
  seed?: string;
  help: boolean;
  expression: string;
};

export const USAGE = `Usage: dice-trace [--seed <seed>] [expression...]

Rolls a dice expression such as 2d6+3-1d4. Without an expression,
reads expressions line by line until an empty line.
`;

export function formatEvaluation(result: Evaluation): string {
  return `${result.rendered} = ${result.total}`;
}

/**
 * Reply for one input line, or `undefined` when the line is blank and the
 * session should end.
 */
export function respond(
  line: string,
  options: EvaluateOptions = {}
): string | undefined {
  if (line.trim() === "") return undefined;

  const result = safeEvaluate(line, options);
  if (!result.ok) return `Error: ${result.error.message}\n\n`;
  return `${formatEvaluation(result.value)}\n\n`;
}

export async function runRepl({ input, output, rng }: ReplOptions): Promise<void> {
  const lines = createInterface({ input, terminal: false, crlfDelay: Infinity });

  try {
    output.write(PROMPT);
    for await (const line of lines) {
      const reply = respond(line, { rng });
      if (reply === undefined) break;
      output.write(reply + PROMPT);
    }
  } finally {
    lines.close();
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const words: string[] = [];
  let seed: string | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      help = true;
    } else if (arg === "--seed") {
      const value = argv[i + 1];
      if (value === undefined) throw new Error("--seed requires a value");
      seed = value;
      i++;
    } else if (arg.startsWith("--seed=")) {
      seed = arg.slice("--seed=".length);
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      words.push(arg);
    }
  }

  return { seed, help, expression: words.join(" ") };
}
