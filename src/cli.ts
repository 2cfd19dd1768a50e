#!/usr/bin/env node

// Usage:
//   dice-trace                     - interactive session
//   dice-trace 2d6+3               - roll once and exit
//   dice-trace --seed abc 4d6      - reproducible roll

import { safeEvaluate } from "./evaluate";
import { formatEvaluation, parseCliArgs, runRepl, USAGE } from "./repl";
import { createRng } from "./rng";

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.help) {
    console.log(USAGE);
    return;
  }

  const rng = args.seed === undefined ? undefined : createRng(args.seed);

  if (args.expression.trim() === "") {
    await runRepl({ input: process.stdin, output: process.stdout, rng });
    return;
  }

  const result = safeEvaluate(args.expression, { rng });
  if (!result.ok) {
    console.error(result.error.message);
    process.exitCode = 1;
    return;
  }
  console.log(formatEvaluation(result.value));
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
