#!/usr/bin/env node
import { parseArgs } from "./parse-args.js";
import { runLayout, runMasks, runRun } from "./commands.js";
import { usageFor } from "./help.js";

async function main(): Promise<number> {
  const result = parseArgs(process.argv);

  if (!result.ok) {
    console.error(`Error: ${result.error.error}`);
    if (result.error.usage) {
      console.error(result.error.usage);
    }
    return 1;
  }

  const { args } = result;

  switch (args.command) {
    case "help":
      console.log(usageFor(args.topic));
      return 0;
    case "run":
      return runRun(args);
    case "masks":
      return runMasks(args);
    case "layout":
      return runLayout(args);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal error:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
