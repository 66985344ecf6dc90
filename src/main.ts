#!/usr/bin/env node

import { runFsmanCommand } from "./cli";
import { ExitCode } from "./cli/types";
import { errorMessage } from "./internals/exceptions";

process.on("SIGINT", () => {
  console.log("\nOperation cancelled by user.");
  process.exit(ExitCode.SUCCESS);
});

async function main() {
  const args = process.argv.slice(2);
  try {
    process.exit(await runFsmanCommand(args));
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(ExitCode.EXECUTION_FAILURE);
  }
}

void main();
