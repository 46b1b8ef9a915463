#!/usr/bin/env node
import { runCli } from "./cli/run";
import { errorMessage } from "./core/errors";

runCli().catch((error: unknown) => {
  process.stderr.write(`applygate: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
