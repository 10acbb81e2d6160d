#!/usr/bin/env node

import { runCli } from "./src/commands/index.js";
import { errorMessage } from "./src/errors.js";

try {
  await runCli(process.argv.slice(2));
} catch (error) {
  console.error(errorMessage(error));
  process.exitCode = 1;
}
