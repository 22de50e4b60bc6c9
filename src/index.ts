#!/usr/bin/env node
import { runCLI } from './cli/index.js';
import { formatStartupError } from './errors.js';

runCLI().catch((error: unknown) => {
  // Format error with actionable message and exit
  const errorMessage = formatStartupError(error instanceof Error ? error : new Error(String(error)));
  console.error(`\n${errorMessage}\n`);
  process.exit(1);
});
