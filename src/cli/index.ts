#!/usr/bin/env node

/**
 * mcpsw CLI Entry Point
 */

import { createProgram } from "./program.js";
import { formatError } from "../utils/errors.js";
import { createLogger, parseLogLevel, setLogger } from "../utils/logger.js";

async function main(): Promise<void> {
  setLogger(createLogger({ level: parseLogLevel(process.env.MCPSW_LOG_LEVEL, "warn") }));
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = 1;
});
