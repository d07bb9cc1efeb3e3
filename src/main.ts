#!/usr/bin/env node
import { run } from "./cli/run.js";
import { configureFromEnv, logger } from "./logger.js";

configureFromEnv(logger);

process.exitCode = await run(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  env: process.env,
  logger,
});
