#!/usr/bin/env node
import { logger } from "./lib/logger.js";
import { buildProgram } from "./program.js";

async function main() {
  await buildProgram().parseAsync(process.argv);
}

main().catch((e: unknown) => {
  logger.error("Command failed", e);
  process.exit(1);
});
