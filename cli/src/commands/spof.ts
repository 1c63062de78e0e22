import type { Command } from "commander";
import { getSinglePointsOfFailure, type ApiOptions } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";

export async function cmdSpof(options: ApiOptions): Promise<void> {
  const data = await getSinglePointsOfFailure(options);

  if (logger.jsonMode) {
    logger.result(data);
    return;
  }

  if (data.count === 0) {
    logger.info("No single points of failure found.");
    return;
  }

  logger.section(`Single points of failure (${data.count})`);
  data.resources.forEach((a) => {
    logger.info(`  - ${a.resourceId} [${a.resourceType}] ${a.dependentsCount} dependents, risk ${a.riskScore} (${a.riskLevel})`);
  });
  logger.info("");
}

export function registerSpofCommand(program: Command): void {
  program
    .command("spof")
    .description("List resources whose failure would strand their dependents")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdSpof);
}
