import type { Command } from "commander";
import { getChangeRisk, type ApiOptions } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";

interface ChangeRiskOptions extends ApiOptions {
  id?: string;
  at?: string;
}

export async function cmdChangeRisk(options: ChangeRiskOptions): Promise<void> {
  const id = options.id;
  if (!id) {
    logger.error("Error: --id is required");
    process.exit(2);
  }

  let at: string | undefined;
  if (options.at !== undefined) {
    const parsed = Date.parse(options.at);
    if (Number.isNaN(parsed)) {
      logger.error(`Error: --at must be an ISO 8601 timestamp, got "${options.at}"`);
      process.exit(2);
    }
    at = new Date(parsed).toISOString();
  }

  const change = await getChangeRisk(id, at, options);

  if (logger.jsonMode) {
    logger.result(change);
    return;
  }
  logger.section(`Change risk: ${change.resourceId}`);
  logger.info(`When: ${change.timing.at} (${change.timing.dayType}, ${change.timing.window.replace("_", " ")})`);
  logger.info(`Score: ${change.baseRiskScore} -> ${change.adjustedRiskScore} (x${change.timing.multiplier}, ${change.riskLevel})`);
  logger.info(change.timing.recommendation);
  logger.info("");
}

export function registerChangeRiskCommand(program: Command): void {
  program
    .command("change-risk")
    .description("Risk of deploying a change to a resource at a given time")
    .requiredOption("--id <resourceId>", "Resource to change")
    .option("--at <timestamp>", "Deployment time (ISO 8601); defaults to now")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdChangeRisk);
}
