import type { Command } from "commander";
import { compareResources, type ApiOptions } from "../lib/api-client.js";
import { parseIdList } from "../lib/format.js";
import { logger } from "../lib/logger.js";

interface CompareOptions extends ApiOptions {
  ids?: string;
}

export async function cmdCompare(options: CompareOptions): Promise<void> {
  const ids = parseIdList(options.ids || "");
  if (ids.length === 0) {
    logger.error("Error: --ids must list at least one resource");
    process.exit(2);
  }

  const comparison = await compareResources(ids, options);

  if (logger.jsonMode) {
    logger.result(comparison);
    return;
  }

  logger.section(`Risk comparison (${comparison.assessments.length})`);
  comparison.assessments.forEach((a, i) => {
    logger.info(`  ${i + 1}. ${a.resourceId} ${a.riskScore} (${a.riskLevel})`);
  });
  logger.info(`Average score: ${comparison.averageRiskScore}`);
  if (comparison.highest) {
    logger.info(`Highest: ${comparison.highest.resourceId} (${comparison.highest.riskScore})`);
  }
  if (comparison.lowest) {
    logger.info(`Lowest: ${comparison.lowest.resourceId} (${comparison.lowest.riskScore})`);
  }
  logger.info("");
}

export function registerCompareCommand(program: Command): void {
  program
    .command("compare")
    .description("Rank resources by risk score")
    .requiredOption("--ids <list>", "Comma-separated resource ids")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdCompare);
}
