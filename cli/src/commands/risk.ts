import type { Command } from "commander";
import { getRiskAssessment, type ApiOptions } from "../lib/api-client.js";
import { logger } from "../lib/logger.js";
import type { RiskAssessment } from "../lib/types.js";

interface RiskOptions extends ApiOptions {
  id?: string;
}

export function printAssessment(a: RiskAssessment): void {
  logger.section(`Risk: ${a.resourceName} [${a.resourceType}]`);
  logger.info(`Score: ${a.riskScore} (${a.riskLevel})`);
  logger.info(`Criticality: ${a.criticalityScore}`);
  logger.info(`Dependencies: ${a.dependenciesCount}, dependents: ${a.dependentsCount}, blast radius: ${a.blastRadius}`);
  logger.info(`Single point of failure: ${a.singlePointOfFailure ? "yes" : "no"}`);
  logger.info(`Redundancy: ${a.hasRedundancy ? "yes" : "no"}`);
  if (a.recommendations.length > 0) {
    logger.section("Recommendations");
    a.recommendations.forEach((r) => logger.info(`  - ${r}`));
  }
}

export async function cmdRisk(options: RiskOptions): Promise<void> {
  const id = options.id;
  if (!id) {
    logger.error("Error: --id is required");
    process.exit(2);
  }

  const assessment = await getRiskAssessment(id, options);

  if (logger.jsonMode) {
    logger.result(assessment);
    return;
  }
  printAssessment(assessment);
  logger.info("");
}

export function registerRiskCommand(program: Command): void {
  program
    .command("risk")
    .description("Assess the failure risk of a resource")
    .requiredOption("--id <resourceId>", "Resource to assess")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdRisk);
}
