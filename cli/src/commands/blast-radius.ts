import type { Command } from "commander";
import { getBlastRadius, type ApiOptions } from "../lib/api-client.js";
import { formatDuration, parseNonNegativeInt } from "../lib/format.js";
import { logger } from "../lib/logger.js";
import type { AffectedResource } from "../lib/types.js";

interface BlastRadiusOptions extends ApiOptions {
  id?: string;
  maxDepth?: string;
  category?: string;
}

function describeAffected(r: AffectedResource): string {
  const label = r.name && r.name !== r.id ? `${r.name} (${r.id})` : r.id;
  return `  - ${label} [${r.resourceType}] strength ${r.pathStrength.toFixed(2)}`;
}

export async function cmdBlastRadius(options: BlastRadiusOptions): Promise<void> {
  const id = options.id;
  if (!id) {
    logger.error("Error: --id is required");
    process.exit(2);
  }

  const maxDepth = parseNonNegativeInt(options.maxDepth);
  if (options.maxDepth !== undefined && maxDepth === undefined) {
    logger.error(`Error: --max-depth must be a non-negative integer, got: ${options.maxDepth}`);
    process.exit(2);
  }

  const report = await getBlastRadius(id, { maxDepth, category: options.category }, options);

  if (logger.jsonMode) {
    logger.result(report);
    return;
  }

  logger.section(`Blast radius: ${report.resourceName}`);
  logger.info(`Total affected: ${report.totalAffected}`);
  logger.info(`User impact: ${report.userImpact}`);
  logger.info(`Estimated downtime: ${formatDuration(report.estimatedDowntimeSeconds)}`);
  logger.info(`Cascade depth: ${report.cascadeDepth}`);
  if (report.criticalPath.length > 1) {
    logger.info(`Critical path: ${report.criticalPath.join(" -> ")}`);
  }

  if (report.directlyAffected.length > 0) {
    logger.section(`Directly affected (${report.directlyAffected.length})`);
    report.directlyAffected.forEach((r) => logger.info(describeAffected(r)));
  }
  if (report.indirectlyAffected.length > 0) {
    logger.section(`Indirectly affected (${report.indirectlyAffected.length})`);
    report.indirectlyAffected.forEach((r) => logger.info(`${describeAffected(r)} at distance ${r.distance}`));
  }

  const services = Object.entries(report.affectedServices);
  if (services.length > 0) {
    logger.section("Affected resource types");
    services.forEach(([type, count]) => logger.info(`  ${type}: ${count}`));
  }
  logger.info("");
}

export function registerBlastRadiusCommand(program: Command): void {
  program
    .command("blast-radius")
    .description("Show which resources are affected if a resource fails")
    .requiredOption("--id <resourceId>", "Resource to analyze")
    .option("--max-depth <n>", "Maximum traversal depth")
    .option("--category <name>", "Only follow dependencies of this category")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdBlastRadius);
}
