import type { Command } from "commander";
import { simulateFailure, type ApiOptions } from "../lib/api-client.js";
import { formatDuration, formatPercent, formatRatio, parseFraction, parseIdList, parseNonNegativeInt } from "../lib/format.js";
import { logger } from "../lib/logger.js";
import { FAILURE_TYPES, type FailureType, type SimulateRequest } from "../lib/types.js";

interface SimulateOptions extends ApiOptions {
  id?: string;
  type?: string;
  load?: string;
  frequency?: string;
  zones?: string;
  totalZones?: string;
}

function isFailureType(value: string): value is FailureType {
  return FAILURE_TYPES.some((t) => t === value);
}

function usageError(message: string): never {
  logger.error(`Error: ${message}`);
  process.exit(2);
}

export function buildSimulateRequest(options: SimulateOptions): SimulateRequest {
  if (!options.id) usageError("--id is required");
  const type = options.type || "full_outage";
  if (!isFailureType(type)) {
    usageError(`--type must be one of ${FAILURE_TYPES.join(", ")}, got: ${type}`);
  }

  const body: SimulateRequest = { resourceId: options.id, failureType: type };

  if (options.load !== undefined) {
    const load = parseFraction(options.load);
    if (load === undefined) usageError(`--load must be between 0 and 1, got: ${options.load}`);
    body.currentLoad = load;
  }
  if (options.frequency !== undefined) {
    const frequency = parseFraction(options.frequency);
    if (frequency === undefined) usageError(`--frequency must be between 0 and 1, got: ${options.frequency}`);
    body.failureFrequency = frequency;
  }
  if (options.zones !== undefined) {
    body.affectedZones = parseIdList(options.zones);
  }
  if (options.totalZones !== undefined) {
    const total = parseNonNegativeInt(options.totalZones);
    if (total === undefined || total < 1) usageError(`--total-zones must be a positive integer, got: ${options.totalZones}`);
    body.totalZones = total;
  }
  return body;
}

export async function cmdSimulate(options: SimulateOptions): Promise<void> {
  const scenario = await simulateFailure(buildSimulateRequest(options), options);

  if (logger.jsonMode) {
    logger.result(scenario);
    return;
  }

  logger.section(`Simulation: ${scenario.failureType} of ${scenario.resourceName}`);
  logger.info(`Overall impact: ${scenario.overallImpact}`);
  logger.info(`Affected resources: ${scenario.totalAffected} (cascade depth ${scenario.cascadeDepth})`);

  logger.section(`Outcomes (${scenario.outcomes.length})`);
  scenario.outcomes.forEach((o) => {
    logger.info(
      `  - ${o.outcomeType}: p=${formatRatio(o.probability)}, ${formatDuration(o.durationSeconds)}, ` +
        `${formatPercent(o.affectedPercentage)} affected`,
    );
    logger.info(`    ${o.userImpactDescription}`);
  });

  const lists: Array<[string, string[]]> = [
    ["Mitigation", scenario.mitigationStrategies],
    ["Monitoring", scenario.monitoringRecommendations],
    ["Recovery steps", scenario.recoverySteps],
  ];
  for (const [title, items] of lists) {
    if (items.length === 0) continue;
    logger.section(title);
    items.forEach((item) => logger.info(`  - ${item}`));
  }
  logger.info("");
}

export function registerSimulateCommand(program: Command): void {
  program
    .command("simulate")
    .description("Simulate a failure of a resource")
    .requiredOption("--id <resourceId>", "Resource to fail")
    .option("--type <failureType>", `One of: ${FAILURE_TYPES.join(", ")}`, "full_outage")
    .option("--load <fraction>", "Current load between 0 and 1 (degraded_performance)")
    .option("--frequency <fraction>", "Failure frequency between 0 and 1 (intermittent_failure)")
    .option("--zones <list>", "Comma-separated failed zones (partial_outage)")
    .option("--total-zones <n>", "Total zone count (partial_outage)")
    .option("--api <url>", "Risk API URL")
    .option("--token <token>", "Bearer token for auth")
    .action(cmdSimulate);
}
