import { InvalidConfigurationError } from "../errors.js";
import { computeBlastRadius, type BlastRadiusReport } from "./blast-radius.js";
import type { AnalysisDeps } from "./deps.js";
import type { Resource } from "./graph-accessor.js";
import {
  assertProbabilitiesSumToOne,
  loadDegradationPatterns,
  parseDegradationPatterns,
  patternFor,
  type DegradationPattern,
  type OutcomeType,
} from "./policy-tables.js";
import { pathStrength, traverse } from "./traverser.js";

export type FailureType =
  | "full_outage"
  | "degraded_performance"
  | "intermittent_failure"
  | "partial_outage";

export const FAILURE_TYPES: readonly FailureType[] = [
  "full_outage",
  "degraded_performance",
  "intermittent_failure",
  "partial_outage",
];

export type OverallImpact = "minimal" | "low" | "medium" | "high" | "severe";

export interface Outcome {
  outcomeType: OutcomeType;
  probability: number;
  durationSeconds: number;
  affectedPercentage: number;
  userImpactDescription: string;
  technicalDetails: string;
}

export interface FailureScenario {
  resourceId: string;
  resourceName: string;
  failureType: FailureType;
  outcomes: Outcome[];
  overallImpact: OverallImpact;
  mitigationStrategies: string[];
  monitoringRecommendations: string[];
  recoverySteps: string[];
  cascadeDepth: number;
  totalAffected: number;
}

export interface SimulationOptions {
  /** Load factor in [0, 1] for degraded performance. */
  currentLoad?: number;
  /** Share of failing requests in [0, 1] for intermittent failures. */
  failureFrequency?: number;
  affectedZones?: string[];
  totalZones?: number;
}

export interface SimulatorDeps extends AnalysisDeps {
  patterns?: Record<string, DegradationPattern>;
}

const SEVERITY_WEIGHTS: Record<OutcomeType, number> = {
  downtime: 5,
  partial_outage: 4,
  error_rate: 3,
  timeout: 3,
  degraded: 2,
  blip: 1,
};

function assertUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidConfigurationError(`${name} must be within [0, 1], got ${value}`);
  }
}

export function describeUserImpact(outcomeType: OutcomeType, affectedPercentage: number): string {
  const pct = affectedPercentage.toFixed(0);
  switch (outcomeType) {
    case "downtime":
      return `Complete service unavailability affecting ${pct}% of users`;
    case "degraded":
      return `Slow response times affecting ${pct}% of requests. Users experience delays but service works.`;
    case "blip":
      return `Brief intermittent issues affecting ${pct}% of requests. Most users won't notice.`;
    case "timeout":
      return `Request timeouts affecting ${pct}% of operations. Users need to retry.`;
    case "error_rate":
      return `Increased error rate affecting ${pct}% of requests. Users see error messages.`;
    case "partial_outage":
      return `Partial outage affecting ${pct}% of capacity`;
  }
}

export function overallImpactFor(outcomes: readonly Outcome[]): OverallImpact {
  const weighted = outcomes.reduce(
    (acc, o) => acc + o.probability * SEVERITY_WEIGHTS[o.outcomeType] * (o.affectedPercentage / 100),
    0,
  );
  if (weighted >= 3.5) return "severe";
  if (weighted >= 2.5) return "high";
  if (weighted >= 1.5) return "medium";
  if (weighted >= 0.5) return "low";
  return "minimal";
}

function fullOutageImpact(report: BlastRadiusReport): OverallImpact {
  if (report.totalAffected === 0) return "low";
  switch (report.userImpact) {
    case "low":
      return "medium";
    case "medium":
      return "high";
    case "high":
      return "severe";
  }
}

function fullOutage(resource: Resource, report: BlastRadiusReport): Outcome[] {
  return [
    {
      outcomeType: "downtime",
      probability: 1,
      durationSeconds: report.estimatedDowntimeSeconds,
      affectedPercentage: 100,
      userImpactDescription: describeUserImpact("downtime", 100),
      technicalDetails:
        `${resource.resourceType} ${resource.name} unavailable; ` +
        `${report.totalAffected} dependent resources affected across ${report.cascadeDepth} levels`,
    },
  ];
}

/**
 * Policy probabilities are scaled by load, then renormalised so the scenario
 * still sums to one. Durations grow with the number of affected resources.
 */
function degradedPerformance(
  resource: Resource,
  report: BlastRadiusReport,
  pattern: DegradationPattern,
  currentLoad: number,
  cascadeDurationFactor: number,
): Outcome[] {
  const scaled = pattern.outcomes.map((o) => Math.min(1, o.probability * (0.5 + currentLoad)));
  const total = scaled.reduce((acc, p) => acc + p, 0);
  const cascadeMultiplier = 1 + report.totalAffected * cascadeDurationFactor;
  const symptom = pattern.symptoms[0].toLowerCase();

  return pattern.outcomes.map((template, i) => {
    const affectedPercentage = Math.min(100, template.affectedPercentage * (0.8 + currentLoad * 0.4));
    return {
      outcomeType: template.outcomeType,
      probability: scaled[i] / total,
      durationSeconds: Math.round(template.durationSeconds * cascadeMultiplier),
      affectedPercentage,
      userImpactDescription: describeUserImpact(template.outcomeType, affectedPercentage),
      technicalDetails: `${resource.resourceType} ${symptom}`,
    };
  });
}

function intermittentFailure(resource: Resource, failureFrequency: number): Outcome[] {
  const pct = failureFrequency * 100;
  return [
    {
      outcomeType: "blip",
      probability: 0.7,
      durationSeconds: 120,
      affectedPercentage: pct,
      userImpactDescription:
        `Users experience occasional errors (~${pct.toFixed(1)}% of requests). ` +
        "Most retries succeed. UX is degraded but service remains available.",
      technicalDetails: `Intermittent ${resource.resourceType} errors, likely race conditions or resource contention`,
    },
    {
      outcomeType: "error_rate",
      probability: 0.3,
      durationSeconds: 300,
      affectedPercentage: Math.min(100, pct * 2),
      userImpactDescription:
        `Error rate spikes to ~${Math.min(100, pct * 2).toFixed(1)}%. ` +
        "Users experience frequent failures requiring retries.",
      technicalDetails: `Cascading failures from ${resource.resourceType} instability`,
    },
  ];
}

function partialOutage(resource: Resource, affectedZones: string[], totalZones: number): Outcome[] {
  const lost = (affectedZones.length / totalZones) * 100;
  if (affectedZones.length === totalZones) {
    return [
      {
        outcomeType: "downtime",
        probability: 1,
        durationSeconds: 1800,
        affectedPercentage: 100,
        userImpactDescription: "All zones lost. Service unavailable until a zone recovers.",
        technicalDetails: `${resource.resourceType} unavailable in every zone (${affectedZones.join(", ")})`,
      },
    ];
  }
  return [
    {
      outcomeType: "partial_outage",
      probability: 0.8,
      durationSeconds: 900,
      affectedPercentage: lost,
      userImpactDescription:
        `${lost.toFixed(0)}% of capacity lost. Service degraded but operational on remaining zones.`,
      technicalDetails: `${resource.resourceType} in zones ${affectedZones.join(", ")} unavailable`,
    },
    {
      outcomeType: "degraded",
      probability: 0.2,
      durationSeconds: 1800,
      affectedPercentage: 100 - lost,
      userImpactDescription:
        `Remaining ${(100 - lost).toFixed(0)}% capacity handling all traffic. Increased latency and occasional timeouts.`,
      technicalDetails: `Overload on healthy ${resource.resourceType} instances`,
    },
  ];
}

function typeHint(resourceType: string): "database" | "cache" | "app" | "load_balancer" | "other" {
  const t = resourceType.toLowerCase();
  if (t.includes("database") || t.includes("sql")) return "database";
  if (t.includes("cache") || t.includes("redis")) return "cache";
  if (t.includes("load_balancer")) return "load_balancer";
  if (t.includes("web") || t.includes("app")) return "app";
  return "other";
}

export function mitigationStrategies(
  failureType: FailureType,
  resource: Resource,
  report: BlastRadiusReport,
): string[] {
  const strategies: string[] = [];
  const { name, resourceType } = resource;

  if (report.totalAffected > 10) {
    strategies.push("Implement circuit breakers to prevent cascade failures");
  }

  switch (failureType) {
    case "full_outage":
      switch (typeHint(resourceType)) {
        case "database":
          strategies.push(
            `Configure automatic failover to a standby for ${name}`,
            "Set up regular backup and recovery testing",
            "Enable point-in-time recovery",
          );
          break;
        case "load_balancer":
          strategies.push("Configure redundant load balancers", "Implement DNS-based failover");
          break;
        case "app":
        case "cache":
          strategies.push(
            `Deploy ${name} across multiple availability zones`,
            "Add health check endpoints with automatic recovery",
          );
          break;
        case "other":
          strategies.push(`Add redundancy so ${name} is not a single point of failure`);
          break;
      }
      strategies.push("Create runbooks for common failure scenarios", "Conduct regular disaster recovery drills");
      break;
    case "degraded_performance":
      switch (typeHint(resourceType)) {
        case "database":
          strategies.push(
            "Implement connection pooling with proper limits",
            "Add read replicas to distribute load",
            "Set up query timeouts to prevent long-running queries",
          );
          break;
        case "cache":
          strategies.push(
            "Implement cache warming strategies",
            "Implement graceful degradation when the cache is unavailable",
          );
          break;
        case "app":
          strategies.push(
            `Auto-scale ${name} on CPU, memory and request rate`,
            "Use asynchronous processing for heavy operations",
          );
          break;
        case "load_balancer":
        case "other":
          break;
      }
      strategies.push(
        "Implement load testing to identify capacity limits",
        "Establish SLOs and alert on SLO violations",
      );
      break;
    case "intermittent_failure":
      strategies.push(
        "Implement retry logic with exponential backoff",
        "Add circuit breakers to prevent cascade failures",
        `Add detailed logging around ${resourceType} operations`,
        "Consider a bulkhead pattern to isolate failures",
      );
      break;
    case "partial_outage":
      strategies.push(
        "Implement multi-zone redundancy with automatic failover",
        "Configure health checks to remove failed instances",
        `Deploy ${resourceType} across at least 3 availability zones`,
        "Implement graceful degradation when capacity is reduced",
      );
      break;
  }

  return Array.from(new Set(strategies));
}

export function monitoringRecommendations(
  failureType: FailureType,
  resource: Resource,
  pattern: DegradationPattern,
): string[] {
  switch (failureType) {
    case "full_outage":
      return [
        `Alert on ${resource.name} availability and health check failures`,
        "Track dependent service error rates during incidents",
      ];
    case "degraded_performance": {
      const recommendations = [
        "Monitor key performance indicators (latency, throughput, errors)",
        "Set up alerts on P95/P99 latency thresholds",
      ];
      for (const symptom of pattern.symptoms) {
        const s = symptom.toLowerCase();
        if (s.includes("quer")) recommendations.push("Monitor query execution times and slow query counts");
        else if (s.includes("connection")) recommendations.push("Monitor connection pool metrics and saturation");
        else if (s.includes("memory")) recommendations.push("Monitor memory usage and garbage collection metrics");
        else if (s.includes("eviction")) recommendations.push("Track cache eviction rates and hit/miss ratios");
      }
      return recommendations;
    }
    case "intermittent_failure":
      return [
        "Set up alerting on error rate thresholds (>1%, >5%, >10%)",
        "Monitor retry rates and success rates",
        `Create dashboards for ${resource.resourceType} health metrics`,
      ];
    case "partial_outage":
      return [
        "Monitor per-zone health and traffic distribution",
        "Track capacity utilization per zone",
      ];
  }
}

export function recoverySteps(resource: Resource, report: BlastRadiusReport): string[] {
  const steps = [
    "Confirm the failure and impact scope",
    "Activate incident response",
    "Notify stakeholders and affected users",
  ];
  switch (typeHint(resource.resourceType)) {
    case "database":
      steps.push("Attempt database service restart", "Restore from backup if necessary", "Verify data integrity");
      break;
    case "load_balancer":
      steps.push("Verify backend pool health", "Route traffic to a backup load balancer if available");
      break;
    case "app":
    case "cache":
      steps.push(`Restart ${resource.name}`, "Verify connectivity to dependencies");
      break;
    case "other":
      steps.push("Investigate root cause", `Restart ${resource.name}`);
      break;
  }
  if (report.totalAffected > 0) {
    steps.push(`Verify recovery of ${report.totalAffected} dependent resources`);
  }
  steps.push("Conduct a post-incident review");
  return steps;
}

/**
 * Probability-weighted outcomes of `failureType` hitting `resourceId`,
 * derived from its blast radius.
 */
export async function simulate(
  resourceId: string,
  failureType: FailureType,
  options: SimulationOptions,
  deps: SimulatorDeps,
): Promise<FailureScenario> {
  const currentLoad = options.currentLoad ?? 0.7;
  const failureFrequency = options.failureFrequency ?? 0.05;
  const affectedZones = Array.from(new Set(options.affectedZones ?? ["zone-a"]));
  const totalZones = options.totalZones ?? 3;
  assertUnitInterval("currentLoad", currentLoad);
  assertUnitInterval("failureFrequency", failureFrequency);
  if (!Number.isInteger(totalZones) || totalZones <= 0 || affectedZones.length > totalZones) {
    throw new InvalidConfigurationError(
      `affectedZones (${affectedZones.length}) must not exceed totalZones (${totalZones})`,
    );
  }

  const [resource, report] = await Promise.all([
    deps.accessor.getNode(resourceId),
    computeBlastRadius(resourceId, {}, deps),
  ]);
  const patterns = deps.patterns ? parseDegradationPatterns(deps.patterns) : loadDegradationPatterns();
  const pattern = patternFor(patterns, resource.resourceType);

  let outcomes: Outcome[];
  switch (failureType) {
    case "full_outage":
      outcomes = fullOutage(resource, report);
      break;
    case "degraded_performance":
      outcomes = degradedPerformance(resource, report, pattern, currentLoad, deps.config.cascadeDurationFactor);
      break;
    case "intermittent_failure":
      outcomes = intermittentFailure(resource, failureFrequency);
      break;
    case "partial_outage":
      outcomes = partialOutage(resource, affectedZones, totalZones);
      break;
  }

  assertProbabilitiesSumToOne(`${failureType} scenario`, outcomes.map((o) => o.probability));

  let overallImpact: OverallImpact;
  if (failureType === "full_outage") overallImpact = fullOutageImpact(report);
  else if (failureType === "intermittent_failure") overallImpact = failureFrequency < 0.1 ? "low" : "medium";
  else overallImpact = overallImpactFor(outcomes);

  return {
    resourceId,
    resourceName: resource.name,
    failureType,
    outcomes,
    overallImpact,
    mitigationStrategies: mitigationStrategies(failureType, resource, report),
    monitoringRecommendations: monitoringRecommendations(failureType, resource, pattern),
    recoverySteps: failureType === "full_outage" ? recoverySteps(resource, report) : [],
    cascadeDepth: report.cascadeDepth,
    totalAffected: report.totalAffected,
  };
}

export interface CascadeLevel {
  distance: number;
  resources: Array<{ id: string; failureProbability: number }>;
}

export interface CascadingFailureAnalysis {
  resourceId: string;
  initialProbability: number;
  levels: CascadeLevel[];
  expectedFailures: number;
}

/**
 * Probability that each dependent fails given `resourceId` fails with
 * `initialProbability`: the initial probability times the product of edge
 * strengths along the dependent's path.
 */
export async function cascadingFailure(
  resourceId: string,
  initialProbability: number,
  deps: AnalysisDeps,
): Promise<CascadingFailureAnalysis> {
  assertUnitInterval("initialProbability", initialProbability);
  const traversal = await traverse(deps.accessor, resourceId, {
    direction: "incoming",
    maxDepth: deps.config.maxTraversalDepth,
    kinds: deps.config.dependencyKinds,
  });

  const byDistance = new Map<number, CascadeLevel>();
  let expectedFailures = 0;
  for (const reached of traversal.reached.values()) {
    const failureProbability = initialProbability * pathStrength(reached.path);
    expectedFailures += failureProbability;
    const level = byDistance.get(reached.distance) ?? { distance: reached.distance, resources: [] };
    level.resources.push({ id: reached.resourceId, failureProbability });
    byDistance.set(reached.distance, level);
  }

  return {
    resourceId,
    initialProbability,
    levels: Array.from(byDistance.values()),
    expectedFailures,
  };
}
