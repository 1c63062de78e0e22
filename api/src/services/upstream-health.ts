import { mapInBatches } from "./deps.js";
import { assessRisk, type RiskAssessment, type RiskScorerDeps } from "./risk-scorer.js";

/** Scores above this are unhealthy; above HIGH_RISK_SCORE they are high risk instead. */
const UNHEALTHY_SCORE = 70;
const HIGH_RISK_SCORE = 85;

export interface UpstreamDependency {
  resourceId: string;
  resourceName: string;
  resourceType: string;
  category: string;
  riskScore: number;
  singlePointOfFailure: boolean;
}

export interface UpstreamHealthReport {
  resourceId: string;
  totalDependencies: number;
  dependenciesByCategory: Record<string, UpstreamDependency[]>;
  unhealthyDependencies: UpstreamDependency[];
  highRiskDependencies: UpstreamDependency[];
  singlePointOfFailureDependencies: UpstreamDependency[];
  /** 100 with no dependencies; lowered by the share of unhealthy, SPOF and high-risk ones. */
  healthScore: number;
  recommendations: string[];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function upstreamHealthScore(total: number, unhealthy: number, spof: number, highRisk: number): number {
  if (total === 0) return 100;
  const score = 100 - (unhealthy / total) * 30 - (spof / total) * 40 - (highRisk / total) * 20;
  return round2(Math.max(0, score));
}

function upstreamRecommendations(report: Omit<UpstreamHealthReport, "recommendations">): string[] {
  const recommendations: string[] = [];
  const names = (list: UpstreamDependency[]) => list.map((d) => d.resourceName).join(", ");

  if (report.singlePointOfFailureDependencies.length > 0) {
    recommendations.push(
      `${report.singlePointOfFailureDependencies.length} upstream dependencies are single points of failure ` +
        `(${names(report.singlePointOfFailureDependencies)}); add redundancy or a fallback path`,
    );
  }
  if (report.highRiskDependencies.length > 0) {
    recommendations.push(
      `Review high-risk upstream dependencies before changing ${report.resourceId}: ` +
        names(report.highRiskDependencies),
    );
  }
  if (report.unhealthyDependencies.length > 0) {
    recommendations.push(
      `Add circuit breakers and timeouts around unhealthy dependencies: ${names(report.unhealthyDependencies)}`,
    );
  }
  if (recommendations.length === 0) {
    recommendations.push("All dependencies appear healthy");
  }
  return recommendations;
}

function toDependency(assessment: RiskAssessment, category: string): UpstreamDependency {
  return {
    resourceId: assessment.resourceId,
    resourceName: assessment.resourceName,
    resourceType: assessment.resourceType,
    category,
    riskScore: assessment.riskScore,
    singlePointOfFailure: assessment.singlePointOfFailure,
  };
}

/**
 * Health of the resources `resourceId` directly depends on. Each direct
 * target is assessed once; its category is taken from the first edge to it.
 */
export async function analyzeUpstreamHealth(resourceId: string, deps: RiskScorerDeps): Promise<UpstreamHealthReport> {
  const { accessor, config } = deps;
  await accessor.getNode(resourceId);
  const outgoing = await accessor.getOutgoingEdges(resourceId, config.dependencyKinds);

  const categories = new Map<string, string>();
  for (const edge of outgoing) {
    if (edge.targetId !== resourceId && !categories.has(edge.targetId)) {
      categories.set(edge.targetId, edge.category);
    }
  }
  const targets = Array.from(categories.keys()).sort();

  const assessments = await mapInBatches(targets, (id) => assessRisk(id, deps));
  const dependencies = assessments.map((a) => toDependency(a, categories.get(a.resourceId) ?? "compute"));

  const dependenciesByCategory: Record<string, UpstreamDependency[]> = {};
  for (const dependency of dependencies) {
    (dependenciesByCategory[dependency.category] ??= []).push(dependency);
  }

  const unhealthy = dependencies.filter((d) => d.riskScore > UNHEALTHY_SCORE && d.riskScore <= HIGH_RISK_SCORE);
  const highRisk = dependencies.filter((d) => d.riskScore > HIGH_RISK_SCORE);
  const spof = dependencies.filter((d) => d.singlePointOfFailure);

  const report = {
    resourceId,
    totalDependencies: dependencies.length,
    dependenciesByCategory,
    unhealthyDependencies: unhealthy,
    highRiskDependencies: highRisk,
    singlePointOfFailureDependencies: spof,
    healthScore: upstreamHealthScore(dependencies.length, unhealthy.length, spof.length, highRisk.length),
  };

  deps.log?.debug({ resourceId, healthScore: report.healthScore }, "upstream health");

  return { ...report, recommendations: upstreamRecommendations(report) };
}
