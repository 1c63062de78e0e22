import type { AnalysisConfig } from "../config.js";
import type { BlastRadiusReport } from "./blast-radius.js";
import type { Resource } from "./graph-accessor.js";

export type RuleSeverity = "critical" | "high" | "medium" | "low";

const SEVERITY_RANK: Record<RuleSeverity, number> = {
  critical: 0,
  high: 1,
  medium: 2,
  low: 3,
};

/** The parts of a risk assessment the rules read. */
export interface RiskSignals {
  resourceName: string;
  resourceType: string;
  riskScore: number;
  dependenciesCount: number;
  dependentsCount: number;
  singlePointOfFailure: boolean;
  hasRedundancy: boolean;
}

export interface RemediationContext {
  assessment: RiskSignals;
  blastRadius: BlastRadiusReport;
  resource?: Resource;
  config: AnalysisConfig;
}

export interface RemediationRule {
  id: string;
  severity: RuleSeverity;
  applies: (ctx: RemediationContext) => boolean;
  message: (ctx: RemediationContext) => string;
}

/** `false` only when the attribute is present and explicitly disabled. */
function attributeDisabled(ctx: RemediationContext, key: string): boolean {
  return ctx.resource?.attributes[key] === false;
}

export const REMEDIATION_RULES: readonly RemediationRule[] = [
  {
    id: "spof",
    severity: "critical",
    applies: (ctx) => ctx.assessment.singlePointOfFailure,
    message: (ctx) =>
      `Single point of failure: add redundancy or failover for ${ctx.assessment.resourceName} ` +
      `(${ctx.assessment.dependentsCount} dependents rely on it)`,
  },
  {
    id: "spof-no-redundancy",
    severity: "critical",
    applies: (ctx) => ctx.assessment.singlePointOfFailure && !ctx.assessment.hasRedundancy,
    message: () => "Deploy redundant instances across availability zones",
  },
  {
    id: "critical-risk",
    severity: "critical",
    applies: (ctx) => ctx.assessment.riskScore >= 75,
    message: (ctx) =>
      `Critical risk: change ${ctx.assessment.resourceName} only during maintenance windows with a rehearsed rollback`,
  },
  {
    id: "high-fan-in",
    severity: "high",
    applies: (ctx) => ctx.assessment.dependentsCount > ctx.config.highDependentsThreshold,
    message: (ctx) =>
      `High dependency count (${ctx.assessment.dependentsCount} dependents): ` +
      "decouple consumers with circuit breakers, queues or fallbacks",
  },
  {
    id: "wide-blast-radius",
    severity: "high",
    applies: (ctx) => ctx.blastRadius.totalAffected > ctx.config.impactThresholds.mediumMax,
    message: (ctx) =>
      `Failure cascades to ${ctx.blastRadius.totalAffected} resources: isolate the critical path ` +
      `${ctx.blastRadius.criticalPath.join(" -> ")} with bulkheads`,
  },
  {
    id: "high-fan-out",
    severity: "medium",
    applies: (ctx) => ctx.assessment.dependenciesCount > ctx.config.highDependenciesThreshold,
    message: (ctx) =>
      `${ctx.assessment.resourceName} depends on ${ctx.assessment.dependenciesCount} resources: ` +
      "reduce coupling and health-check each dependency",
  },
  {
    id: "missing-backup",
    severity: "medium",
    applies: (ctx) => attributeDisabled(ctx, "backup_enabled"),
    message: (ctx) => `Enable automated backups for ${ctx.assessment.resourceType} ${ctx.assessment.resourceName}`,
  },
  {
    id: "missing-nsg",
    severity: "medium",
    applies: (ctx) => attributeDisabled(ctx, "has_nsg"),
    message: (ctx) => `Attach a network security group to ${ctx.assessment.resourceName}`,
  },
  {
    id: "missing-secret-rotation",
    severity: "medium",
    applies: (ctx) => attributeDisabled(ctx, "secret_rotation_enabled"),
    message: (ctx) => `Enable secret rotation for credentials used by ${ctx.assessment.resourceName}`,
  },
  {
    id: "elevated-risk",
    severity: "medium",
    applies: (ctx) => ctx.assessment.riskScore >= 50,
    message: () => "Use canary deployments to limit the blast radius of changes",
  },
  {
    id: "monitor",
    severity: "low",
    applies: (ctx) => ctx.assessment.riskScore > 25,
    message: () => "Monitor deployments closely and be prepared to roll back",
  },
];

/**
 * Evaluate the rule table. Output is ordered by severity, then by rule
 * declaration order, and is identical for identical input.
 */
export function recommend(
  assessment: RiskSignals,
  blastRadius: BlastRadiusReport,
  config: AnalysisConfig,
  resource?: Resource,
  rules: readonly RemediationRule[] = REMEDIATION_RULES,
): string[] {
  const ctx: RemediationContext = { assessment, blastRadius, resource, config };
  return rules
    .map((rule, index) => ({ rule, index }))
    .filter(({ rule }) => rule.applies(ctx))
    .sort(
      (a, b) =>
        SEVERITY_RANK[a.rule.severity] - SEVERITY_RANK[b.rule.severity] || a.index - b.index,
    )
    .map(({ rule }) => rule.message(ctx));
}
