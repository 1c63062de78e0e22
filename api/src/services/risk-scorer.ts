import type { AnalysisConfig } from "../config.js";
import { computeBlastRadius } from "./blast-radius.js";
import { mapInBatches, READ_BATCH_SIZE, type AnalysisDeps } from "./deps.js";
import type { DependencyEdge, ResourceCatalog } from "./graph-accessor.js";
import { criticalityFor, loadCriticalityTable, type CriticalityTable } from "./policy-tables.js";
import { recommend } from "./remediation.js";
import { traverse } from "./traverser.js";

export type RiskLevel = "low" | "medium" | "high" | "critical";

export interface RiskFactors {
  dependentsComponent: number;
  spofComponent: number;
  strengthComponent: number;
  resourceTypeComponent: number;
  averageOutgoingStrength: number;
  strandedDependents: string[];
  userImpact: string;
}

export interface RiskAssessment {
  resourceId: string;
  resourceName: string;
  resourceType: string;
  riskScore: number;
  riskLevel: RiskLevel;
  criticalityScore: number;
  dependenciesCount: number;
  dependentsCount: number;
  /** Total resources in the blast radius. */
  blastRadius: number;
  singlePointOfFailure: boolean;
  hasRedundancy: boolean;
  recommendations: string[];
  factors: RiskFactors;
}

export interface RiskScoreInput {
  dependentsCount: number;
  singlePointOfFailure: boolean;
  averageOutgoingStrength: number;
  criticality: number;
}

export interface RiskScoreBreakdown {
  score: number;
  dependentsComponent: number;
  spofComponent: number;
  strengthComponent: number;
  resourceTypeComponent: number;
}

export interface RiskScorerDeps extends AnalysisDeps {
  criticality?: CriticalityTable;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * score = wDependents × min(1, dependents / normalization)
 *       + (spof ? wSpof : 0)
 *       + wStrength × averageOutgoingStrength
 *       + wType × criticality / 100
 * clamped to [0, 100] and rounded to two decimals.
 */
export function calculateRiskScore(input: RiskScoreInput, config: AnalysisConfig): RiskScoreBreakdown {
  const w = config.riskWeights;
  const dependentsComponent =
    w.dependents * Math.min(1, input.dependentsCount / config.dependentsNormalization);
  const spofComponent = input.singlePointOfFailure ? w.spofBonus : 0;
  const strengthComponent = w.strength * input.averageOutgoingStrength;
  const resourceTypeComponent = (w.resourceType * input.criticality) / 100;

  const raw = dependentsComponent + spofComponent + strengthComponent + resourceTypeComponent;
  return {
    score: round2(Math.max(0, Math.min(100, raw))),
    dependentsComponent: round2(dependentsComponent),
    spofComponent: round2(spofComponent),
    strengthComponent: round2(strengthComponent),
    resourceTypeComponent: round2(resourceTypeComponent),
  };
}

export function riskLevelFor(score: number): RiskLevel {
  if (score >= 75) return "critical";
  if (score >= 50) return "high";
  if (score >= 25) return "medium";
  return "low";
}

function distinct(ids: string[]): string[] {
  return Array.from(new Set(ids));
}

function averageStrength(edges: DependencyEdge[]): number {
  if (edges.length === 0) return 0;
  return edges.reduce((acc, e) => acc + e.strength, 0) / edges.length;
}

/**
 * Dependents that lose part of their upstream chain when `resourceId` is
 * removed. With the resource excluded, a dependent keeps its chain when it
 * still reaches a redundancy peer, or else every one of the resource's own
 * dependencies.
 */
export async function findStrandedDependents(
  resourceId: string,
  dependents: string[],
  upstream: string[],
  redundancyPeers: string[],
  deps: AnalysisDeps,
): Promise<string[]> {
  const { accessor, config } = deps;
  const upstreamTargets = upstream.filter((id) => id !== resourceId);
  const peers = redundancyPeers.filter((id) => id !== resourceId);
  if (upstreamTargets.length === 0 && peers.length === 0) return [...dependents];

  const excludeIds = new Set([resourceId]);
  const results = await mapInBatches(dependents, (dependent) =>
    traverse(accessor, dependent, {
      direction: "outgoing",
      maxDepth: config.maxTraversalDepth,
      kinds: config.dependencyKinds,
      excludeIds,
    }),
  );

  return dependents.filter((dependent, i) => {
    const reached = results[i].reached;
    if (peers.some((p) => p === dependent || reached.has(p))) return false;
    if (upstreamTargets.length === 0) return true;
    return upstreamTargets.some((t) => t !== dependent && !reached.has(t));
  });
}

export async function assessRisk(resourceId: string, deps: RiskScorerDeps): Promise<RiskAssessment> {
  const { accessor, config } = deps;
  const resource = await accessor.getNode(resourceId);

  const [outgoing, incoming, redundancyOut, redundancyIn, blastRadius] = await Promise.all([
    accessor.getOutgoingEdges(resourceId, config.dependencyKinds),
    accessor.getIncomingEdges(resourceId, config.dependencyKinds),
    accessor.getOutgoingEdges(resourceId, config.redundancyKinds),
    accessor.getIncomingEdges(resourceId, config.redundancyKinds),
    computeBlastRadius(resourceId, {}, deps),
  ]);

  const upstream = distinct(outgoing.map((e) => e.targetId)).filter((id) => id !== resourceId);
  const dependents = distinct(incoming.map((e) => e.sourceId)).filter((id) => id !== resourceId);
  const redundancyPeers = distinct([
    ...redundancyOut.map((e) => e.targetId),
    ...redundancyIn.map((e) => e.sourceId),
  ]).filter((id) => id !== resourceId);

  const overThreshold = dependents.length > config.spofDependentsThreshold;
  const stranded = overThreshold
    ? await findStrandedDependents(resourceId, dependents, upstream, redundancyPeers, deps)
    : [];
  const singlePointOfFailure = overThreshold && stranded.length > 0;

  const criticalityScore = criticalityFor(deps.criticality ?? loadCriticalityTable(), resource.resourceType);
  const averageOutgoingStrength = averageStrength(outgoing);
  const breakdown = calculateRiskScore(
    {
      dependentsCount: dependents.length,
      singlePointOfFailure,
      averageOutgoingStrength,
      criticality: criticalityScore,
    },
    config,
  );

  deps.log?.debug({ resourceId, ...breakdown }, "risk score breakdown");

  const signals = {
    resourceName: resource.name,
    resourceType: resource.resourceType,
    riskScore: breakdown.score,
    dependenciesCount: upstream.length,
    dependentsCount: dependents.length,
    singlePointOfFailure,
    hasRedundancy: redundancyPeers.length > 0,
  };

  return {
    resourceId,
    ...signals,
    riskLevel: riskLevelFor(breakdown.score),
    criticalityScore,
    blastRadius: blastRadius.totalAffected,
    recommendations: recommend(signals, blastRadius, config, resource),
    factors: {
      dependentsComponent: breakdown.dependentsComponent,
      spofComponent: breakdown.spofComponent,
      strengthComponent: breakdown.strengthComponent,
      resourceTypeComponent: breakdown.resourceTypeComponent,
      averageOutgoingStrength,
      strandedDependents: stranded,
      userImpact: blastRadius.userImpact,
    },
  };
}

export interface RiskComparison {
  assessments: RiskAssessment[];
  highest?: { resourceId: string; riskScore: number };
  lowest?: { resourceId: string; riskScore: number };
  averageRiskScore: number;
}

/** Assessments sorted by descending score, ties by resource id. */
export async function compareRisk(resourceIds: string[], deps: RiskScorerDeps): Promise<RiskComparison> {
  const unique = distinct(resourceIds);
  const assessments = await Promise.all(unique.map((id) => assessRisk(id, deps)));
  assessments.sort((a, b) => b.riskScore - a.riskScore || a.resourceId.localeCompare(b.resourceId));

  const first = assessments[0];
  const last = assessments[assessments.length - 1];
  const total = assessments.reduce((acc, a) => acc + a.riskScore, 0);

  return {
    assessments,
    highest: first ? { resourceId: first.resourceId, riskScore: first.riskScore } : undefined,
    lowest: last ? { resourceId: last.resourceId, riskScore: last.riskScore } : undefined,
    averageRiskScore: assessments.length > 0 ? round2(total / assessments.length) : 0,
  };
}

/** SPOF inventory over the whole catalog, most dependents first. */
export async function findSinglePointsOfFailure(
  catalog: ResourceCatalog,
  deps: RiskScorerDeps,
  batchSize = READ_BATCH_SIZE,
): Promise<RiskAssessment[]> {
  const ids = await catalog.listResourceIds();
  const assessments = await mapInBatches(ids, (id) => assessRisk(id, deps), batchSize);
  return assessments
    .filter((a) => a.singlePointOfFailure)
    .sort((a, b) => b.dependentsCount - a.dependentsCount || a.resourceId.localeCompare(b.resourceId));
}
