import type { AnalysisConfig } from "../config.js";
import type { AnalysisDeps } from "./deps.js";
import type { DependencyEdge } from "./graph-accessor.js";
import { pathResourceIds, pathStrength, traverse, type ReachedResource } from "./traverser.js";

export type UserImpact = "low" | "medium" | "high";

export interface AffectedResource {
  id: string;
  name: string;
  resourceType: string;
  cloudProvider: string;
  distance: number;
  /** Product of edge strengths between this resource and the failing one. */
  pathStrength: number;
}

export interface BlastRadiusReport {
  resourceId: string;
  resourceName: string;
  directlyAffected: AffectedResource[];
  indirectlyAffected: AffectedResource[];
  totalAffected: number;
  estimatedDowntimeSeconds: number;
  /** From the most exposed affected resource back to `resourceId`. */
  criticalPath: string[];
  userImpact: UserImpact;
  cascadeDepth: number;
  affectedServices: Record<string, number>;
}

export interface BlastRadiusOptions {
  maxDepth?: number;
  /** Restrict propagation to edges of these categories. */
  categories?: string[];
}

export function classifyUserImpact(totalAffected: number, config: AnalysisConfig): UserImpact {
  const { lowMax, mediumMax } = config.impactThresholds;
  if (totalAffected <= lowMax) return "low";
  if (totalAffected <= mediumMax) return "medium";
  return "high";
}

/**
 * downtime = base × (1 + weightedAffected / scale), capped at maxDowntimeSeconds.
 * Zero when nothing is affected.
 */
export function estimateDowntimeSeconds(weightedAffected: number, totalAffected: number, config: AnalysisConfig): number {
  if (totalAffected === 0) return 0;
  const estimate = config.baseDowntimeSeconds * (1 + weightedAffected / config.downtimeScale);
  return Math.min(config.maxDowntimeSeconds, Math.round(estimate));
}

function pickCriticalResource(reached: ReachedResource[]): ReachedResource | undefined {
  let best: ReachedResource | undefined;
  let bestStrength = -1;
  for (const candidate of reached) {
    const strength = pathStrength(candidate.path);
    if (
      !best ||
      candidate.distance > best.distance ||
      (candidate.distance === best.distance && strength > bestStrength)
    ) {
      best = candidate;
      bestStrength = strength;
    }
  }
  return best;
}

export function categoryFilter(categories?: string[]): ((edge: DependencyEdge) => boolean) | undefined {
  if (!categories || categories.length === 0) return undefined;
  const allowed = new Set(categories);
  return (edge) => allowed.has(edge.category);
}

/**
 * Everything that depends on `resourceId`, directly or transitively, and
 * would therefore be at risk if it failed.
 */
export async function computeBlastRadius(
  resourceId: string,
  options: BlastRadiusOptions,
  deps: AnalysisDeps,
): Promise<BlastRadiusReport> {
  const { accessor, config } = deps;
  const resource = await accessor.getNode(resourceId);

  const traversal = await traverse(accessor, resourceId, {
    direction: "incoming",
    maxDepth: options.maxDepth ?? config.maxTraversalDepth,
    kinds: config.dependencyKinds,
    edgeFilter: categoryFilter(options.categories),
  });

  const reached = Array.from(traversal.reached.values());
  const nodes = await Promise.all(reached.map((r) => accessor.getNode(r.resourceId)));

  const directlyAffected: AffectedResource[] = [];
  const indirectlyAffected: AffectedResource[] = [];
  const affectedServices: Record<string, number> = {};
  let weightedAffected = 0;
  let cascadeDepth = 0;

  reached.forEach((r, i) => {
    const node = nodes[i];
    const strength = pathStrength(r.path);
    const affected: AffectedResource = {
      id: node.id,
      name: node.name,
      resourceType: node.resourceType,
      cloudProvider: node.cloudProvider,
      distance: r.distance,
      pathStrength: strength,
    };
    if (r.distance === 1) directlyAffected.push(affected);
    else indirectlyAffected.push(affected);

    weightedAffected += strength;
    cascadeDepth = Math.max(cascadeDepth, r.distance);
    affectedServices[node.resourceType] = (affectedServices[node.resourceType] ?? 0) + 1;
  });

  const totalAffected = directlyAffected.length + indirectlyAffected.length;
  const critical = pickCriticalResource(reached);
  const criticalPath = critical
    ? pathResourceIds(resourceId, critical, "incoming").reverse()
    : [resourceId];

  deps.log?.debug(
    { resourceId, totalAffected, weightedAffected, cascadeDepth },
    "blast radius computed",
  );

  return {
    resourceId,
    resourceName: resource.name,
    directlyAffected,
    indirectlyAffected,
    totalAffected,
    estimatedDowntimeSeconds: estimateDowntimeSeconds(weightedAffected, totalAffected, config),
    criticalPath,
    userImpact: classifyUserImpact(totalAffected, config),
    cascadeDepth,
    affectedServices,
  };
}
