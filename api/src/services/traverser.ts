import { InvalidConfigurationError } from "../errors.js";
import { mapInBatches } from "./deps.js";
import type { DependencyEdge, GraphAccessor } from "./graph-accessor.js";

export const DEFAULT_MAX_DEPTH = 5;

export type TraversalDirection = "outgoing" | "incoming" | "both";

export interface TraversalOptions {
  direction: TraversalDirection;
  maxDepth?: number;
  /** Only edges passing the predicate are expanded. */
  edgeFilter?: (edge: DependencyEdge) => boolean;
  /** Relationship kinds fetched from the accessor; all kinds when omitted. */
  kinds?: readonly string[];
  /** Resources treated as removed from the graph: never recorded, never expanded. */
  excludeIds?: ReadonlySet<string>;
}

export interface ReachedResource {
  resourceId: string;
  distance: number;
  /** Edges from the origin outward; path[0] is the edge leaving the origin. */
  path: DependencyEdge[];
  viaEdge: DependencyEdge;
}

export interface TraversalResult {
  originId: string;
  direction: TraversalDirection;
  maxDepth: number;
  /** Keyed by resource id, in BFS discovery order. Never contains the origin. */
  reached: Map<string, ReachedResource>;
}

interface FrontierEntry {
  id: string;
  path: DependencyEdge[];
}

export function assertValidDepth(maxDepth: number): void {
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidConfigurationError(`maxDepth must be a non-negative integer, got ${maxDepth}`);
  }
}

async function edgesFor(
  accessor: GraphAccessor,
  id: string,
  direction: TraversalDirection,
  kinds?: readonly string[],
): Promise<DependencyEdge[]> {
  switch (direction) {
    case "outgoing":
      return accessor.getOutgoingEdges(id, kinds);
    case "incoming":
      return accessor.getIncomingEdges(id, kinds);
    case "both": {
      const [out, inc] = await Promise.all([
        accessor.getOutgoingEdges(id, kinds),
        accessor.getIncomingEdges(id, kinds),
      ]);
      return [...out, ...inc];
    }
  }
}

function neighborOf(edge: DependencyEdge, current: string, direction: TraversalDirection): string {
  if (direction === "outgoing") return edge.targetId;
  if (direction === "incoming") return edge.sourceId;
  return edge.sourceId === current ? edge.targetId : edge.sourceId;
}

/**
 * Breadth-first walk from `originId`, one edge-hop per level, bounded by
 * `maxDepth`. Each resource is recorded once at its minimum distance with the
 * first path discovered at that distance.
 *
 * Edges for a whole level are fetched concurrently but processed in frontier
 * order, so the result only depends on the accessor's edge ordering.
 */
export async function traverse(
  accessor: GraphAccessor,
  originId: string,
  options: TraversalOptions,
): Promise<TraversalResult> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  assertValidDepth(maxDepth);

  // NotFound for the origin is terminal; nothing partial is returned.
  await accessor.getNode(originId);

  const { direction, edgeFilter, kinds } = options;
  const excluded = options.excludeIds ?? new Set<string>();
  const reached = new Map<string, ReachedResource>();
  const visited = new Set<string>([originId]);

  let frontier: FrontierEntry[] = [{ id: originId, path: [] }];
  let depth = 0;

  while (frontier.length > 0 && depth < maxDepth) {
    depth++;
    const edgeLists = await mapInBatches(frontier, (entry) => edgesFor(accessor, entry.id, direction, kinds));

    const next: FrontierEntry[] = [];
    frontier.forEach((entry, i) => {
      for (const edge of edgeLists[i]) {
        if (edgeFilter && !edgeFilter(edge)) continue;
        const neighbor = neighborOf(edge, entry.id, direction);
        if (visited.has(neighbor) || excluded.has(neighbor)) continue;

        visited.add(neighbor);
        const path = [...entry.path, edge];
        reached.set(neighbor, {
          resourceId: neighbor,
          distance: depth,
          path,
          viaEdge: path[0],
        });
        next.push({ id: neighbor, path });
      }
    });

    frontier = next;
  }

  return { originId, direction, maxDepth, reached };
}

/** Resource ids along a reached resource's path, starting at the origin. */
export function pathResourceIds(originId: string, reached: ReachedResource, direction: TraversalDirection): string[] {
  const ids = [originId];
  let current = originId;
  for (const edge of reached.path) {
    current = neighborOf(edge, current, direction);
    ids.push(current);
  }
  return ids;
}

/** Product of edge strengths along the path; 1 for an empty path. */
export function pathStrength(path: readonly DependencyEdge[]): number {
  return path.reduce((acc, edge) => acc * edge.strength, 1);
}
