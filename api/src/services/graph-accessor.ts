/**
 * GraphAccessor interface and domain types for the resource graph.
 * Implementations provide all graph data access; callers never query directly.
 */

export interface Resource {
  id: string;
  name: string;
  resourceType: string;
  cloudProvider: string;
  /** Free-form discovery properties (backup_enabled, has_nsg, ...). */
  attributes: Record<string, unknown>;
}

export type EdgeCategory = "data" | "network" | "configuration" | "compute" | (string & {});

export interface DependencyEdge {
  sourceId: string;
  targetId: string;
  /** Relationship type, e.g. DEPENDS_ON, CONNECTS_TO, REDUNDANT_WITH. */
  kind: string;
  category: EdgeCategory;
  /** Criticality of the edge in [0, 1]; higher is more critical. */
  strength: number;
}

/**
 * Read-only view over a graph snapshot. Every operation rejects with
 * ResourceNotFoundError when `id` is absent and with GraphAccessError
 * when the backing store cannot be read.
 */
export interface GraphAccessor {
  getNode(id: string): Promise<Resource>;
  getOutgoingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]>;
  getIncomingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]>;
}

export interface ResourceCatalog {
  listResourceIds(): Promise<string[]>;
}

export function compareEdges(a: DependencyEdge, b: DependencyEdge): number {
  return (
    a.sourceId.localeCompare(b.sourceId) ||
    a.targetId.localeCompare(b.targetId) ||
    a.kind.localeCompare(b.kind)
  );
}
