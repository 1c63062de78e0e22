import { ResourceNotFoundError } from "../errors.js";
import {
  compareEdges,
  type DependencyEdge,
  type GraphAccessor,
  type Resource,
  type ResourceCatalog,
} from "./graph-accessor.js";

export interface ResourceInput {
  id: string;
  name?: string;
  resourceType?: string;
  cloudProvider?: string;
  attributes?: Record<string, unknown>;
}

export interface EdgeInput {
  sourceId: string;
  targetId: string;
  kind?: string;
  category?: string;
  strength?: number;
}

export interface GraphSnapshot {
  resources: ResourceInput[];
  edges: EdgeInput[];
}

function matchesKinds(edge: DependencyEdge, kinds?: readonly string[]): boolean {
  return !kinds || kinds.length === 0 || kinds.includes(edge.kind);
}

/**
 * Adjacency-list graph held in process memory. Used for tests and fixtures;
 * edges are kept sorted so reads are deterministic.
 */
export class InMemoryGraph implements GraphAccessor, ResourceCatalog {
  private readonly resources = new Map<string, Resource>();
  private readonly outgoing = new Map<string, DependencyEdge[]>();
  private readonly incoming = new Map<string, DependencyEdge[]>();

  constructor(snapshot?: GraphSnapshot) {
    if (snapshot) {
      for (const resource of snapshot.resources) this.addResource(resource);
      for (const edge of snapshot.edges) this.addEdge(edge);
    }
  }

  addResource(input: ResourceInput): this {
    this.resources.set(input.id, {
      id: input.id,
      name: input.name ?? input.id,
      resourceType: input.resourceType ?? "unknown",
      cloudProvider: input.cloudProvider ?? "unknown",
      attributes: { ...input.attributes },
    });
    if (!this.outgoing.has(input.id)) this.outgoing.set(input.id, []);
    if (!this.incoming.has(input.id)) this.incoming.set(input.id, []);
    return this;
  }

  /** Adds an edge; unknown endpoints are registered as bare resources. */
  addEdge(input: EdgeInput): this {
    if (!this.resources.has(input.sourceId)) this.addResource({ id: input.sourceId });
    if (!this.resources.has(input.targetId)) this.addResource({ id: input.targetId });

    const strength = input.strength ?? 1;
    if (!Number.isFinite(strength) || strength < 0 || strength > 1) {
      throw new RangeError(
        `Edge ${input.sourceId} -> ${input.targetId} has strength ${strength}; expected [0, 1]`,
      );
    }

    const edge: DependencyEdge = {
      sourceId: input.sourceId,
      targetId: input.targetId,
      kind: input.kind ?? "DEPENDS_ON",
      category: input.category ?? "compute",
      strength,
    };
    this.insertSorted(this.outgoing, edge.sourceId, edge);
    this.insertSorted(this.incoming, edge.targetId, edge);
    return this;
  }

  private insertSorted(index: Map<string, DependencyEdge[]>, key: string, edge: DependencyEdge): void {
    const list = index.get(key) ?? [];
    list.push(edge);
    list.sort(compareEdges);
    index.set(key, list);
  }

  private requireEdges(index: Map<string, DependencyEdge[]>, id: string): DependencyEdge[] {
    const edges = index.get(id);
    if (!edges) throw new ResourceNotFoundError(id);
    return edges;
  }

  async getNode(id: string): Promise<Resource> {
    const resource = this.resources.get(id);
    if (!resource) throw new ResourceNotFoundError(id);
    return { ...resource, attributes: { ...resource.attributes } };
  }

  async getOutgoingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]> {
    return this.requireEdges(this.outgoing, id)
      .filter((edge) => matchesKinds(edge, kinds))
      .map((edge) => ({ ...edge }));
  }

  async getIncomingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]> {
    return this.requireEdges(this.incoming, id)
      .filter((edge) => matchesKinds(edge, kinds))
      .map((edge) => ({ ...edge }));
  }

  async listResourceIds(): Promise<string[]> {
    return Array.from(this.resources.keys()).sort();
  }
}
