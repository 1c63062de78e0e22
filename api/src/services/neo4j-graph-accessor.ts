import type { CypherRunner } from "../graph-client.js";
import { GraphAccessError, ResourceNotFoundError } from "../errors.js";
import {
  compareEdges,
  type DependencyEdge,
  type EdgeCategory,
  type GraphAccessor,
  type Resource,
  type ResourceCatalog,
} from "./graph-accessor.js";

const KIND_CATEGORIES: Record<string, EdgeCategory> = {
  READS_FROM: "data",
  WRITES_TO: "data",
  ACCESSES: "data",
  CONNECTS_TO: "network",
  ROUTES_TO: "network",
  AUTHENTICATES_WITH: "configuration",
  USES: "configuration",
  DEPENDS_ON: "compute",
};

export function categoryForKind(kind: string): EdgeCategory {
  return KIND_CATEGORIES[kind] ?? "compute";
}

const NODE_QUERY = `
MATCH (r {id: $id})
RETURN r.id AS id,
       coalesce(r.name, r.id) AS name,
       coalesce(r.resource_type, labels(r)[0], 'unknown') AS resourceType,
       coalesce(r.cloud_provider, 'unknown') AS cloudProvider,
       properties(r) AS attributes
LIMIT 1
`;

// OPTIONAL MATCH keeps one all-null row for a resource without edges, so
// zero rows means the resource itself is missing.
const OUTGOING_QUERY = `
MATCH (r {id: $id})
OPTIONAL MATCH (r)-[rel]->(other)
WHERE $kinds IS NULL OR type(rel) IN $kinds
RETURN r.id AS sourceId, other.id AS targetId, type(rel) AS kind,
       rel.category AS category, toFloat(coalesce(rel.strength, $defaultStrength)) AS strength
`;

const INCOMING_QUERY = `
MATCH (r {id: $id})
OPTIONAL MATCH (other)-[rel]->(r)
WHERE $kinds IS NULL OR type(rel) IN $kinds
RETURN other.id AS sourceId, r.id AS targetId, type(rel) AS kind,
       rel.category AS category, toFloat(coalesce(rel.strength, $defaultStrength)) AS strength
`;

const CATALOG_QUERY = `
MATCH (r)
WHERE r.id IS NOT NULL
RETURN DISTINCT r.id AS id
ORDER BY id
`;

export interface Neo4jGraphAccessorOptions {
  /** Strength assumed for relationships without a `strength` property. */
  defaultStrength: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resource graph backed by Neo4j. Resources are matched by their `id`
 * property; every read goes through the injected runner.
 */
export class Neo4jGraphAccessor implements GraphAccessor, ResourceCatalog {
  constructor(
    private readonly run: CypherRunner,
    private readonly options: Neo4jGraphAccessorOptions,
  ) {}

  private async query(cypher: string, params: Record<string, unknown>): Promise<Array<Record<string, unknown>>> {
    try {
      return await this.run(cypher, params);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new GraphAccessError(`Neo4j query failed: ${message}`, { cause: err });
    }
  }

  async getNode(id: string): Promise<Resource> {
    const rows = await this.query(NODE_QUERY, { id });
    if (rows.length === 0) throw new ResourceNotFoundError(id);

    const { name, resourceType, cloudProvider, attributes } = rows[0];
    if (typeof name !== "string" || typeof resourceType !== "string" || typeof cloudProvider !== "string") {
      throw new GraphAccessError(`Malformed resource row for ${id}`);
    }
    return {
      id,
      name,
      resourceType,
      cloudProvider,
      attributes: isRecord(attributes) ? { ...attributes } : {},
    };
  }

  getOutgoingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]> {
    return this.edges(OUTGOING_QUERY, id, kinds);
  }

  getIncomingEdges(id: string, kinds?: readonly string[]): Promise<DependencyEdge[]> {
    return this.edges(INCOMING_QUERY, id, kinds);
  }

  async listResourceIds(): Promise<string[]> {
    const rows = await this.query(CATALOG_QUERY, {});
    return rows.flatMap((row) => (typeof row.id === "string" ? [row.id] : []));
  }

  private async edges(cypher: string, id: string, kinds?: readonly string[]): Promise<DependencyEdge[]> {
    const rows = await this.query(cypher, {
      id,
      kinds: kinds && kinds.length > 0 ? [...kinds] : null,
      defaultStrength: this.options.defaultStrength,
    });
    if (rows.length === 0) throw new ResourceNotFoundError(id);

    const edges: DependencyEdge[] = [];
    for (const row of rows) {
      if (row.kind === null || row.kind === undefined) continue;
      const { sourceId, targetId, kind, category, strength } = row;
      if (
        typeof sourceId !== "string" ||
        typeof targetId !== "string" ||
        typeof kind !== "string" ||
        typeof strength !== "number" ||
        strength < 0 ||
        strength > 1
      ) {
        throw new GraphAccessError(`Malformed relationship row for ${id}`);
      }
      edges.push({
        sourceId,
        targetId,
        kind,
        category: typeof category === "string" ? category : categoryForKind(kind),
        strength,
      });
    }
    return edges.sort(compareEdges);
  }
}
