import { describe, it, expect, vi } from "vitest";
import { GraphAccessError, ResourceNotFoundError } from "../errors.js";
import type { CypherRunner } from "../graph-client.js";
import { categoryForKind, Neo4jGraphAccessor } from "./neo4j-graph-accessor.js";

function accessorWith(rows: Array<Record<string, unknown>>) {
  const run = vi.fn<CypherRunner>(async () => rows);
  return { run, accessor: new Neo4jGraphAccessor(run, { defaultStrength: 0.5 }) };
}

describe("Neo4jGraphAccessor", () => {
  describe("getNode", () => {
    it("maps the resource row", async () => {
      const { accessor, run } = accessorWith([
        {
          id: "db-1",
          name: "orders-db",
          resourceType: "database",
          cloudProvider: "azure",
          attributes: { id: "db-1", backup_enabled: false },
        },
      ]);

      const node = await accessor.getNode("db-1");

      expect(node).toEqual({
        id: "db-1",
        name: "orders-db",
        resourceType: "database",
        cloudProvider: "azure",
        attributes: { id: "db-1", backup_enabled: false },
      });
      expect(run.mock.calls[0][1]).toEqual({ id: "db-1" });
    });

    it("rejects with ResourceNotFoundError when no row matches", async () => {
      const { accessor } = accessorWith([]);
      await expect(accessor.getNode("missing")).rejects.toBeInstanceOf(ResourceNotFoundError);
    });
  });

  describe("edges", () => {
    it("returns sorted edges and derives missing categories from the kind", async () => {
      const { accessor, run } = accessorWith([
        { sourceId: "web-2", targetId: "db-1", kind: "READS_FROM", category: null, strength: 0.8 },
        { sourceId: "web-1", targetId: "db-1", kind: "DEPENDS_ON", category: "data", strength: 1 },
      ]);

      const edges = await accessor.getIncomingEdges("db-1", ["DEPENDS_ON", "READS_FROM"]);

      expect(edges).toEqual([
        { sourceId: "web-1", targetId: "db-1", kind: "DEPENDS_ON", category: "data", strength: 1 },
        { sourceId: "web-2", targetId: "db-1", kind: "READS_FROM", category: "data", strength: 0.8 },
      ]);
      expect(run.mock.calls[0][1]).toEqual({
        id: "db-1",
        kinds: ["DEPENDS_ON", "READS_FROM"],
        defaultStrength: 0.5,
      });
    });

    it("passes null kinds when no filter is given", async () => {
      const { accessor, run } = accessorWith([
        { sourceId: "web-1", targetId: null, kind: null, category: null, strength: 0.5 },
      ]);

      const edges = await accessor.getOutgoingEdges("web-1");

      expect(edges).toEqual([]);
      expect(run.mock.calls[0][1]).toEqual({ id: "web-1", kinds: null, defaultStrength: 0.5 });
    });

    it("rejects with ResourceNotFoundError when the resource is missing", async () => {
      const { accessor } = accessorWith([]);
      await expect(accessor.getOutgoingEdges("missing")).rejects.toBeInstanceOf(ResourceNotFoundError);
    });

    it("rejects rows with an out-of-range strength", async () => {
      const { accessor } = accessorWith([
        { sourceId: "a", targetId: "b", kind: "DEPENDS_ON", category: null, strength: 2 },
      ]);
      await expect(accessor.getOutgoingEdges("a")).rejects.toBeInstanceOf(GraphAccessError);
    });
  });

  it("wraps runner failures in GraphAccessError", async () => {
    const run = vi.fn<CypherRunner>(async () => {
      throw new Error("ServiceUnavailable");
    });
    const accessor = new Neo4jGraphAccessor(run, { defaultStrength: 0.5 });

    const err = await accessor.getNode("db-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GraphAccessError);
    expect(err).toHaveProperty("message", "Neo4j query failed: ServiceUnavailable");
  });

  it("lists resource ids from the catalog query", async () => {
    const { accessor } = accessorWith([{ id: "a" }, { id: "b" }, { id: null }]);
    expect(await accessor.listResourceIds()).toEqual(["a", "b"]);
  });

  it("maps relationship kinds to categories", () => {
    expect(categoryForKind("CONNECTS_TO")).toBe("network");
    expect(categoryForKind("AUTHENTICATES_WITH")).toBe("configuration");
    expect(categoryForKind("SOMETHING_ELSE")).toBe("compute");
  });
});
