import { describe, it, expect } from "vitest";
import { ResourceNotFoundError } from "../errors.js";
import { InMemoryGraph } from "./in-memory-graph.js";

describe("InMemoryGraph", () => {
  it("fills resource defaults", async () => {
    const graph = new InMemoryGraph({ resources: [{ id: "db" }], edges: [] });

    expect(await graph.getNode("db")).toEqual({
      id: "db",
      name: "db",
      resourceType: "unknown",
      cloudProvider: "unknown",
      attributes: {},
    });
  });

  it("registers unknown edge endpoints", async () => {
    const graph = new InMemoryGraph().addEdge({ sourceId: "web", targetId: "db" });

    expect(await graph.listResourceIds()).toEqual(["db", "web"]);
    expect(await graph.getIncomingEdges("db")).toEqual([
      { sourceId: "web", targetId: "db", kind: "DEPENDS_ON", category: "compute", strength: 1 },
    ]);
  });

  it("returns edges in a stable order filtered by kind", async () => {
    const graph = new InMemoryGraph({
      resources: [],
      edges: [
        { sourceId: "web", targetId: "db", kind: "READS_FROM" },
        { sourceId: "web", targetId: "cache", kind: "USES" },
        { sourceId: "web", targetId: "web-2", kind: "REDUNDANT_WITH" },
      ],
    });

    const all = await graph.getOutgoingEdges("web");
    const deps = await graph.getOutgoingEdges("web", ["READS_FROM", "USES"]);

    expect(all.map((e) => e.targetId)).toEqual(["cache", "db", "web-2"]);
    expect(deps.map((e) => e.targetId)).toEqual(["cache", "db"]);
  });

  it("rejects strengths outside [0, 1]", () => {
    expect(() => new InMemoryGraph().addEdge({ sourceId: "a", targetId: "b", strength: 1.2 })).toThrow(RangeError);
  });

  it("hands out copies", async () => {
    const graph = new InMemoryGraph({ resources: [{ id: "db", attributes: { tier: "gold" } }], edges: [] });

    const node = await graph.getNode("db");
    node.attributes.tier = "bronze";

    expect((await graph.getNode("db")).attributes).toEqual({ tier: "gold" });
  });

  it("rejects unknown ids", async () => {
    const graph = new InMemoryGraph();
    await expect(graph.getNode("nope")).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(graph.getOutgoingEdges("nope")).rejects.toBeInstanceOf(ResourceNotFoundError);
  });
});
