import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  closeDriver,
  defaultQueryRunner,
  getDriver,
  isGraphEnabled,
  neo4jQueryRunner,
  type SessionSource,
} from "./graph-client.js";
import { GraphAccessError } from "./errors.js";

describe("graph-client", () => {
  const ORIG_NEO4J_URL = process.env.NEO4J_URL;
  const ORIG_NEO4J_USER = process.env.NEO4J_USER;
  const ORIG_NEO4J_PASSWORD = process.env.NEO4J_PASSWORD;

  beforeEach(() => {
    delete process.env.NEO4J_URL;
    delete process.env.NEO4J_USER;
    delete process.env.NEO4J_PASSWORD;
  });

  afterEach(async () => {
    await closeDriver();
    if (ORIG_NEO4J_URL !== undefined) process.env.NEO4J_URL = ORIG_NEO4J_URL;
    if (ORIG_NEO4J_USER !== undefined) process.env.NEO4J_USER = ORIG_NEO4J_USER;
    if (ORIG_NEO4J_PASSWORD !== undefined) process.env.NEO4J_PASSWORD = ORIG_NEO4J_PASSWORD;
  });

  describe("isGraphEnabled", () => {
    it("returns false when Neo4j is not configured", () => {
      expect(isGraphEnabled()).toBe(false);
    });

    it("returns false when only URL is set", () => {
      process.env.NEO4J_URL = "bolt://localhost:7687";
      expect(isGraphEnabled()).toBe(false);
    });

    it("defaults the user to neo4j", () => {
      expect(
        isGraphEnabled({ NEO4J_URL: "bolt://localhost:7687", NEO4J_PASSWORD: "test-secret" }),
      ).toBe(true);
    });
  });

  describe("getDriver", () => {
    it("returns null when graph is not enabled", () => {
      expect(getDriver()).toBeNull();
    });
  });

  describe("defaultQueryRunner", () => {
    it("rejects with GraphAccessError when Neo4j is not configured", async () => {
      await expect(defaultQueryRunner("RETURN 1", {})).rejects.toBeInstanceOf(GraphAccessError);
    });
  });

  describe("neo4jQueryRunner", () => {
    type Rows = { records: Array<{ toObject(): Record<string, unknown> }> };

    function fakeDriver(run: (cypher: string, params: Record<string, unknown>) => Promise<Rows>) {
      const close = vi.fn(async () => {});
      const d: SessionSource = { session: () => ({ run, close }) };
      return { d, close };
    }

    it("maps records to plain objects and closes the session", async () => {
      const run = vi.fn(async (_cypher: string, _params: Record<string, unknown>): Promise<Rows> => ({
        records: [{ toObject: () => ({ id: "db-1" }) }, { toObject: () => ({ id: "web-1" }) }],
      }));
      const { d, close } = fakeDriver(run);

      const rows = await neo4jQueryRunner(d)("MATCH (r) RETURN r.id AS id", { limit: 2 });

      expect(rows).toEqual([{ id: "db-1" }, { id: "web-1" }]);
      expect(run).toHaveBeenCalledWith("MATCH (r) RETURN r.id AS id", { limit: 2 });
      expect(close).toHaveBeenCalledTimes(1);
    });

    it("closes the session when the query fails", async () => {
      const { d, close } = fakeDriver(async () => {
        throw new Error("connection refused");
      });

      await expect(neo4jQueryRunner(d)("RETURN 1", {})).rejects.toThrow("connection refused");
      expect(close).toHaveBeenCalledTimes(1);
    });
  });
});
