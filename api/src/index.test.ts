import { describe, it, expect } from "vitest";
import { validateConfig } from "./index.js";

const VALID_ENV = {
  NEO4J_URL: "bolt://localhost:7687",
  NEO4J_PASSWORD: "test-secret",
};

describe("validateConfig", () => {
  it("returns no errors for a complete environment", () => {
    expect(validateConfig(VALID_ENV)).toEqual([]);
  });

  it("requires NEO4J_URL and NEO4J_PASSWORD", () => {
    const errors = validateConfig({});
    expect(errors).toEqual([
      "NEO4J_URL is required (e.g., bolt://localhost:7687)",
      "NEO4J_PASSWORD is required",
    ]);
  });

  it("rejects an out-of-range PORT", () => {
    const errors = validateConfig({ ...VALID_ENV, PORT: "70000" });
    expect(errors).toEqual(["PORT must be an integer between 1 and 65535, got 70000"]);
  });

  it("reports non-numeric analysis settings", () => {
    const errors = validateConfig({ ...VALID_ENV, TOPDECK_MAX_TRAVERSAL_DEPTH: "deep" });
    expect(errors).toEqual(['TOPDECK_MAX_TRAVERSAL_DEPTH must be numeric, got "deep"']);
  });

  it("reports out-of-range analysis settings", () => {
    const errors = validateConfig({ ...VALID_ENV, TOPDECK_DEFAULT_EDGE_STRENGTH: "1.5" });
    expect(errors).toEqual(["defaultEdgeStrength must be within [0, 1], got 1.5"]);
  });

  it("reports malformed deployment windows", () => {
    const errors = validateConfig({ ...VALID_ENV, TOPDECK_MAINTENANCE_WINDOWS: "2am-4am" });
    expect(errors).toEqual(['TOPDECK_MAINTENANCE_WINDOWS must look like HH:MM-HH:MM, got "2am-4am"']);
  });
});
