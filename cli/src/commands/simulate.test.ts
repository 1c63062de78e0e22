import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { logger } from "../lib/logger.js";
import type { FailureScenario } from "../lib/types.js";
import { buildSimulateRequest, cmdSimulate } from "./simulate.js";

const scenario: FailureScenario = {
  resourceId: "cache-1",
  resourceName: "session-cache",
  failureType: "full_outage",
  outcomes: [
    {
      outcomeType: "downtime",
      probability: 1,
      durationSeconds: 300,
      affectedPercentage: 100,
      userImpactDescription: "Sessions are lost",
      technicalDetails: "cache unreachable",
    },
  ],
  overallImpact: "high",
  mitigationStrategies: ["Deploy redundant instances across availability zones"],
  monitoringRecommendations: [],
  recoverySteps: ["Restart the cache cluster"],
  cascadeDepth: 1,
  totalAffected: 3,
};

function exitSpy() {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  return vi.spyOn(process, "exit").mockImplementation(() => {
    throw new Error("exit");
  });
}

describe("buildSimulateRequest", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("defaults to a full outage", () => {
    expect(buildSimulateRequest({ id: "cache-1" })).toEqual({ resourceId: "cache-1", failureType: "full_outage" });
  });

  it("parses partial outage zones", () => {
    expect(
      buildSimulateRequest({ id: "cache-1", type: "partial_outage", zones: "a, b", totalZones: "3" }),
    ).toEqual({ resourceId: "cache-1", failureType: "partial_outage", affectedZones: ["a", "b"], totalZones: 3 });
  });

  it("parses load and frequency", () => {
    expect(buildSimulateRequest({ id: "x", type: "degraded_performance", load: "0.5", frequency: "0.2" })).toEqual({
      resourceId: "x",
      failureType: "degraded_performance",
      currentLoad: 0.5,
      failureFrequency: 0.2,
    });
  });

  it("rejects an unknown failure type", () => {
    const exit = exitSpy();
    expect(() => buildSimulateRequest({ id: "x", type: "meteor_strike" })).toThrow("exit");
    expect(exit).toHaveBeenCalledWith(2);
  });

  it("rejects a load above 1", () => {
    const exit = exitSpy();
    expect(() => buildSimulateRequest({ id: "x", load: "1.5" })).toThrow("exit");
    expect(exit).toHaveBeenCalledWith(2);
  });

  it("rejects zero total zones", () => {
    const exit = exitSpy();
    expect(() => buildSimulateRequest({ id: "x", totalZones: "0" })).toThrow("exit");
    expect(exit).toHaveBeenCalledWith(2);
  });
});

describe("simulate command", () => {
  let fetchMock: typeof globalThis.fetch;
  let lines: string[];

  beforeEach(() => {
    fetchMock = globalThis.fetch;
    lines = [];
    vi.spyOn(console, "log").mockImplementation((msg: unknown) => {
      lines.push(String(msg));
    });
    logger.setOptions({ quiet: false, json: false });
  });

  afterEach(() => {
    globalThis.fetch = fetchMock;
    vi.restoreAllMocks();
  });

  it("posts the request and prints outcomes", async () => {
    let method = "";
    let body: unknown;
    globalThis.fetch = async (url: string | URL | Request, init?: RequestInit) => {
      expect(String(url)).toBe("http://localhost:8080/risk/simulate");
      method = init?.method ?? "";
      body = JSON.parse(String(init?.body));
      return new Response(JSON.stringify(scenario), {
        status: 200,
        headers: { "content-type": "application/json" },
      });
    };

    await cmdSimulate({ id: "cache-1", type: "full_outage", api: "http://localhost:8080" });

    expect(method).toBe("POST");
    expect(body).toEqual({ resourceId: "cache-1", failureType: "full_outage" });
    expect(lines).toContain("Overall impact: high");
    expect(lines).toContain("  - downtime: p=100.0%, 5m, 100.0% affected");
    expect(lines).toContain("\n=== Recovery steps ===");
    expect(lines).not.toContain("\n=== Monitoring ===");
  });

  it("reports validation errors from the server", async () => {
    globalThis.fetch = async () =>
      new Response(
        JSON.stringify({ error: "Invalid configuration: affectedZones (4) must not exceed totalZones (3)" }),
        { status: 400, headers: { "content-type": "application/json" } },
      );

    await expect(
      cmdSimulate({ id: "cache-1", type: "partial_outage", zones: "a,b,c,d", totalZones: "3" }),
    ).rejects.toThrow("Simulation failed: 400 Invalid configuration: affectedZones (4) must not exceed totalZones (3)");
  });
});
