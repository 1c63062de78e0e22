import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { logger } from "../lib/logger.js";
import type { ChangeRiskAssessment } from "../lib/types.js";
import { cmdChangeRisk } from "./change-risk.js";

const change: ChangeRiskAssessment = {
  resourceId: "db-1",
  baseRiskScore: 40,
  adjustedRiskScore: 16.8,
  riskLevel: "low",
  timing: {
    at: "2026-10-24T02:00:00.000Z",
    dayType: "weekend",
    window: "low_traffic",
    multiplier: 0.42,
    rating: "excellent",
    recommendation: "Excellent time to deploy: low traffic and reduced risk",
  },
};

describe("change-risk command", () => {
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

  it("normalizes the timestamp and prints the adjusted score", async () => {
    let requested = "";
    globalThis.fetch = async (url: string | URL | Request) => {
      requested = String(url);
      return new Response(JSON.stringify(change), { status: 200 });
    };

    await cmdChangeRisk({ id: "db-1", at: "2026-10-24T04:00:00+02:00", api: "http://localhost:8080" });

    expect(requested).toBe(
      "http://localhost:8080/risk/resources/db-1/change-risk?at=2026-10-24T02%3A00%3A00.000Z",
    );
    expect(lines).toContain("When: 2026-10-24T02:00:00.000Z (weekend, low traffic)");
    expect(lines).toContain("Score: 40 -> 16.8 (x0.42, low)");
  });

  it("omits the timestamp when none is given", async () => {
    let requested = "";
    globalThis.fetch = async (url: string | URL | Request) => {
      requested = String(url);
      return new Response(JSON.stringify(change), { status: 200 });
    };

    await cmdChangeRisk({ id: "db-1", api: "http://localhost:8080" });

    expect(requested).toBe("http://localhost:8080/risk/resources/db-1/change-risk");
  });

  it("exits on an unparseable timestamp", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("exit");
    });

    await expect(cmdChangeRisk({ id: "db-1", at: "next tuesday" })).rejects.toThrow("exit");
    expect(exit).toHaveBeenCalledWith(2);
  });
});
