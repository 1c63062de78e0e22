import { describe, it, expect } from "vitest";
import { InvalidConfigurationError } from "../errors.js";
import {
  assertProbabilitiesSumToOne,
  criticalityFor,
  loadCriticalityTable,
  loadDegradationPatterns,
  parseCriticalityTable,
  parseDegradationPatterns,
  patternFor,
} from "./policy-tables.js";

describe("assertProbabilitiesSumToOne", () => {
  it("accepts sums within tolerance", () => {
    expect(() => assertProbabilitiesSumToOne("t", [0.1, 0.2, 0.7])).not.toThrow();
  });

  it("rejects other sums", () => {
    expect(() => assertProbabilitiesSumToOne("t", [0.5, 0.4])).toThrow(
      "t: outcome probabilities sum to 0.900000, expected 1",
    );
  });
});

describe("parseDegradationPatterns", () => {
  const outcome = { outcomeType: "degraded", probability: 1, durationSeconds: 60, affectedPercentage: 50 };

  it("requires a default pattern", () => {
    expect(() => parseDegradationPatterns({ database: { symptoms: ["x"], outcomes: [outcome] } })).toThrow(
      "degradation patterns must define a default pattern",
    );
  });

  it("rejects unknown outcome types", () => {
    expect(() =>
      parseDegradationPatterns({
        default: { symptoms: ["x"], outcomes: [{ ...outcome, outcomeType: "meltdown" }] },
      }),
    ).toThrow(InvalidConfigurationError);
  });

  it("rejects probabilities that do not sum to one", () => {
    expect(() =>
      parseDegradationPatterns({
        default: { symptoms: ["x"], outcomes: [{ ...outcome, probability: 0.6 }] },
      }),
    ).toThrow('degradation pattern "default": outcome probabilities sum to 0.600000, expected 1');
  });

  it("lower-cases resource type keys", () => {
    const patterns = parseDegradationPatterns({
      default: { symptoms: ["x"], outcomes: [outcome] },
      Database: { symptoms: ["Slow queries"], outcomes: [outcome] },
    });
    expect(Object.keys(patterns)).toEqual(["default", "database"]);
    expect(patternFor(patterns, "DATABASE").symptoms).toEqual(["Slow queries"]);
    expect(patternFor(patterns, "queue").symptoms).toEqual(["x"]);
  });
});

describe("parseCriticalityTable", () => {
  it("rejects values outside [0, 100]", () => {
    expect(() => parseCriticalityTable({ default: 10, types: { database: 120 } })).toThrow(
      'criticality for "database" must be within [0, 100]',
    );
  });

  it("falls back to the default for unknown types", () => {
    const table = parseCriticalityTable({ default: 10, types: { Database: 35 } });
    expect(criticalityFor(table, "database")).toBe(35);
    expect(criticalityFor(table, "queue")).toBe(10);
  });
});

describe("bundled tables", () => {
  it("load and validate", () => {
    const patterns = loadDegradationPatterns();
    expect(patterns.default.outcomes.length).toBeGreaterThan(0);
    expect(criticalityFor(loadCriticalityTable(), "database")).toBe(35);
  });
});
