import { describe, it, expect } from "vitest";
import {
  collectConfigErrors,
  createAnalysisConfig,
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_DEPLOYMENT_SCHEDULE,
  loadAnalysisConfig,
  loadDeploymentSchedule,
  parseTimeWindow,
} from "./config.js";
import { InvalidConfigurationError } from "./errors.js";

describe("createAnalysisConfig", () => {
  it("returns the defaults without overrides", () => {
    expect(createAnalysisConfig()).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("merges nested overrides", () => {
    const config = createAnalysisConfig({
      impactThresholds: { lowMax: 2, mediumMax: 8 },
      spofDependentsThreshold: 3,
    });

    expect(config.impactThresholds).toEqual({ lowMax: 2, mediumMax: 8 });
    expect(config.spofDependentsThreshold).toBe(3);
    expect(config.riskWeights).toEqual(DEFAULT_ANALYSIS_CONFIG.riskWeights);
  });

  it("throws instead of clamping invalid values", () => {
    expect(() => createAnalysisConfig({ maxTraversalDepth: -1 })).toThrow(InvalidConfigurationError);
    expect(() => createAnalysisConfig({ maxTraversalDepth: -1 })).toThrow(
      "maxTraversalDepth must be a non-negative integer, got -1",
    );
  });
});

describe("collectConfigErrors", () => {
  it("reports every problem", () => {
    const errors = collectConfigErrors({
      ...DEFAULT_ANALYSIS_CONFIG,
      downtimeScale: 0,
      impactThresholds: { lowMax: 10, mediumMax: 5 },
      dependencyKinds: ["DEPENDS_ON", "REDUNDANT_WITH"],
    });

    expect(errors).toEqual([
      "downtimeScale must be a positive number, got 0",
      "impactThresholds.mediumMax must be an integer >= lowMax, got 5",
      "redundancyKinds overlap dependencyKinds: REDUNDANT_WITH",
    ]);
  });
});

describe("loadAnalysisConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadAnalysisConfig({})).toEqual(DEFAULT_ANALYSIS_CONFIG);
  });

  it("reads TOPDECK_* overrides", () => {
    const config = loadAnalysisConfig({
      TOPDECK_MAX_TRAVERSAL_DEPTH: "3",
      TOPDECK_SPOF_DEPENDENTS_THRESHOLD: "2",
      TOPDECK_RISK_WEIGHT_SPOF: "25",
      TOPDECK_DEPENDENCY_KINDS: "DEPENDS_ON, USES,",
    });

    expect(config.maxTraversalDepth).toBe(3);
    expect(config.spofDependentsThreshold).toBe(2);
    expect(config.riskWeights.spofBonus).toBe(25);
    expect(config.dependencyKinds).toEqual(["DEPENDS_ON", "USES"]);
  });

  it("ignores blank values", () => {
    expect(loadAnalysisConfig({ TOPDECK_MAX_TRAVERSAL_DEPTH: "  " }).maxTraversalDepth).toBe(5);
  });

  it("rejects non-numeric values", () => {
    expect(() => loadAnalysisConfig({ TOPDECK_DOWNTIME_SCALE: "fast" })).toThrow(
      'TOPDECK_DOWNTIME_SCALE must be numeric, got "fast"',
    );
  });
});

describe("parseTimeWindow", () => {
  it("converts HH:MM-HH:MM to minutes of the day", () => {
    expect(parseTimeWindow("02:30-04:00")).toEqual({ start: 150, end: 240 });
    expect(parseTimeWindow(" 22:00-01:15 ")).toEqual({ start: 1320, end: 75 });
  });

  it("rejects hours past 23", () => {
    expect(() => parseTimeWindow("24:00-01:00", "TOPDECK_PEAK_HOURS")).toThrow(
      'TOPDECK_PEAK_HOURS must look like HH:MM-HH:MM, got "24:00-01:00"',
    );
  });
});

describe("loadDeploymentSchedule", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadDeploymentSchedule({})).toEqual(DEFAULT_DEPLOYMENT_SCHEDULE);
  });

  it("reads windows and holidays", () => {
    const schedule = loadDeploymentSchedule({
      TOPDECK_PEAK_HOURS: "11:00-15:00",
      TOPDECK_MAINTENANCE_WINDOWS: "02:00-04:00, 21:30-22:00",
      TOPDECK_HOLIDAYS: "2026-12-25",
    });

    expect(schedule.peakHours).toEqual({ start: 660, end: 900 });
    expect(schedule.businessHours).toEqual(DEFAULT_DEPLOYMENT_SCHEDULE.businessHours);
    expect(schedule.maintenanceWindows).toEqual([
      { start: 120, end: 240 },
      { start: 1290, end: 1320 },
    ]);
    expect(schedule.holidays).toEqual(["2026-12-25"]);
  });

  it("rejects malformed holidays", () => {
    expect(() => loadDeploymentSchedule({ TOPDECK_HOLIDAYS: "25/12/2026" })).toThrow(InvalidConfigurationError);
  });
});
