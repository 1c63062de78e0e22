import { readFileSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { InvalidConfigurationError } from "../errors.js";

export const PROBABILITY_TOLERANCE = 1e-6;

export type OutcomeType =
  | "downtime"
  | "degraded"
  | "blip"
  | "timeout"
  | "error_rate"
  | "partial_outage";

const OUTCOME_TYPES: readonly OutcomeType[] = [
  "downtime",
  "degraded",
  "blip",
  "timeout",
  "error_rate",
  "partial_outage",
];

export interface OutcomeTemplate {
  outcomeType: OutcomeType;
  probability: number;
  durationSeconds: number;
  affectedPercentage: number;
}

export interface DegradationPattern {
  symptoms: string[];
  outcomes: OutcomeTemplate[];
}

export interface CriticalityTable {
  default: number;
  types: Record<string, number>;
}

function dataDir(): string {
  return join(dirname(fileURLToPath(import.meta.url)), "..", "..", "data");
}

function readJson(fileName: string): unknown {
  return JSON.parse(readFileSync(join(dataDir(), fileName), "utf-8"));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isOutcomeType(value: unknown): value is OutcomeType {
  return OUTCOME_TYPES.some((t) => t === value);
}

/** Rejects any probability table whose weights do not sum to 1. */
export function assertProbabilitiesSumToOne(label: string, probabilities: readonly number[]): void {
  const sum = probabilities.reduce((acc, p) => acc + p, 0);
  if (Math.abs(sum - 1) > PROBABILITY_TOLERANCE) {
    throw new InvalidConfigurationError(
      `${label}: outcome probabilities sum to ${sum.toFixed(6)}, expected 1`,
    );
  }
}

function parseOutcome(label: string, raw: unknown): OutcomeTemplate {
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError(`${label}: outcome must be an object`);
  }
  const { outcomeType, probability, durationSeconds, affectedPercentage } = raw;
  if (!isOutcomeType(outcomeType)) {
    throw new InvalidConfigurationError(`${label}: unknown outcomeType ${String(outcomeType)}`);
  }
  if (typeof probability !== "number" || probability < 0 || probability > 1) {
    throw new InvalidConfigurationError(`${label}: probability must be within [0, 1]`);
  }
  if (typeof durationSeconds !== "number" || durationSeconds < 0) {
    throw new InvalidConfigurationError(`${label}: durationSeconds must be a non-negative number`);
  }
  if (typeof affectedPercentage !== "number" || affectedPercentage < 0 || affectedPercentage > 100) {
    throw new InvalidConfigurationError(`${label}: affectedPercentage must be within [0, 100]`);
  }
  return { outcomeType, probability, durationSeconds, affectedPercentage };
}

export function parseDegradationPatterns(raw: unknown): Record<string, DegradationPattern> {
  if (!isRecord(raw)) {
    throw new InvalidConfigurationError("degradation patterns must be an object keyed by resource type");
  }
  if (!("default" in raw)) {
    throw new InvalidConfigurationError("degradation patterns must define a default pattern");
  }

  const patterns: Record<string, DegradationPattern> = {};
  for (const [resourceType, entry] of Object.entries(raw)) {
    const label = `degradation pattern "${resourceType}"`;
    if (!isRecord(entry) || !Array.isArray(entry.outcomes) || entry.outcomes.length === 0) {
      throw new InvalidConfigurationError(`${label}: outcomes must be a non-empty array`);
    }
    const symptoms = Array.isArray(entry.symptoms)
      ? entry.symptoms.filter((s): s is string => typeof s === "string")
      : [];
    if (symptoms.length === 0) {
      throw new InvalidConfigurationError(`${label}: at least one symptom is required`);
    }
    const outcomes = entry.outcomes.map((o: unknown) => parseOutcome(label, o));
    assertProbabilitiesSumToOne(label, outcomes.map((o) => o.probability));
    patterns[resourceType.toLowerCase()] = { symptoms, outcomes };
  }
  return patterns;
}

export function parseCriticalityTable(raw: unknown): CriticalityTable {
  if (!isRecord(raw) || typeof raw.default !== "number" || !isRecord(raw.types)) {
    throw new InvalidConfigurationError("criticality table must have a numeric default and a types map");
  }
  const types: Record<string, number> = {};
  for (const [resourceType, value] of Object.entries(raw.types)) {
    if (typeof value !== "number" || value < 0 || value > 100) {
      throw new InvalidConfigurationError(`criticality for "${resourceType}" must be within [0, 100]`);
    }
    types[resourceType.toLowerCase()] = value;
  }
  return { default: raw.default, types };
}

export function loadDegradationPatterns(): Record<string, DegradationPattern> {
  return parseDegradationPatterns(readJson("degradation-patterns.json"));
}

export function loadCriticalityTable(): CriticalityTable {
  return parseCriticalityTable(readJson("resource-criticality.json"));
}

export function criticalityFor(table: CriticalityTable, resourceType: string): number {
  return table.types[resourceType.toLowerCase()] ?? table.default;
}

export function patternFor(
  patterns: Record<string, DegradationPattern>,
  resourceType: string,
): DegradationPattern {
  const pattern = patterns[resourceType.toLowerCase()] ?? patterns["default"];
  if (!pattern) {
    throw new InvalidConfigurationError("degradation patterns must define a default pattern");
  }
  return pattern;
}
