import { InvalidConfigurationError } from "./errors.js";

export interface ImpactThresholds {
  /** Totals at or below this are "low" user impact. */
  lowMax: number;
  /** Totals at or below this (and above lowMax) are "medium". */
  mediumMax: number;
}

export interface RiskWeights {
  dependents: number;
  spofBonus: number;
  strength: number;
  resourceType: number;
}

export interface AnalysisConfig {
  maxTraversalDepth: number;
  /** A resource needs strictly more dependents than this to be considered a SPOF. */
  spofDependentsThreshold: number;
  baseDowntimeSeconds: number;
  downtimeScale: number;
  maxDowntimeSeconds: number;
  impactThresholds: ImpactThresholds;
  riskWeights: RiskWeights;
  /** Dependents count at which the dependents component saturates. */
  dependentsNormalization: number;
  highDependentsThreshold: number;
  highDependenciesThreshold: number;
  /** Extra outcome duration per affected resource in degraded scenarios. */
  cascadeDurationFactor: number;
  defaultEdgeStrength: number;
  dependencyKinds: string[];
  redundancyKinds: string[];
}

export const DEFAULT_DEPENDENCY_KINDS = [
  "DEPENDS_ON",
  "USES",
  "CONNECTS_TO",
  "ROUTES_TO",
  "ACCESSES",
  "AUTHENTICATES_WITH",
  "READS_FROM",
  "WRITES_TO",
];

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  maxTraversalDepth: 5,
  spofDependentsThreshold: 0,
  baseDowntimeSeconds: 300,
  downtimeScale: 2,
  maxDowntimeSeconds: 3600,
  impactThresholds: { lowMax: 5, mediumMax: 15 },
  riskWeights: { dependents: 40, spofBonus: 30, strength: 20, resourceType: 10 },
  dependentsNormalization: 50,
  highDependentsThreshold: 10,
  highDependenciesThreshold: 10,
  cascadeDurationFactor: 0.1,
  defaultEdgeStrength: 0.5,
  dependencyKinds: DEFAULT_DEPENDENCY_KINDS,
  redundancyKinds: ["REDUNDANT_WITH"],
};

export function createAnalysisConfig(overrides: Partial<AnalysisConfig> = {}): AnalysisConfig {
  const config: AnalysisConfig = {
    ...DEFAULT_ANALYSIS_CONFIG,
    ...overrides,
    impactThresholds: { ...DEFAULT_ANALYSIS_CONFIG.impactThresholds, ...overrides.impactThresholds },
    riskWeights: { ...DEFAULT_ANALYSIS_CONFIG.riskWeights, ...overrides.riskWeights },
  };
  validateAnalysisConfig(config);
  return config;
}

/**
 * Throws InvalidConfigurationError on the first problem found.
 * Values are never clamped into range.
 */
export function validateAnalysisConfig(config: AnalysisConfig): void {
  const errors = collectConfigErrors(config);
  if (errors.length > 0) {
    throw new InvalidConfigurationError(errors[0]);
  }
}

export function collectConfigErrors(config: AnalysisConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.maxTraversalDepth) || config.maxTraversalDepth < 0) {
    errors.push(`maxTraversalDepth must be a non-negative integer, got ${config.maxTraversalDepth}`);
  }
  if (!Number.isInteger(config.spofDependentsThreshold) || config.spofDependentsThreshold < 0) {
    errors.push(`spofDependentsThreshold must be a non-negative integer, got ${config.spofDependentsThreshold}`);
  }
  for (const key of ["baseDowntimeSeconds", "maxDowntimeSeconds", "cascadeDurationFactor"] as const) {
    if (!Number.isFinite(config[key]) || config[key] < 0) {
      errors.push(`${key} must be a non-negative number, got ${config[key]}`);
    }
  }
  for (const key of ["downtimeScale", "dependentsNormalization"] as const) {
    if (!Number.isFinite(config[key]) || config[key] <= 0) {
      errors.push(`${key} must be a positive number, got ${config[key]}`);
    }
  }
  for (const key of ["highDependentsThreshold", "highDependenciesThreshold"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 0) {
      errors.push(`${key} must be a non-negative integer, got ${config[key]}`);
    }
  }
  if (
    !Number.isFinite(config.defaultEdgeStrength) ||
    config.defaultEdgeStrength < 0 ||
    config.defaultEdgeStrength > 1
  ) {
    errors.push(`defaultEdgeStrength must be within [0, 1], got ${config.defaultEdgeStrength}`);
  }

  const { lowMax, mediumMax } = config.impactThresholds;
  if (!Number.isInteger(lowMax) || lowMax < 0) {
    errors.push(`impactThresholds.lowMax must be a non-negative integer, got ${lowMax}`);
  }
  if (!Number.isInteger(mediumMax) || mediumMax < lowMax) {
    errors.push(`impactThresholds.mediumMax must be an integer >= lowMax, got ${mediumMax}`);
  }

  for (const [name, weight] of Object.entries(config.riskWeights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      errors.push(`riskWeights.${name} must be a non-negative number, got ${weight}`);
    }
  }

  if (config.dependencyKinds.length === 0) {
    errors.push("dependencyKinds must name at least one relationship kind");
  }
  const overlap = config.redundancyKinds.filter((kind) => config.dependencyKinds.includes(kind));
  if (overlap.length > 0) {
    errors.push(`redundancyKinds overlap dependencyKinds: ${overlap.join(", ")}`);
  }

  return errors;
}

function parseNumberVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new InvalidConfigurationError(`${name} must be numeric, got "${raw}"`);
  }
  return value;
}

function parseListVar(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/** Minutes of the day, UTC; `start > end` wraps past midnight. */
export interface TimeWindow {
  start: number;
  end: number;
}

export interface DeploymentSchedule {
  businessHours: TimeWindow;
  peakHours: TimeWindow;
  lowTrafficHours: TimeWindow;
  maintenanceWindows: TimeWindow[];
  /** YYYY-MM-DD, UTC. */
  holidays: string[];
}

export const DEFAULT_DEPLOYMENT_SCHEDULE: DeploymentSchedule = {
  businessHours: { start: 8 * 60, end: 18 * 60 },
  peakHours: { start: 10 * 60, end: 16 * 60 },
  lowTrafficHours: { start: 23 * 60, end: 5 * 60 },
  maintenanceWindows: [],
  holidays: [],
};

const TIME_RANGE = /^([01]\d|2[0-3]):([0-5]\d)-([01]\d|2[0-3]):([0-5]\d)$/;
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Parses "HH:MM-HH:MM". */
export function parseTimeWindow(raw: string, name = "time window"): TimeWindow {
  const match = TIME_RANGE.exec(raw.trim());
  if (!match) {
    throw new InvalidConfigurationError(`${name} must look like HH:MM-HH:MM, got "${raw}"`);
  }
  return {
    start: Number(match[1]) * 60 + Number(match[2]),
    end: Number(match[3]) * 60 + Number(match[4]),
  };
}

function parseWindowVar(env: NodeJS.ProcessEnv, name: string): TimeWindow | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  return parseTimeWindow(raw, name);
}

/**
 * Deployment windows and holidays from TOPDECK_BUSINESS_HOURS,
 * TOPDECK_PEAK_HOURS, TOPDECK_LOW_TRAFFIC_HOURS,
 * TOPDECK_MAINTENANCE_WINDOWS and TOPDECK_HOLIDAYS.
 */
export function loadDeploymentSchedule(env: NodeJS.ProcessEnv = process.env): DeploymentSchedule {
  const d = DEFAULT_DEPLOYMENT_SCHEDULE;
  const maintenance = parseListVar(env, "TOPDECK_MAINTENANCE_WINDOWS") ?? [];
  const holidays = parseListVar(env, "TOPDECK_HOLIDAYS") ?? d.holidays;

  for (const day of holidays) {
    if (!ISO_DATE.test(day) || Number.isNaN(Date.parse(`${day}T00:00:00Z`))) {
      throw new InvalidConfigurationError(`TOPDECK_HOLIDAYS entries must be YYYY-MM-DD dates, got "${day}"`);
    }
  }

  return {
    businessHours: parseWindowVar(env, "TOPDECK_BUSINESS_HOURS") ?? d.businessHours,
    peakHours: parseWindowVar(env, "TOPDECK_PEAK_HOURS") ?? d.peakHours,
    lowTrafficHours: parseWindowVar(env, "TOPDECK_LOW_TRAFFIC_HOURS") ?? d.lowTrafficHours,
    maintenanceWindows: maintenance.map((w) => parseTimeWindow(w, "TOPDECK_MAINTENANCE_WINDOWS")),
    holidays,
  };
}

/**
 * Build the analysis configuration from TOPDECK_* environment variables,
 * falling back to DEFAULT_ANALYSIS_CONFIG for anything unset.
 */
export function loadAnalysisConfig(env: NodeJS.ProcessEnv = process.env): AnalysisConfig {
  const d = DEFAULT_ANALYSIS_CONFIG;
  const num = (name: string, fallback: number) => parseNumberVar(env, name) ?? fallback;

  const config: AnalysisConfig = {
    maxTraversalDepth: num("TOPDECK_MAX_TRAVERSAL_DEPTH", d.maxTraversalDepth),
    spofDependentsThreshold: num("TOPDECK_SPOF_DEPENDENTS_THRESHOLD", d.spofDependentsThreshold),
    baseDowntimeSeconds: num("TOPDECK_BASE_DOWNTIME_SECONDS", d.baseDowntimeSeconds),
    downtimeScale: num("TOPDECK_DOWNTIME_SCALE", d.downtimeScale),
    maxDowntimeSeconds: num("TOPDECK_MAX_DOWNTIME_SECONDS", d.maxDowntimeSeconds),
    impactThresholds: {
      lowMax: num("TOPDECK_IMPACT_LOW_MAX", d.impactThresholds.lowMax),
      mediumMax: num("TOPDECK_IMPACT_MEDIUM_MAX", d.impactThresholds.mediumMax),
    },
    riskWeights: {
      dependents: num("TOPDECK_RISK_WEIGHT_DEPENDENTS", d.riskWeights.dependents),
      spofBonus: num("TOPDECK_RISK_WEIGHT_SPOF", d.riskWeights.spofBonus),
      strength: num("TOPDECK_RISK_WEIGHT_STRENGTH", d.riskWeights.strength),
      resourceType: num("TOPDECK_RISK_WEIGHT_RESOURCE_TYPE", d.riskWeights.resourceType),
    },
    dependentsNormalization: num("TOPDECK_DEPENDENTS_NORMALIZATION", d.dependentsNormalization),
    highDependentsThreshold: num("TOPDECK_HIGH_DEPENDENTS_THRESHOLD", d.highDependentsThreshold),
    highDependenciesThreshold: num("TOPDECK_HIGH_DEPENDENCIES_THRESHOLD", d.highDependenciesThreshold),
    cascadeDurationFactor: num("TOPDECK_CASCADE_DURATION_FACTOR", d.cascadeDurationFactor),
    defaultEdgeStrength: num("TOPDECK_DEFAULT_EDGE_STRENGTH", d.defaultEdgeStrength),
    dependencyKinds: parseListVar(env, "TOPDECK_DEPENDENCY_KINDS") ?? d.dependencyKinds,
    redundancyKinds: parseListVar(env, "TOPDECK_REDUNDANCY_KINDS") ?? d.redundancyKinds,
  };

  validateAnalysisConfig(config);
  return config;
}
