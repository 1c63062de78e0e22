import type { FastifyBaseLogger } from "fastify";
import { DEFAULT_DEPLOYMENT_SCHEDULE, type AnalysisConfig, type DeploymentSchedule } from "../config.js";
import { computeBlastRadius, type BlastRadiusOptions, type BlastRadiusReport } from "./blast-radius.js";
import { calculateCostImpact, type CostImpact, type CostImpactInput } from "./cost-impact.js";
import type { AnalysisDeps } from "./deps.js";
import {
  adjustRiskForTiming,
  suggestDeploymentWindows,
  type TimingAssessment,
} from "./deployment-timing.js";
import {
  cascadingFailure,
  simulate,
  type CascadingFailureAnalysis,
  type FailureScenario,
  type FailureType,
  type OverallImpact,
  type SimulationOptions,
} from "./failure-simulator.js";
import type { GraphAccessor, ResourceCatalog } from "./graph-accessor.js";
import {
  loadCriticalityTable,
  loadDegradationPatterns,
  parseDegradationPatterns,
  type CriticalityTable,
  type DegradationPattern,
} from "./policy-tables.js";
import {
  assessRisk,
  compareRisk,
  findSinglePointsOfFailure,
  riskLevelFor,
  type RiskAssessment,
  type RiskComparison,
  type RiskLevel,
} from "./risk-scorer.js";
import { traverse, type TraversalOptions, type TraversalResult } from "./traverser.js";
import { analyzeUpstreamHealth, type UpstreamHealthReport } from "./upstream-health.js";

const SCENARIO_SCORES: Record<OverallImpact, number> = {
  minimal: 10,
  low: 25,
  medium: 50,
  high: 75,
  severe: 95,
};

export interface ComprehensiveAnalysis {
  resourceId: string;
  riskAssessment: RiskAssessment;
  degradedPerformanceScenario: FailureScenario;
  intermittentFailureScenario: FailureScenario;
  combinedRiskScore: number;
  allRecommendations: string[];
}

export interface RiskAnalyzerOptions {
  accessor: GraphAccessor;
  catalog: ResourceCatalog;
  config: AnalysisConfig;
  log?: FastifyBaseLogger;
  criticality?: CriticalityTable;
  patterns?: Record<string, DegradationPattern>;
  schedule?: DeploymentSchedule;
}

export interface ChangeRiskAssessment {
  resourceId: string;
  baseRiskScore: number;
  /** Base score scaled by how risky the deployment time is. */
  adjustedRiskScore: number;
  riskLevel: RiskLevel;
  timing: TimingAssessment;
}

/** Cost inputs the caller knows; the downtime defaults to the blast-radius estimate. */
export type CostImpactRequest = Partial<
  Pick<
    CostImpactInput,
    "downtimeHours" | "affectedUsers" | "revenueGenerating" | "hasSla" | "industry" | "annualRevenue"
  >
>;

export function scenarioScore(impact: OverallImpact): number {
  return SCENARIO_SCORES[impact];
}

/**
 * Entry point for the HTTP layer. Policy tables are loaded once per analyzer;
 * every call reads the graph afresh.
 */
export class RiskAnalyzer {
  private readonly deps: AnalysisDeps;
  private readonly catalog: ResourceCatalog;
  private readonly criticality: CriticalityTable;
  private readonly patterns: Record<string, DegradationPattern>;
  private readonly schedule: DeploymentSchedule;

  constructor(options: RiskAnalyzerOptions) {
    this.deps = { accessor: options.accessor, config: options.config, log: options.log };
    this.catalog = options.catalog;
    this.criticality = options.criticality ?? loadCriticalityTable();
    this.patterns = options.patterns ? parseDegradationPatterns(options.patterns) : loadDegradationPatterns();
    this.schedule = options.schedule ?? DEFAULT_DEPLOYMENT_SCHEDULE;
  }

  get config(): AnalysisConfig {
    return this.deps.config;
  }

  dependencies(resourceId: string, options: TraversalOptions): Promise<TraversalResult> {
    return traverse(this.deps.accessor, resourceId, options);
  }

  blastRadius(resourceId: string, options: BlastRadiusOptions = {}): Promise<BlastRadiusReport> {
    return computeBlastRadius(resourceId, options, this.deps);
  }

  assess(resourceId: string): Promise<RiskAssessment> {
    return assessRisk(resourceId, { ...this.deps, criticality: this.criticality });
  }

  simulate(resourceId: string, failureType: FailureType, options: SimulationOptions = {}): Promise<FailureScenario> {
    return simulate(resourceId, failureType, options, { ...this.deps, patterns: this.patterns });
  }

  cascadingFailure(resourceId: string, initialProbability: number): Promise<CascadingFailureAnalysis> {
    return cascadingFailure(resourceId, initialProbability, this.deps);
  }

  compare(resourceIds: string[]): Promise<RiskComparison> {
    return compareRisk(resourceIds, { ...this.deps, criticality: this.criticality });
  }

  singlePointsOfFailure(): Promise<RiskAssessment[]> {
    return findSinglePointsOfFailure(this.catalog, { ...this.deps, criticality: this.criticality });
  }

  upstreamHealth(resourceId: string): Promise<UpstreamHealthReport> {
    return analyzeUpstreamHealth(resourceId, { ...this.deps, criticality: this.criticality });
  }

  /** Risk of changing `resourceId` at `at`, given the deployment schedule. */
  async changeRisk(resourceId: string, at: Date = new Date()): Promise<ChangeRiskAssessment> {
    const assessment = await this.assess(resourceId);
    const adjusted = adjustRiskForTiming(assessment.riskScore, at, this.schedule);
    return {
      resourceId,
      baseRiskScore: adjusted.baseRiskScore,
      adjustedRiskScore: adjusted.adjustedRiskScore,
      riskLevel: riskLevelFor(adjusted.adjustedRiskScore),
      timing: adjusted.timing,
    };
  }

  deploymentWindows(from: Date, daysAhead: number): TimingAssessment[] {
    return suggestDeploymentWindows(from, daysAhead, this.schedule);
  }

  async costImpact(resourceId: string, request: CostImpactRequest = {}): Promise<CostImpact> {
    const resource = await this.deps.accessor.getNode(resourceId);
    const downtimeHours =
      request.downtimeHours ?? (await this.blastRadius(resourceId)).estimatedDowntimeSeconds / 3600;

    return calculateCostImpact({
      resourceId,
      resourceName: resource.name,
      resourceType: resource.resourceType,
      downtimeHours,
      affectedUsers: request.affectedUsers ?? 0,
      revenueGenerating: request.revenueGenerating ?? false,
      hasSla: request.hasSla ?? false,
      industry: request.industry,
      annualRevenue: request.annualRevenue,
    });
  }

  async comprehensive(resourceId: string, currentLoad = 0.7): Promise<ComprehensiveAnalysis> {
    const [riskAssessment, degradedPerformanceScenario, intermittentFailureScenario] = await Promise.all([
      this.assess(resourceId),
      this.simulate(resourceId, "degraded_performance", { currentLoad }),
      this.simulate(resourceId, "intermittent_failure"),
    ]);

    const combined =
      0.7 * riskAssessment.riskScore + 0.3 * scenarioScore(degradedPerformanceScenario.overallImpact);

    // First occurrence wins so the severity order of the assessment is kept.
    const allRecommendations = Array.from(
      new Set([
        ...riskAssessment.recommendations,
        ...degradedPerformanceScenario.mitigationStrategies,
        ...intermittentFailureScenario.mitigationStrategies,
      ]),
    );

    return {
      resourceId,
      riskAssessment,
      degradedPerformanceScenario,
      intermittentFailureScenario,
      combinedRiskScore: Math.round(combined * 100) / 100,
      allRecommendations,
    };
  }
}
