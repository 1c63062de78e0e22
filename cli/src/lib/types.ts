export type UserImpact = "low" | "medium" | "high";
export type RiskLevel = "low" | "medium" | "high" | "critical";
export type OverallImpact = "minimal" | "low" | "medium" | "high" | "severe";

export const FAILURE_TYPES = [
  "full_outage",
  "degraded_performance",
  "intermittent_failure",
  "partial_outage",
] as const;

export type FailureType = (typeof FAILURE_TYPES)[number];

export interface AffectedResource {
  id: string;
  name: string;
  resourceType: string;
  cloudProvider: string;
  distance: number;
  pathStrength: number;
}

export interface BlastRadiusReport {
  resourceId: string;
  resourceName: string;
  directlyAffected: AffectedResource[];
  indirectlyAffected: AffectedResource[];
  totalAffected: number;
  estimatedDowntimeSeconds: number;
  criticalPath: string[];
  userImpact: UserImpact;
  cascadeDepth: number;
  affectedServices: Record<string, number>;
}

export interface RiskAssessment {
  resourceId: string;
  resourceName: string;
  resourceType: string;
  riskScore: number;
  riskLevel: RiskLevel;
  criticalityScore: number;
  dependenciesCount: number;
  dependentsCount: number;
  blastRadius: number;
  singlePointOfFailure: boolean;
  hasRedundancy: boolean;
  recommendations: string[];
}

export interface TimingAssessment {
  at: string;
  dayType: "weekday" | "weekend" | "holiday";
  window: "maintenance" | "peak" | "business" | "low_traffic" | "off_hours";
  multiplier: number;
  rating: "excellent" | "good" | "moderate" | "suboptimal" | "high_risk";
  recommendation: string;
}

export interface ChangeRiskAssessment {
  resourceId: string;
  baseRiskScore: number;
  adjustedRiskScore: number;
  riskLevel: RiskLevel;
  timing: TimingAssessment;
}

export interface Outcome {
  outcomeType: string;
  probability: number;
  durationSeconds: number;
  affectedPercentage: number;
  userImpactDescription: string;
  technicalDetails: string;
}

export interface FailureScenario {
  resourceId: string;
  resourceName: string;
  failureType: FailureType;
  outcomes: Outcome[];
  overallImpact: OverallImpact;
  mitigationStrategies: string[];
  monitoringRecommendations: string[];
  recoverySteps: string[];
  cascadeDepth: number;
  totalAffected: number;
}

export interface SimulateRequest {
  resourceId: string;
  failureType: FailureType;
  currentLoad?: number;
  failureFrequency?: number;
  affectedZones?: string[];
  totalZones?: number;
}

export interface SpofResponse {
  count: number;
  resources: RiskAssessment[];
}

export interface RiskComparison {
  assessments: RiskAssessment[];
  highest?: { resourceId: string; riskScore: number };
  lowest?: { resourceId: string; riskScore: number };
  averageRiskScore: number;
}
