export type CostCategory =
  | "revenue_loss"
  | "sla_penalties"
  | "engineering_time"
  | "customer_support"
  | "reputation_damage"
  | "recovery_costs";

const COST_CATEGORIES: readonly CostCategory[] = [
  "revenue_loss",
  "sla_penalties",
  "engineering_time",
  "customer_support",
  "reputation_damage",
  "recovery_costs",
];

export type ConfidenceLevel = "low" | "medium" | "high";

export interface CostRates {
  revenuePerUserHour: number;
  engineeringHourRate: number;
  supportHourRate: number;
  engineersPerIncident: number;
  supportStaffPerIncident: number;
  /** Share of annual revenue owed per hour of SLA breach. */
  slaPenaltyRatePerHour: number;
  /** Intangible cost as a share of the tangible ones. */
  reputationDamageMultiplier: number;
}

export const DEFAULT_COST_RATES: CostRates = {
  revenuePerUserHour: 0.5,
  engineeringHourRate: 150,
  supportHourRate: 50,
  engineersPerIncident: 3,
  supportStaffPerIncident: 2,
  slaPenaltyRatePerHour: 0.01,
  reputationDamageMultiplier: 0.3,
};

export const INDUSTRY_MULTIPLIERS: Readonly<Record<string, number>> = {
  ecommerce: 2,
  fintech: 3,
  saas: 1.5,
  healthcare: 2.5,
  gaming: 1.8,
  media: 1.3,
  enterprise: 1.2,
  default: 1,
};

/** Recovery cost per hour of downtime, by resource type. */
const RECOVERY_HOURLY_COST: Readonly<Record<string, number>> = {
  database: 200,
  sql_database: 200,
  cosmos_db: 250,
  cache: 50,
  redis_cache: 50,
  web_app: 100,
  api_gateway: 150,
  load_balancer: 75,
  storage_account: 100,
};
const DEFAULT_RECOVERY_HOURLY_COST = 100;

export interface CostImpactInput {
  resourceId: string;
  resourceName: string;
  resourceType: string;
  downtimeHours: number;
  affectedUsers: number;
  revenueGenerating: boolean;
  hasSla: boolean;
  industry?: string;
  annualRevenue?: number;
  rates?: Partial<CostRates>;
}

export interface CostImpact {
  resourceId: string;
  resourceName: string;
  downtimeHours: number;
  totalCost: number;
  costBreakdown: Partial<Record<CostCategory, number>>;
  hourlyImpactRate: number;
  affectedUsers: number;
  confidenceLevel: ConfidenceLevel;
  assumptions: string[];
}

export interface AnnualRiskCost {
  expectedAnnualCost: number;
  minAnnualCost: number;
  maxAnnualCost: number;
  expectedDowntimeHours: number;
  hourlyImpactRate: number;
  recommendations: string[];
}

export interface MitigationOption {
  name: string;
  implementationCost: number;
  annualOperationalCost: number;
  /** Percentage of the annual risk cost the mitigation removes, 0 to 100. */
  riskReductionPercentage: number;
}

export interface MitigationComparison {
  mitigation: string;
  implementationCost: number;
  annualOperationalCost: number;
  annualSavings: number;
  /** null when the first year costs nothing. */
  roiPercentage: number | null;
  /** null when the mitigation saves nothing. */
  paybackMonths: number | null;
  netBenefitYear1: number;
  recommended: boolean;
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function industryMultiplier(industry = "default"): number {
  return INDUSTRY_MULTIPLIERS[industry] ?? 1;
}

/** Longer outages cost more to recover from: 20% more per hour past the fourth. */
export function estimateRecoveryCost(resourceType: string, downtimeHours: number): number {
  const base = RECOVERY_HOURLY_COST[resourceType.toLowerCase()] ?? DEFAULT_RECOVERY_HOURLY_COST;
  const multiplier = downtimeHours > 4 ? 1 + (downtimeHours - 4) * 0.2 : 1;
  return base * downtimeHours * multiplier;
}

export function confidenceLevel(revenueGenerating: boolean, hasSla: boolean, affectedUsers: number): ConfidenceLevel {
  if (revenueGenerating && hasSla && affectedUsers > 100) return "high";
  if ((revenueGenerating || hasSla) && affectedUsers > 10) return "medium";
  return "low";
}

export function calculateCostImpact(input: CostImpactInput): CostImpact {
  const rates = { ...DEFAULT_COST_RATES, ...input.rates };
  const hours = input.downtimeHours;
  const breakdown: Partial<Record<CostCategory, number>> = {};
  const assumptions: string[] = [];

  if (input.revenueGenerating && input.affectedUsers > 0) {
    breakdown.revenue_loss =
      input.affectedUsers * hours * rates.revenuePerUserHour * industryMultiplier(input.industry);
    assumptions.push(
      `Revenue loss based on ${input.affectedUsers} users at $${rates.revenuePerUserHour}/user/hour`,
    );
  }

  breakdown.engineering_time = rates.engineersPerIncident * hours * rates.engineeringHourRate;
  assumptions.push(
    `Engineering cost based on ${rates.engineersPerIncident} engineers at $${rates.engineeringHourRate}/hour`,
  );

  breakdown.customer_support = rates.supportStaffPerIncident * hours * rates.supportHourRate;
  assumptions.push(
    `Support cost based on ${rates.supportStaffPerIncident} staff at $${rates.supportHourRate}/hour`,
  );

  if (input.hasSla && input.annualRevenue) {
    breakdown.sla_penalties = input.annualRevenue * rates.slaPenaltyRatePerHour * hours;
    assumptions.push(`SLA penalty at ${round(rates.slaPenaltyRatePerHour * 100)}% of annual revenue per hour`);
  }

  const tangible = Object.values(breakdown).reduce((acc, v) => acc + (v ?? 0), 0);
  breakdown.reputation_damage = tangible * rates.reputationDamageMultiplier;
  assumptions.push(
    `Reputation damage estimated at ${round(rates.reputationDamageMultiplier * 100)}% of tangible costs`,
  );

  breakdown.recovery_costs = estimateRecoveryCost(input.resourceType, hours);
  assumptions.push(`Recovery costs estimated for ${input.resourceType}`);

  const total = Object.values(breakdown).reduce((acc, v) => acc + (v ?? 0), 0);
  const rounded: Partial<Record<CostCategory, number>> = {};
  for (const category of COST_CATEGORIES) {
    const value = breakdown[category];
    if (value !== undefined) rounded[category] = round(value);
  }

  return {
    resourceId: input.resourceId,
    resourceName: input.resourceName,
    downtimeHours: hours,
    totalCost: round(total),
    costBreakdown: rounded,
    hourlyImpactRate: hours > 0 ? round(total / hours) : 0,
    affectedUsers: input.affectedUsers,
    confidenceLevel: confidenceLevel(input.revenueGenerating, input.hasSla, input.affectedUsers),
    assumptions,
  };
}

function costRecommendations(expectedAnnualCost: number, hourlyImpactRate: number): string[] {
  const recommendations: string[] = [];
  if (expectedAnnualCost > 100_000) {
    recommendations.push("High annual risk cost ($100K+): prioritize redundancy and failover capabilities");
  }
  if (hourlyImpactRate > 10_000) {
    recommendations.push("High hourly impact ($10K+/hour): run 24/7 monitoring with an on-call rotation");
  }
  if (expectedAnnualCost > 50_000) {
    recommendations.push("Weigh the cost of a high-availability architecture against the expected loss");
  }
  if (hourlyImpactRate > 5_000) {
    recommendations.push("Automate failover to shorten recovery time");
  }
  return recommendations;
}

/** Expected yearly loss with a ±50% band. */
export function estimateAnnualRiskCost(
  hourlyImpactRate: number,
  failureProbabilityPerYear: number,
  meanTimeToRecoveryHours: number,
): AnnualRiskCost {
  const expectedDowntimeHours = failureProbabilityPerYear * meanTimeToRecoveryHours;
  const expected = hourlyImpactRate * expectedDowntimeHours;

  return {
    expectedAnnualCost: round(expected),
    minAnnualCost: round(expected * 0.5),
    maxAnnualCost: round(expected * 1.5),
    expectedDowntimeHours: round(expectedDowntimeHours),
    hourlyImpactRate,
    recommendations: costRecommendations(expected, hourlyImpactRate),
  };
}

/** Options by descending ROI; free options (null ROI) come first. */
export function compareMitigationCosts(
  currentRiskCost: number,
  options: MitigationOption[],
): MitigationComparison[] {
  const results = options.map((option): MitigationComparison => {
    const annualSavings = currentRiskCost * (option.riskReductionPercentage / 100);
    const firstYearCost = option.implementationCost + option.annualOperationalCost;

    let roiPercentage: number | null = null;
    let paybackMonths: number | null = 0;
    if (firstYearCost > 0) {
      roiPercentage = round(((annualSavings - firstYearCost) / firstYearCost) * 100);
      paybackMonths = annualSavings > 0 ? round(option.implementationCost / (annualSavings / 12), 1) : null;
    }

    return {
      mitigation: option.name,
      implementationCost: option.implementationCost,
      annualOperationalCost: option.annualOperationalCost,
      annualSavings: round(annualSavings),
      roiPercentage,
      paybackMonths,
      netBenefitYear1: round(annualSavings - firstYearCost),
      recommended: annualSavings > firstYearCost,
    };
  });

  const rank = (r: MitigationComparison) => r.roiPercentage ?? Number.POSITIVE_INFINITY;
  return results.sort((a, b) => rank(b) - rank(a) || a.mitigation.localeCompare(b.mitigation));
}
