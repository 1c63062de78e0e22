import type { DeploymentSchedule, TimeWindow } from "../config.js";

export type DayType = "weekday" | "weekend" | "holiday";
export type TimeWindowKind = "maintenance" | "peak" | "business" | "low_traffic" | "off_hours";
export type TimingRating = "excellent" | "good" | "moderate" | "suboptimal" | "high_risk";

const DAY_MULTIPLIERS: Record<DayType, number> = {
  weekday: 1.3,
  weekend: 0.7,
  holiday: 0.5,
};

const WINDOW_MULTIPLIERS: Record<TimeWindowKind, number> = {
  maintenance: 0.4,
  peak: 1.5,
  business: 1.2,
  low_traffic: 0.6,
  off_hours: 1,
};

const MIN_MULTIPLIER = 0.2;
const MAX_MULTIPLIER = 2;

/** Candidate hours (UTC) offered by suggestDeploymentWindows. */
const CANDIDATE_HOURS = [2, 6, 12, 20, 23];
const MAX_SUGGESTIONS = 5;

const RATING_MESSAGES: Record<TimingRating, string> = {
  excellent: "Excellent time to deploy: low traffic and reduced risk",
  good: "Good time to deploy: below-normal risk",
  moderate: "Moderate risk window: deploy with standard precautions",
  suboptimal: "Suboptimal window: consider deferring to off-peak hours",
  high_risk: "High-risk window: defer unless the change is urgent",
};

export interface TimingAssessment {
  at: string;
  dayType: DayType;
  window: TimeWindowKind;
  multiplier: number;
  rating: TimingRating;
  recommendation: string;
}

export interface TimingAdjustedRisk {
  baseRiskScore: number;
  adjustedRiskScore: number;
  timing: TimingAssessment;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Half-open [start, end) in minutes of the day; a window with start > end wraps past midnight. */
export function inWindow(minute: number, window: TimeWindow): boolean {
  if (window.start === window.end) return false;
  if (window.start < window.end) return minute >= window.start && minute < window.end;
  return minute >= window.start || minute < window.end;
}

export function dayTypeFor(at: Date, schedule: DeploymentSchedule): DayType {
  if (schedule.holidays.includes(at.toISOString().slice(0, 10))) return "holiday";
  const day = at.getUTCDay();
  return day === 0 || day === 6 ? "weekend" : "weekday";
}

/** Maintenance wins over peak, peak over business, business over low traffic. */
export function windowKindFor(at: Date, schedule: DeploymentSchedule): TimeWindowKind {
  const minute = at.getUTCHours() * 60 + at.getUTCMinutes();
  if (schedule.maintenanceWindows.some((w) => inWindow(minute, w))) return "maintenance";
  if (inWindow(minute, schedule.peakHours)) return "peak";
  if (inWindow(minute, schedule.businessHours)) return "business";
  if (inWindow(minute, schedule.lowTrafficHours)) return "low_traffic";
  return "off_hours";
}

export function ratingFor(multiplier: number): TimingRating {
  if (multiplier <= 0.5) return "excellent";
  if (multiplier <= 0.8) return "good";
  if (multiplier <= 1.2) return "moderate";
  if (multiplier <= 1.5) return "suboptimal";
  return "high_risk";
}

export function assessTiming(at: Date, schedule: DeploymentSchedule): TimingAssessment {
  const dayType = dayTypeFor(at, schedule);
  const window = windowKindFor(at, schedule);
  const raw = DAY_MULTIPLIERS[dayType] * WINDOW_MULTIPLIERS[window];
  const multiplier = round2(Math.max(MIN_MULTIPLIER, Math.min(MAX_MULTIPLIER, raw)));
  const rating = ratingFor(multiplier);

  return {
    at: at.toISOString(),
    dayType,
    window,
    multiplier,
    rating,
    recommendation: RATING_MESSAGES[rating],
  };
}

/** Scales a risk score by the deployment-time multiplier, clamped to [0, 100]. */
export function adjustRiskForTiming(baseRiskScore: number, at: Date, schedule: DeploymentSchedule): TimingAdjustedRisk {
  const timing = assessTiming(at, schedule);
  return {
    baseRiskScore,
    adjustedRiskScore: round2(Math.max(0, Math.min(100, baseRiskScore * timing.multiplier))),
    timing,
  };
}

/**
 * Lower-risk deployment slots from `from` over the next `daysAhead` days,
 * best first. Slots earlier than `from` are skipped.
 */
export function suggestDeploymentWindows(from: Date, daysAhead: number, schedule: DeploymentSchedule): TimingAssessment[] {
  const candidates: TimingAssessment[] = [];
  for (let day = 0; day < daysAhead; day++) {
    for (const hour of CANDIDATE_HOURS) {
      const slot = new Date(Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate() + day, hour));
      if (slot.getTime() < from.getTime()) continue;
      const timing = assessTiming(slot, schedule);
      if (timing.multiplier < 1) candidates.push(timing);
    }
  }

  return candidates
    .sort((a, b) => a.multiplier - b.multiplier || a.at.localeCompare(b.at))
    .slice(0, MAX_SUGGESTIONS);
}
