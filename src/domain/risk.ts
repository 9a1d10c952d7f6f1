/**
 * Risk assessment domain model.
 *
 * All scores live on one canonical 0–100 integer scale. The fractional
 * representation some reviewers expect is derived from it for display and is
 * never stored separately.
 */

export enum RiskLevel {
  Low = 'low',
  Medium = 'medium',
  High = 'high',
  Critical = 'critical',
}

/** Names of the signal sources that contribute a sub-score, in assessment order. */
export type SignalSourceName =
  | 'identity_protection'
  | 'security_analytics'
  | 'behavioral_baseline'
  | 'policy_compliance';

/** One source's contribution to a composite score. */
export interface SubScore {
  source: SignalSourceName;
  /** Points contributed on the 0–100 scale. */
  score: number;
  /** Free-text evidence describing what the source reported. */
  evidence: string;
  /** False when the source errored or timed out and contributed zero. */
  available: boolean;
  /** Structured counts behind the score (e.g., violation count). */
  details?: Record<string, number>;
}

export interface RiskAssessment {
  principalId: string;
  subScores: SubScore[];
  compositeScore: number;
  /** Display value, compositeScore / 100. */
  fractionalScore: number;
  riskLevel: RiskLevel;
  remediationSteps: string[];
  assessedAt: string;
}

export const MAX_RISK_SCORE = 100;

/** Lower bounds (inclusive) of each risk level on the composite scale. */
export const RISK_LEVEL_THRESHOLDS = {
  medium: 30,
  high: 50,
  critical: 75,
} as const;

/** Clamp a raw sum into the canonical [0, 100] integer range. */
export function clampScore(raw: number): number {
  if (!Number.isFinite(raw)) return 0;
  return Math.min(MAX_RISK_SCORE, Math.max(0, Math.round(raw)));
}

export function riskLevelForScore(compositeScore: number): RiskLevel {
  if (compositeScore >= RISK_LEVEL_THRESHOLDS.critical) return RiskLevel.Critical;
  if (compositeScore >= RISK_LEVEL_THRESHOLDS.high) return RiskLevel.High;
  if (compositeScore >= RISK_LEVEL_THRESHOLDS.medium) return RiskLevel.Medium;
  return RiskLevel.Low;
}

export function toFractionalScore(compositeScore: number): number {
  return compositeScore / MAX_RISK_SCORE;
}

export function isHighRisk(level: RiskLevel): boolean {
  return level === RiskLevel.High || level === RiskLevel.Critical;
}
