/**
 * Risk Aggregator — combines signal sources into one composite score.
 *
 * Every source is queried concurrently and bounded by a per-call timeout.
 * A source that throws, times out or reports an outage contributes zero and
 * leaves an "unavailable" note in its evidence; the assessment itself never
 * fails.
 *
 * Composite = clamp(identity protection + security analytics
 *                   + behavioral baseline + policy compliance, 0, 100)
 */

import { AccessGrant } from '../domain/principal';
import {
  RiskAssessment,
  SignalSourceName,
  SubScore,
  clampScore,
  riskLevelForScore,
  toFractionalScore,
} from '../domain/risk';
import { errorMessage, sourceUnavailableError } from '../domain/errors';
import { createLogger } from '../logger';
import {
  AnalyticsEvent,
  BehavioralBaseline,
  PolicyViolation,
  SegregationPolicy,
  SignalOutcome,
  SignalSources,
  signalUnavailable,
} from '../signals/sources';
import { executeWithTimeout, TimeoutError } from './concurrency';

export interface AggregatorOptions {
  /** Per-call timeout for each source query. */
  timeoutMs: number;
  /** Analytics workspace; without one the analytics source is reported unavailable. */
  analyticsWorkspaceId?: string;
  analyticsWindowHours: number;
}

const DEFAULT_OPTIONS: AggregatorOptions = {
  timeoutMs: 5_000,
  analyticsWindowHours: 24,
};

export const IDENTITY_PROTECTION_POINTS = {
  critical: 90,
  high: 80,
  medium: 50,
  low: 20,
} as const;

export const RISKY_SIGN_IN_POINTS = 30;
export const PRIVILEGE_ESCALATION_POINTS = 50;
export const ANALYTICS_CAP = 100;
export const ELEVATED_BASELINE_POINTS = 20;
export const ELEVATED_BASELINE_CUTOFF = 0.5;
export const POLICY_VIOLATION_POINTS = 15;
export const POLICY_COMPLIANCE_CAP = 45;

const log = createLogger({ component: 'risk-aggregator' });

/**
 * Map a textual identity-protection level onto points. Accepts decorated
 * values such as "Identity Protection Risk: high"; anything unrecognized,
 * including "none", scores zero.
 */
export function scoreIdentityProtection(level: string): number {
  let normalized = (level ?? '').toLowerCase();
  for (const token of ['risk', ':']) {
    normalized = normalized.split(token).join('');
  }
  normalized = normalized.trim();
  if (normalized.includes('critical')) return IDENTITY_PROTECTION_POINTS.critical;
  if (normalized.includes('high')) return IDENTITY_PROTECTION_POINTS.high;
  if (normalized.includes('medium')) return IDENTITY_PROTECTION_POINTS.medium;
  if (normalized.includes('low')) return IDENTITY_PROTECTION_POINTS.low;
  return 0;
}

export function scoreSecurityAnalytics(riskySignIns: number, privilegeEscalations: number): number {
  return Math.min(riskySignIns * RISKY_SIGN_IN_POINTS + privilegeEscalations * PRIVILEGE_ESCALATION_POINTS, ANALYTICS_CAP);
}

export function isElevatedBaseline(baseline: BehavioralBaseline): boolean {
  return baseline.elevated ?? baseline.baselineRiskScore > ELEVATED_BASELINE_CUTOFF;
}

/** Distinct (by policy id) uncompensated violations, in first-seen order. */
export function distinctUncompensated(violations: PolicyViolation[]): PolicyViolation[] {
  const seen = new Map<string, PolicyViolation>();
  for (const violation of violations) {
    if (violation.compensated) continue;
    if (!seen.has(violation.policyId)) seen.set(violation.policyId, violation);
  }
  return [...seen.values()];
}

export function scorePolicyCompliance(violations: PolicyViolation[]): number {
  return Math.min(distinctUncompensated(violations).length * POLICY_VIOLATION_POINTS, POLICY_COMPLIANCE_CAP);
}

/** Deterministic follow-ups derived from which sources contributed. */
export function remediationSteps(subScores: SubScore[]): string[] {
  const steps: string[] = [];
  const contributed = (source: SignalSourceName) => subScores.some((s) => s.source === source && s.score > 0);

  if (contributed('policy_compliance')) {
    steps.push('Review and remediate policy violations immediately');
  }
  if (contributed('identity_protection')) {
    steps.push('Confirm or dismiss the identity-protection risk after investigation');
  }
  if (contributed('security_analytics')) {
    steps.push('Review correlated risky sign-ins and privilege escalations');
  }
  if (contributed('behavioral_baseline')) {
    steps.push('Investigate recent activity for anomalies against the behavioral baseline');
  }
  for (const sub of subScores) {
    if (!sub.available) {
      steps.push(`Re-run the assessment once ${sub.source} is reachable`);
    }
  }
  steps.push("Schedule an access review with the principal's manager");
  return steps;
}

export class RiskAggregator {
  private options: AggregatorOptions;

  constructor(
    private sources: SignalSources,
    options?: Partial<AggregatorOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Assess a principal. Never rejects. */
  async assess(principalId: string, accessGrants: AccessGrant[] = []): Promise<RiskAssessment> {
    const subScores = await Promise.all([
      this.identityProtection(principalId),
      this.securityAnalytics(principalId),
      this.behavioralBaseline(principalId),
      this.policyCompliance(principalId, accessGrants),
    ]);

    const compositeScore = clampScore(subScores.reduce((sum, s) => sum + s.score, 0));
    const assessment: RiskAssessment = {
      principalId,
      subScores,
      compositeScore,
      fractionalScore: toFractionalScore(compositeScore),
      riskLevel: riskLevelForScore(compositeScore),
      remediationSteps: remediationSteps(subScores),
      assessedAt: new Date().toISOString(),
    };

    log.debug('Risk assessed', {
      principalId,
      compositeScore,
      riskLevel: assessment.riskLevel,
      unavailable: subScores.filter((s) => !s.available).map((s) => s.source),
    });

    Object.freeze(subScores);
    return Object.freeze(assessment);
  }

  private async identityProtection(principalId: string): Promise<SubScore> {
    const outcome = await this.query('identity_protection', principalId, () =>
      this.sources.identityProtection.getRiskLevel(principalId),
    );
    if (outcome.status === 'unavailable') return unavailableScore('identity_protection', outcome.reason);
    return {
      source: 'identity_protection',
      score: scoreIdentityProtection(outcome.value),
      evidence: `Identity protection level: ${outcome.value}`,
      available: true,
    };
  }

  private async securityAnalytics(principalId: string): Promise<SubScore> {
    const workspaceId = this.options.analyticsWorkspaceId;
    if (!workspaceId) return unavailableScore('security_analytics', 'no analytics workspace configured');

    const query = { workspaceId, windowHours: this.options.analyticsWindowHours };
    const [signIns, escalations] = await Promise.all([
      this.query('security_analytics', principalId, () =>
        this.sources.securityAnalytics.queryRiskySignIns(principalId, query),
      ),
      this.query('security_analytics', principalId, () =>
        this.sources.securityAnalytics.queryPrivilegeEscalations(principalId, query),
      ),
    ]);

    if (signIns.status === 'unavailable' && escalations.status === 'unavailable') {
      return unavailableScore('security_analytics', signIns.reason);
    }

    const signInCount = countOf(signIns);
    const escalationCount = countOf(escalations);
    const notes = [
      signIns.status === 'ok' ? `${signInCount} risky sign-ins` : `risky sign-ins unavailable: ${signIns.reason}`,
      escalations.status === 'ok'
        ? `${escalationCount} privilege escalations`
        : `privilege escalations unavailable: ${escalations.reason}`,
    ];

    return {
      source: 'security_analytics',
      score: scoreSecurityAnalytics(signInCount, escalationCount),
      evidence: `${notes.join(', ')} in the last ${query.windowHours}h`,
      available: signIns.status === 'ok' && escalations.status === 'ok',
      details: { riskySignIns: signInCount, privilegeEscalations: escalationCount },
    };
  }

  private async behavioralBaseline(principalId: string): Promise<SubScore> {
    const outcome = await this.query('behavioral_baseline', principalId, () =>
      this.sources.behavioralBaseline.getBaseline(principalId),
    );
    if (outcome.status === 'unavailable') return unavailableScore('behavioral_baseline', outcome.reason);
    const elevated = isElevatedBaseline(outcome.value);
    return {
      source: 'behavioral_baseline',
      score: elevated ? ELEVATED_BASELINE_POINTS : 0,
      evidence: elevated
        ? `Elevated behavioral baseline (${outcome.value.baselineRiskScore})`
        : `Behavioral baseline within normal range (${outcome.value.baselineRiskScore})`,
      available: true,
    };
  }

  private async policyCompliance(principalId: string, grants: AccessGrant[]): Promise<SubScore> {
    if (grants.length === 0) {
      return {
        source: 'policy_compliance',
        score: 0,
        evidence: 'No access grants to check',
        available: true,
        details: { violations: 0 },
      };
    }

    const outcomes = await Promise.all(
      grants.map((grant) =>
        this.query('policy_compliance', principalId, () =>
          this.sources.policyCompliance.checkCompliance(principalId, grant.resourceId, grant.accessLevel),
        ),
      ),
    );

    const failures = outcomes.filter((o) => o.status === 'unavailable').length;
    if (failures === outcomes.length) {
      const first = outcomes[0];
      return unavailableScore('policy_compliance', first.status === 'unavailable' ? first.reason : 'unavailable');
    }

    const violations: PolicyViolation[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') violations.push(...outcome.value.violations);
    }
    const distinct = distinctUncompensated(violations);
    const parts = distinct.length > 0
      ? [`${distinct.length} uncompensated violations (${distinct.map((v) => v.policyId).join(', ')})`]
      : ['No uncompensated violations'];
    if (failures > 0) parts.push(`${failures} of ${outcomes.length} checks unavailable`);

    return {
      source: 'policy_compliance',
      score: scorePolicyCompliance(violations),
      evidence: parts.join('; '),
      available: failures === 0,
      details: { violations: distinct.length },
    };
  }

  /**
   * Any analytics activity for the principal over the last `days`. Used by
   * batch scans; not part of the composite score.
   */
  async recentActivity(principalId: string, days: number): Promise<SignalOutcome<AnalyticsEvent[]>> {
    const workspaceId = this.options.analyticsWorkspaceId;
    if (!workspaceId) return signalUnavailable('no analytics workspace configured');
    const query = { workspaceId, windowHours: days * 24 };
    return this.query('security_analytics', principalId, () =>
      this.sources.securityAnalytics.queryActivity(principalId, query),
    );
  }

  async segregationPolicies(): Promise<SignalOutcome<SegregationPolicy[]>> {
    return this.query('policy_compliance', undefined, () => this.sources.policyCompliance.listSegregationPolicies());
  }

  /** Run one source call, converting throws and timeouts into `unavailable`. */
  private async query<T>(
    source: SignalSourceName,
    principalId: string | undefined,
    fn: () => Promise<SignalOutcome<T>>,
  ): Promise<SignalOutcome<T>> {
    try {
      const outcome = await executeWithTimeout(fn, this.options.timeoutMs);
      if (outcome.status === 'unavailable') {
        logUnavailable(source, principalId, outcome.reason);
      }
      return outcome;
    } catch (err) {
      const reason = err instanceof TimeoutError
        ? `timed out after ${err.timeoutMs}ms`
        : errorMessage(err, 'source error');
      logUnavailable(source, principalId, reason);
      return signalUnavailable(reason);
    }
  }
}

function logUnavailable(source: SignalSourceName, principalId: string | undefined, reason: string): void {
  const error = sourceUnavailableError(source, reason);
  log.warn(error.message, { code: error.code, principalId });
}

function unavailableScore(source: SignalSourceName, reason: string): SubScore {
  return { source, score: 0, evidence: `unavailable: ${reason}`, available: false };
}

function countOf(outcome: SignalOutcome<AnalyticsEvent[]>): number {
  return outcome.status === 'ok' ? outcome.value.length : 0;
}
