/**
 * Risk signal source capabilities.
 *
 * Each source reports a tagged outcome so that "the source said zero" and
 * "the source could not be reached" stay distinguishable. Sources may also
 * throw; the aggregator treats a throw or a timeout like `unavailable`.
 */

export type SignalOutcome<T> =
  | { status: 'ok'; value: T }
  | { status: 'unavailable'; reason: string };

export function signalOk<T>(value: T): SignalOutcome<T> {
  return { status: 'ok', value };
}

export function signalUnavailable<T = never>(reason: string): SignalOutcome<T> {
  return { status: 'unavailable', reason };
}

/** Identity-protection risk level, as reported (e.g. "Identity Protection Risk: high"). */
export interface IdentityProtectionSource {
  getRiskLevel(principalId: string): Promise<SignalOutcome<string>>;
}

export interface BehavioralBaseline {
  /** Provider's baseline risk on a 0–1 scale. */
  baselineRiskScore: number;
  /** Explicit elevated flag, when the provider computes one itself. */
  elevated?: boolean;
}

export interface BehavioralBaselineSource {
  getBaseline(principalId: string): Promise<SignalOutcome<BehavioralBaseline>>;
}

/** Scope of a correlated-event query. */
export interface AnalyticsQuery {
  workspaceId: string;
  windowHours: number;
}

export interface AnalyticsEvent {
  timestamp: string;
  summary: string;
}

export interface SecurityAnalyticsSource {
  queryRiskySignIns(principalId: string, query: AnalyticsQuery): Promise<SignalOutcome<AnalyticsEvent[]>>;
  queryPrivilegeEscalations(principalId: string, query: AnalyticsQuery): Promise<SignalOutcome<AnalyticsEvent[]>>;
  /** Events of any kind attributed to the principal; an empty list means no activity in the window. */
  queryActivity(principalId: string, query: AnalyticsQuery): Promise<SignalOutcome<AnalyticsEvent[]>>;
}

export interface PolicyViolation {
  policyId: string;
  description: string;
  severity: 'low' | 'medium' | 'high';
  /** A compensating control is in place; the violation does not add risk. */
  compensated?: boolean;
}

export interface ComplianceCheck {
  compliant: boolean;
  violations: PolicyViolation[];
}

/** Roles that must not be held together. Each set is violated when every role in it is held. */
export interface SegregationPolicy {
  policyId: string;
  name: string;
  conflictingRoles: string[][];
}

export interface PolicyComplianceSource {
  checkCompliance(principalId: string, resourceId: string, accessLevel: string): Promise<SignalOutcome<ComplianceCheck>>;
  listSegregationPolicies(): Promise<SignalOutcome<SegregationPolicy[]>>;
}

/** The full set of sources the aggregator queries. */
export interface SignalSources {
  identityProtection: IdentityProtectionSource;
  behavioralBaseline: BehavioralBaselineSource;
  securityAnalytics: SecurityAnalyticsSource;
  policyCompliance: PolicyComplianceSource;
}
