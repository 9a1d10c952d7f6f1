/**
 * Static signal sources.
 *
 * Table-driven implementations of every signal capability, for local
 * development and tests. Principals listed in `unavailable` make the named
 * source report an outage instead of data.
 */

import { SignalSourceName } from '../domain/risk';
import {
  AnalyticsEvent,
  AnalyticsQuery,
  BehavioralBaseline,
  ComplianceCheck,
  PolicyViolation,
  SegregationPolicy,
  SignalOutcome,
  SignalSources,
  signalOk,
  signalUnavailable,
} from './sources';

export interface StaticSignalData {
  /** principalId → textual identity-protection level. Missing means "none". */
  identityRisk?: Record<string, string>;
  baselines?: Record<string, BehavioralBaseline>;
  riskySignIns?: Record<string, AnalyticsEvent[]>;
  privilegeEscalations?: Record<string, AnalyticsEvent[]>;
  /** Any recorded activity, per principal. Principals without an entry have none. */
  activity?: Record<string, AnalyticsEvent[]>;
  /** principalId → resourceId → violations. */
  violations?: Record<string, Record<string, PolicyViolation[]>>;
  /** Sources reported unavailable, per principal. */
  unavailable?: Partial<Record<SignalSourceName, string[]>>;
  /** Fall back to `checkComplianceByRules` for grants with no table entry. */
  useComplianceRules?: boolean;
  segregationPolicies?: SegregationPolicy[];
}

/** Records the queries the static analytics source received. */
export interface StaticSignalSources extends SignalSources {
  analyticsQueries: AnalyticsQuery[];
}

export function createStaticSignalSources(data: StaticSignalData = {}): StaticSignalSources {
  const isDown = (source: SignalSourceName, principalId: string): boolean =>
    data.unavailable?.[source]?.includes(principalId) ?? false;

  const analyticsQueries: AnalyticsQuery[] = [];

  function events(
    table: Record<string, AnalyticsEvent[]> | undefined,
    principalId: string,
    query: AnalyticsQuery,
  ): SignalOutcome<AnalyticsEvent[]> {
    analyticsQueries.push({ ...query });
    if (isDown('security_analytics', principalId)) {
      return signalUnavailable('analytics workspace unreachable');
    }
    return signalOk([...(table?.[principalId] ?? [])]);
  }

  return {
    analyticsQueries,
    identityProtection: {
      async getRiskLevel(principalId) {
        if (isDown('identity_protection', principalId)) return signalUnavailable('identity protection unreachable');
        return signalOk(data.identityRisk?.[principalId] ?? 'none');
      },
    },
    behavioralBaseline: {
      async getBaseline(principalId) {
        if (isDown('behavioral_baseline', principalId)) return signalUnavailable('baseline provider unreachable');
        return signalOk(data.baselines?.[principalId] ?? { baselineRiskScore: 0 });
      },
    },
    securityAnalytics: {
      async queryRiskySignIns(principalId, query) {
        return events(data.riskySignIns, principalId, query);
      },
      async queryPrivilegeEscalations(principalId, query) {
        return events(data.privilegeEscalations, principalId, query);
      },
      async queryActivity(principalId, query) {
        return events(data.activity, principalId, query);
      },
    },
    policyCompliance: {
      async checkCompliance(principalId, resourceId, accessLevel) {
        if (isDown('policy_compliance', principalId)) return signalUnavailable('compliance service unreachable');
        const listed = data.violations?.[principalId]?.[resourceId];
        if (listed === undefined && data.useComplianceRules) {
          return signalOk(checkComplianceByRules(resourceId, accessLevel));
        }
        const violations = listed ?? [];
        const check: ComplianceCheck = { compliant: violations.length === 0, violations: [...violations] };
        return signalOk(check);
      },
      async listSegregationPolicies() {
        const policies = (data.segregationPolicies ?? []).map((p) => ({
          ...p,
          conflictingRoles: p.conflictingRoles.map((set) => [...set]),
        }));
        return signalOk(policies);
      },
    },
  };
}

const SENSITIVE_RESOURCE_MARKERS = ['pii', 'financial', 'health'];

/**
 * Rule-based compliance check: privileged access needs a periodic review
 * (POL002) and sensitive data access needs data-protection approval (POL003).
 */
export function checkComplianceByRules(resourceId: string, accessLevel: string): ComplianceCheck {
  const violations: PolicyViolation[] = [];
  const resource = resourceId.toLowerCase();

  if (accessLevel.toLowerCase().includes('admin') || resource.includes('privileged')) {
    violations.push({
      policyId: 'POL002',
      description: 'Privileged access requires additional review',
      severity: 'medium',
    });
  }

  if (SENSITIVE_RESOURCE_MARKERS.some((marker) => resource.includes(marker))) {
    violations.push({
      policyId: 'POL003',
      description: 'Sensitive data access requires data protection officer approval',
      severity: 'high',
    });
  }

  return { compliant: violations.length === 0, violations };
}
