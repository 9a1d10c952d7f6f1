/**
 * Batch risk reporting.
 *
 * Assesses every active principal with bounded concurrency and summarizes the
 * result for a compliance framework, and scans active principals for
 * dormant accounts, accounts without an accountable manager and
 * segregation-of-duties conflicts. Reports are read-only: no mitigation is
 * taken.
 */

import { Directory } from '../directory/directory';
import { sourceUnavailableError } from '../domain/errors';
import { Principal, PrincipalStatus } from '../domain/principal';
import { Result, fail, ok } from '../domain/result';
import { RiskAssessment, RiskLevel, isHighRisk } from '../domain/risk';
import { createLogger } from '../logger';
import { SegregationPolicy } from '../signals/sources';
import { RiskAggregator } from './aggregator';
import { mapWithConcurrency } from './concurrency';

export interface ComplianceSummary {
  totalAssessed: number;
  highRiskPrincipals: number;
  policyViolations: number;
  /** Share of assessed principals that are not high risk, e.g. "66.7%". */
  complianceRate: string;
}

export interface ComplianceReport {
  framework: string;
  generatedAt: string;
  summary: ComplianceSummary;
  /** Principal ids whose level is high or critical, highest score first. */
  highRisk: Array<{ principalId: string; compositeScore: number; riskLevel: RiskLevel }>;
  recommendations: string[];
}

/** Identifying fields every scan finding carries. */
export interface AccountRef {
  principalId: string;
  displayName: string;
  department?: string;
}

export interface DormantAccountReport {
  inactiveDays: number;
  generatedAt: string;
  totalScanned: number;
  /** Active principals with no analytics activity in the window. */
  dormant: Array<AccountRef & { recommendation: string }>;
  /** Principals whose activity could not be checked; never counted as dormant. */
  unverified: string[];
}

export interface OrphanedAccountReport {
  generatedAt: string;
  totalScanned: number;
  orphaned: Array<AccountRef & { issue: string; recommendation: string }>;
}

export interface SegregationViolation extends AccountRef {
  policyId: string;
  policyName: string;
  conflictingRoles: string[];
  severity: 'high';
}

export interface SegregationReport {
  generatedAt: string;
  totalScanned: number;
  policiesChecked: number;
  violations: SegregationViolation[];
}

export const DEFAULT_INACTIVE_DAYS = 90;
export const DORMANT_RECOMMENDATION = 'Disable account';
export const ORPHANED_RECOMMENDATION = 'Assign manager or disable account';

export const REPORT_RECOMMENDATIONS = [
  'Review all high-risk principal access',
  'Remediate policy violations',
  'Conduct quarterly access reviews',
];

const log = createLogger({ component: 'risk-report' });

export function formatComplianceRate(total: number, highRisk: number): string {
  if (total === 0) return '100.0%';
  return `${(((total - highRisk) / total) * 100).toFixed(1)}%`;
}

export function summarize(assessments: RiskAssessment[]): ComplianceSummary {
  const highRiskPrincipals = assessments.filter((a) => isHighRisk(a.riskLevel)).length;
  const policyViolations = assessments.reduce((sum, a) => {
    const policy = a.subScores.find((s) => s.source === 'policy_compliance');
    return sum + (policy?.details?.violations ?? 0);
  }, 0);
  return {
    totalAssessed: assessments.length,
    highRiskPrincipals,
    policyViolations,
    complianceRate: formatComplianceRate(assessments.length, highRiskPrincipals),
  };
}

function accountRef(p: Principal): AccountRef {
  return p.department === undefined
    ? { principalId: p.id, displayName: p.displayName }
    : { principalId: p.id, displayName: p.displayName, department: p.department };
}

/** Every conflicting role set of every policy that the principal holds in full. */
export function segregationViolations(principal: Principal, policies: SegregationPolicy[]): SegregationViolation[] {
  const held = new Set(principal.roles);
  return policies.flatMap((policy) =>
    policy.conflictingRoles
      .filter((set) => set.length > 0 && set.every((role) => held.has(role)))
      .map((set) => ({
        ...accountRef(principal),
        policyId: policy.policyId,
        policyName: policy.name,
        conflictingRoles: [...set],
        severity: 'high' as const,
      })),
  );
}

export class RiskReportService {
  constructor(
    private directory: Directory,
    private aggregator: RiskAggregator,
    private concurrency = 4,
  ) {}

  /** Assess all active principals. */
  async assessActivePrincipals(): Promise<RiskAssessment[]> {
    const principals = await this.directory.listPrincipals({ status: PrincipalStatus.Active });
    return mapWithConcurrency(principals, this.concurrency, (p) => this.aggregator.assess(p.id, p.accessGrants));
  }

  async complianceReport(framework = 'SOX'): Promise<ComplianceReport> {
    const assessments = await this.assessActivePrincipals();
    const summary = summarize(assessments);

    log.info('Compliance report generated', { framework, ...summary });

    return {
      framework,
      generatedAt: new Date().toISOString(),
      summary,
      highRisk: assessments
        .filter((a) => isHighRisk(a.riskLevel))
        .sort((a, b) => b.compositeScore - a.compositeScore)
        .map((a) => ({ principalId: a.principalId, compositeScore: a.compositeScore, riskLevel: a.riskLevel })),
      recommendations: [...REPORT_RECOMMENDATIONS],
    };
  }

  /** Active principals with no analytics activity in the last `inactiveDays`. */
  async dormantAccounts(inactiveDays = DEFAULT_INACTIVE_DAYS): Promise<DormantAccountReport> {
    const principals = await this.directory.listPrincipals({ status: PrincipalStatus.Active });
    const activity = await mapWithConcurrency(principals, this.concurrency, (p) =>
      this.aggregator.recentActivity(p.id, inactiveDays),
    );

    const dormant: DormantAccountReport['dormant'] = [];
    const unverified: string[] = [];
    principals.forEach((p, i) => {
      const outcome = activity[i];
      if (outcome.status === 'unavailable') unverified.push(p.id);
      else if (outcome.value.length === 0) dormant.push({ ...accountRef(p), recommendation: DORMANT_RECOMMENDATION });
    });

    log.info('Dormant account scan complete', {
      inactiveDays,
      scanned: principals.length,
      dormant: dormant.length,
      unverified: unverified.length,
    });

    return { inactiveDays, generatedAt: new Date().toISOString(), totalScanned: principals.length, dormant, unverified };
  }

  /** Active principals with no manager, or whose manager is not an active principal. */
  async orphanedAccounts(): Promise<OrphanedAccountReport> {
    const everyone = await this.directory.listPrincipals();
    const activeIds = new Set(everyone.filter((p) => p.status === PrincipalStatus.Active).map((p) => p.id));
    const active = everyone.filter((p) => activeIds.has(p.id));

    const orphaned: OrphanedAccountReport['orphaned'] = [];
    for (const p of active) {
      if (!p.managerId) {
        orphaned.push({ ...accountRef(p), issue: 'No manager assigned', recommendation: ORPHANED_RECOMMENDATION });
      } else if (!activeIds.has(p.managerId)) {
        orphaned.push({
          ...accountRef(p),
          issue: `Manager ${p.managerId} is not an active principal`,
          recommendation: ORPHANED_RECOMMENDATION,
        });
      }
    }

    log.info('Orphaned account scan complete', { scanned: active.length, orphaned: orphaned.length });

    return { generatedAt: new Date().toISOString(), totalScanned: active.length, orphaned };
  }

  /** Active principals holding every role of a conflicting set. Fails when the policies cannot be read. */
  async segregationOfDuties(): Promise<Result<SegregationReport>> {
    const policies = await this.aggregator.segregationPolicies();
    if (policies.status === 'unavailable') {
      return fail(sourceUnavailableError('policy_compliance', policies.reason));
    }

    const principals = await this.directory.listPrincipals({ status: PrincipalStatus.Active });
    const violations = principals.flatMap((p) => segregationViolations(p, policies.value));

    log.info('Segregation of duties scan complete', {
      scanned: principals.length,
      policies: policies.value.length,
      violations: violations.length,
    });

    return ok({
      generatedAt: new Date().toISOString(),
      totalScanned: principals.length,
      policiesChecked: policies.value.length,
      violations,
    });
  }
}
