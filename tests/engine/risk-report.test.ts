import { MemoryDirectory } from '../../src/directory/memory-directory';
import { PrincipalStatus } from '../../src/domain/principal';
import { RiskLevel } from '../../src/domain/risk';
import { RiskAggregator } from '../../src/engine/aggregator';
import { REPORT_RECOMMENDATIONS, RiskReportService, formatComplianceRate } from '../../src/engine/risk-report';
import { StaticSignalData, createStaticSignalSources } from '../../src/signals/static-sources';
import { event, principal } from '../fixtures';

function reportService() {
  const directory = new MemoryDirectory({
    principals: [
      principal('u1'),
      principal('u2', [
        { resourceId: 'privileged-console', accessLevel: 'admin' },
        { resourceId: 'pii-warehouse', accessLevel: 'read' },
      ]),
      principal('u3'),
      { ...principal('u4'), status: PrincipalStatus.Disabled },
    ],
  });
  const aggregator = new RiskAggregator(
    createStaticSignalSources({
      identityRisk: { u1: 'critical', u2: 'high', u4: 'critical' },
      useComplianceRules: true,
    }),
    { timeoutMs: 1000, analyticsWorkspaceId: 'ws-test', analyticsWindowHours: 24 },
  );
  return { directory, service: new RiskReportService(directory, aggregator, 2) };
}

describe('formatComplianceRate', () => {
  test('an empty population is fully compliant', () => {
    expect(formatComplianceRate(0, 0)).toBe('100.0%');
  });

  test('formats the non-high-risk share with one decimal', () => {
    expect(formatComplianceRate(3, 2)).toBe('33.3%');
    expect(formatComplianceRate(4, 1)).toBe('75.0%');
  });
});

describe('RiskReportService', () => {
  test('assesses only active principals', async () => {
    const { service } = reportService();

    const assessments = await service.assessActivePrincipals();

    expect(assessments.map((a) => a.principalId)).toEqual(['u1', 'u2', 'u3']);
  });

  test('builds a compliance report', async () => {
    const { service } = reportService();

    const report = await service.complianceReport('ISO27001');

    expect(report.framework).toBe('ISO27001');
    expect(report.summary).toEqual({
      totalAssessed: 3,
      highRiskPrincipals: 2,
      policyViolations: 2,
      complianceRate: '33.3%',
    });
    expect(report.highRisk).toEqual([
      { principalId: 'u2', compositeScore: 100, riskLevel: RiskLevel.Critical },
      { principalId: 'u1', compositeScore: 90, riskLevel: RiskLevel.Critical },
    ]);
    expect(report.recommendations).toEqual(REPORT_RECOMMENDATIONS);
  });

  test('defaults to the SOX framework and takes no mitigation', async () => {
    const { directory, service } = reportService();

    const report = await service.complianceReport();

    expect(report.framework).toBe('SOX');
    expect(directory.calls).toEqual([]);
  });
});

const SCAN_SIGNALS: StaticSignalData = {
  activity: { a1: [event('interactive sign-in')] },
  unavailable: { security_analytics: ['a3'] },
  segregationPolicies: [
    {
      policyId: 'SOD001',
      name: 'Payments',
      conflictingRoles: [
        ['payment_approver', 'vendor_master_editor'],
        ['payment_approver', 'auditor'],
      ],
    },
  ],
};

function scanService(signals: StaticSignalData = SCAN_SIGNALS, analyticsWorkspaceId: string | undefined = 'ws-test') {
  const directory = new MemoryDirectory({
    principals: [
      {
        ...principal('a1'),
        department: 'Finance',
        managerId: 'm1',
        roles: ['payment_approver', 'vendor_master_editor', 'analyst'],
      },
      { ...principal('a2'), roles: ['payment_approver'] },
      { ...principal('a3'), managerId: 'gone' },
      principal('m1'),
      { ...principal('gone'), status: PrincipalStatus.Terminated },
    ],
  });
  const sources = createStaticSignalSources(signals);
  const aggregator = new RiskAggregator(sources, { timeoutMs: 1000, analyticsWorkspaceId, analyticsWindowHours: 24 });
  return { sources, directory, service: new RiskReportService(directory, aggregator, 2) };
}

describe('RiskReportService scans', () => {
  test('dormant scan flags active principals with no activity in the window', async () => {
    const { sources, service } = scanService();

    const report = await service.dormantAccounts(30);

    expect(report.inactiveDays).toBe(30);
    expect(report.totalScanned).toBe(4);
    expect(report.dormant).toEqual([
      { principalId: 'a2', displayName: 'Test a2', recommendation: 'Disable account' },
      { principalId: 'm1', displayName: 'Test m1', recommendation: 'Disable account' },
    ]);
    expect(report.unverified).toEqual(['a3']);
    expect(sources.analyticsQueries).toHaveLength(4);
    expect(sources.analyticsQueries[0]).toEqual({ workspaceId: 'ws-test', windowHours: 720 });
  });

  test('without an analytics workspace nobody is reported dormant', async () => {
    const { service } = scanService(SCAN_SIGNALS, undefined);

    const report = await service.dormantAccounts();

    expect(report.inactiveDays).toBe(90);
    expect(report.dormant).toEqual([]);
    expect(report.unverified).toEqual(['a1', 'a2', 'a3', 'm1']);
  });

  test('orphaned scan reports missing and inactive managers', async () => {
    const { service } = scanService();

    const report = await service.orphanedAccounts();

    expect(report.totalScanned).toBe(4);
    expect(report.orphaned).toEqual([
      {
        principalId: 'a2',
        displayName: 'Test a2',
        issue: 'No manager assigned',
        recommendation: 'Assign manager or disable account',
      },
      {
        principalId: 'a3',
        displayName: 'Test a3',
        issue: 'Manager gone is not an active principal',
        recommendation: 'Assign manager or disable account',
      },
      {
        principalId: 'm1',
        displayName: 'Test m1',
        issue: 'No manager assigned',
        recommendation: 'Assign manager or disable account',
      },
    ]);
  });

  test('segregation scan reports each conflicting set held in full', async () => {
    const { directory, service } = scanService();

    const result = await service.segregationOfDuties();

    if (!result.success) throw new Error(result.error.message);
    expect(result.value.totalScanned).toBe(4);
    expect(result.value.policiesChecked).toBe(1);
    expect(result.value.violations).toEqual([
      {
        principalId: 'a1',
        displayName: 'Test a1',
        department: 'Finance',
        policyId: 'SOD001',
        policyName: 'Payments',
        conflictingRoles: ['payment_approver', 'vendor_master_editor'],
        severity: 'high',
      },
    ]);
    expect(directory.calls).toEqual([]);
  });

  test('segregation scan fails when the policies cannot be read', async () => {
    const directory = new MemoryDirectory({ principals: [principal('a1')] });
    const sources = createStaticSignalSources();
    const aggregator = new RiskAggregator(
      {
        ...sources,
        policyCompliance: {
          ...sources.policyCompliance,
          listSegregationPolicies: async () => {
            throw new Error('policy catalogue offline');
          },
        },
      },
      { timeoutMs: 1000 },
    );

    const result = await new RiskReportService(directory, aggregator).segregationOfDuties();

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('SOURCE.UNAVAILABLE');
    expect(result.error.message).toBe('Signal source policy_compliance unavailable: policy catalogue offline');
  });
});
