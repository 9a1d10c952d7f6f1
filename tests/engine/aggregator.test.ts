import {
  RiskAggregator,
  remediationSteps,
  scoreIdentityProtection,
  scorePolicyCompliance,
  scoreSecurityAnalytics,
  isElevatedBaseline,
} from '../../src/engine/aggregator';
import { RiskLevel } from '../../src/domain/risk';
import { BehavioralBaseline, SignalOutcome, SignalSources } from '../../src/signals/sources';
import { createStaticSignalSources } from '../../src/signals/static-sources';
import { event } from '../fixtures';

const OPTIONS = { timeoutMs: 1000, analyticsWorkspaceId: 'ws-test', analyticsWindowHours: 24 };

describe('Scoring functions', () => {
  test.each([
    ['critical', 90],
    ['high', 80],
    ['HIGH', 80],
    ['medium', 50],
    ['low', 20],
    ['none', 0],
    ['', 0],
    ['Identity Protection Risk: high', 80],
    ['Risk: Critical', 90],
  ])('identity protection level "%s" scores %i', (level, expected) => {
    expect(scoreIdentityProtection(level)).toBe(expected);
  });

  test('security analytics weighs sign-ins and escalations', () => {
    expect(scoreSecurityAnalytics(0, 0)).toBe(0);
    expect(scoreSecurityAnalytics(1, 0)).toBe(30);
    expect(scoreSecurityAnalytics(1, 1)).toBe(80);
  });

  test('security analytics is capped at 100', () => {
    expect(scoreSecurityAnalytics(2, 1)).toBe(100);
    expect(scoreSecurityAnalytics(10, 10)).toBe(100);
  });

  test('baseline is elevated strictly above 0.5 unless the provider says otherwise', () => {
    const baseline = (b: BehavioralBaseline) => isElevatedBaseline(b);
    expect(baseline({ baselineRiskScore: 0.5 })).toBe(false);
    expect(baseline({ baselineRiskScore: 0.51 })).toBe(true);
    expect(baseline({ baselineRiskScore: 0.9, elevated: false })).toBe(false);
    expect(baseline({ baselineRiskScore: 0.1, elevated: true })).toBe(true);
  });

  test('policy compliance counts distinct uncompensated violations', () => {
    expect(
      scorePolicyCompliance([
        { policyId: 'POL002', description: 'a', severity: 'medium' },
        { policyId: 'POL002', description: 'a again', severity: 'medium' },
        { policyId: 'POL003', description: 'b', severity: 'high', compensated: true },
      ]),
    ).toBe(15);
  });

  test('policy compliance is capped at 45', () => {
    const violations = ['P1', 'P2', 'P3', 'P4'].map((policyId) => ({
      policyId,
      description: policyId,
      severity: 'low' as const,
    }));
    expect(scorePolicyCompliance(violations)).toBe(45);
  });
});

describe('RiskAggregator', () => {
  test('critical identity protection alone yields a critical composite of 90', async () => {
    const aggregator = new RiskAggregator(createStaticSignalSources({ identityRisk: { u1: 'critical' } }), OPTIONS);

    const assessment = await aggregator.assess('u1');

    expect(assessment.compositeScore).toBe(90);
    expect(assessment.fractionalScore).toBe(0.9);
    expect(assessment.riskLevel).toBe(RiskLevel.Critical);
    expect(assessment.subScores.map((s) => [s.source, s.score])).toEqual([
      ['identity_protection', 90],
      ['security_analytics', 0],
      ['behavioral_baseline', 0],
      ['policy_compliance', 0],
    ]);
  });

  test('low identity protection plus one risky sign-in yields 50', async () => {
    const aggregator = new RiskAggregator(
      createStaticSignalSources({ identityRisk: { u1: 'low' }, riskySignIns: { u1: [event('unfamiliar location')] } }),
      OPTIONS,
    );

    const assessment = await aggregator.assess('u1');

    expect(assessment.compositeScore).toBe(50);
    expect(assessment.riskLevel).toBe(RiskLevel.High);
    expect(assessment.subScores[1]).toEqual({
      source: 'security_analytics',
      score: 30,
      evidence: '1 risky sign-ins, 0 privilege escalations in the last 24h',
      available: true,
      details: { riskySignIns: 1, privilegeEscalations: 0 },
    });
  });

  test('composite is clamped to 100', async () => {
    const aggregator = new RiskAggregator(
      createStaticSignalSources({
        identityRisk: { u1: 'critical' },
        privilegeEscalations: { u1: [event('role assignment'), event('role assignment')] },
        baselines: { u1: { baselineRiskScore: 0.9 } },
      }),
      OPTIONS,
    );

    const assessment = await aggregator.assess('u1');

    expect(assessment.compositeScore).toBe(100);
  });

  test('policy compliance is checked for every access grant', async () => {
    const aggregator = new RiskAggregator(createStaticSignalSources({ useComplianceRules: true }), OPTIONS);

    const assessment = await aggregator.assess('u1', [
      { resourceId: 'privileged-console', accessLevel: 'admin' },
      { resourceId: 'pii-warehouse', accessLevel: 'read' },
      { resourceId: 'wiki', accessLevel: 'read' },
    ]);

    expect(assessment.subScores[3]).toEqual({
      source: 'policy_compliance',
      score: 30,
      evidence: '2 uncompensated violations (POL002, POL003)',
      available: true,
      details: { violations: 2 },
    });
  });

  test('queries analytics with the configured workspace and window', async () => {
    const sources = createStaticSignalSources();
    const aggregator = new RiskAggregator(sources, { ...OPTIONS, analyticsWindowHours: 48 });

    await aggregator.assess('u1');

    expect(sources.analyticsQueries).toEqual([
      { workspaceId: 'ws-test', windowHours: 48 },
      { workspaceId: 'ws-test', windowHours: 48 },
    ]);
  });

  test('analytics is unavailable without a workspace', async () => {
    const sources = createStaticSignalSources({ riskySignIns: { u1: [event('x')] } });
    const aggregator = new RiskAggregator(sources, { timeoutMs: 1000, analyticsWindowHours: 24 });

    const assessment = await aggregator.assess('u1');

    expect(sources.analyticsQueries).toHaveLength(0);
    expect(assessment.subScores[1]).toEqual({
      source: 'security_analytics',
      score: 0,
      evidence: 'unavailable: no analytics workspace configured',
      available: false,
    });
  });

  test('an unavailable source contributes zero and is flagged', async () => {
    const aggregator = new RiskAggregator(
      createStaticSignalSources({
        identityRisk: { u1: 'critical' },
        baselines: { u1: { baselineRiskScore: 0.9 } },
        unavailable: { identity_protection: ['u1'] },
      }),
      OPTIONS,
    );

    const assessment = await aggregator.assess('u1');

    expect(assessment.compositeScore).toBe(20);
    expect(assessment.subScores[0]).toEqual({
      source: 'identity_protection',
      score: 0,
      evidence: 'unavailable: identity protection unreachable',
      available: false,
    });
    expect(assessment.remediationSteps).toContain('Re-run the assessment once identity_protection is reachable');
  });

  test('a source that throws is treated as unavailable', async () => {
    const sources: SignalSources = {
      ...createStaticSignalSources(),
      identityProtection: {
        getRiskLevel: async () => {
          throw new Error('connection reset');
        },
      },
    };
    const aggregator = new RiskAggregator(sources, OPTIONS);

    const assessment = await aggregator.assess('u1');

    expect(assessment.subScores[0].evidence).toBe('unavailable: connection reset');
    expect(assessment.subScores[0].available).toBe(false);
  });

  test('a source that does not answer in time is treated as unavailable', async () => {
    const sources: SignalSources = {
      ...createStaticSignalSources({ identityRisk: { u1: 'high' } }),
      behavioralBaseline: {
        getBaseline: () => new Promise<SignalOutcome<BehavioralBaseline>>(() => undefined),
      },
    };
    const aggregator = new RiskAggregator(sources, { ...OPTIONS, timeoutMs: 20 });

    const assessment = await aggregator.assess('u1');

    expect(assessment.compositeScore).toBe(80);
    expect(assessment.subScores[2]).toEqual({
      source: 'behavioral_baseline',
      score: 0,
      evidence: 'unavailable: timed out after 20ms',
      available: false,
    });
  });

  test('assessments are frozen', async () => {
    const aggregator = new RiskAggregator(createStaticSignalSources(), OPTIONS);

    const assessment = await aggregator.assess('u1');

    expect(Object.isFrozen(assessment)).toBe(true);
    expect(Object.isFrozen(assessment.subScores)).toBe(true);
  });
});

describe('Remediation steps', () => {
  test('always ends with an access review', () => {
    expect(remediationSteps([])).toEqual(["Schedule an access review with the principal's manager"]);
  });

  test('lists follow-ups for contributing sources in a fixed order', () => {
    const steps = remediationSteps([
      { source: 'identity_protection', score: 80, evidence: '', available: true },
      { source: 'security_analytics', score: 0, evidence: '', available: true },
      { source: 'behavioral_baseline', score: 20, evidence: '', available: true },
      { source: 'policy_compliance', score: 15, evidence: '', available: true },
    ]);

    expect(steps).toEqual([
      'Review and remediate policy violations immediately',
      'Confirm or dismiss the identity-protection risk after investigation',
      'Investigate recent activity for anomalies against the behavioral baseline',
      "Schedule an access review with the principal's manager",
    ]);
  });
});
