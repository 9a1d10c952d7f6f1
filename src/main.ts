/**
 * Identity Risk Engine — server entry point.
 *
 * Loads configuration from the environment, wires the in-memory directory and
 * static signal sources with a small demo population, and starts the HTTP
 * server.
 */

import { loadEngineConfig, validateEngineConfig } from './config';
import { MemoryDirectory } from './directory/memory-directory';
import { PrincipalStatus } from './domain/principal';
import { configureLogging, logger } from './logger';
import { createApp, createAppContext } from './server';
import { createStaticSignalSources } from './signals/static-sources';

const config = loadEngineConfig(process.env);
configureLogging({
  level: config.logLevel,
  secrets: [config.callback.sharedSecret, config.approvalChannel.botToken, config.approvalChannel.signingSecret],
});

const validation = validateEngineConfig(config);
for (const warning of validation.warnings) {
  logger.warn('Configuration warning', { warning });
}
if (!validation.valid) {
  logger.error('Invalid configuration', { errors: validation.errors });
  process.exit(1);
}

const directory = new MemoryDirectory({
  principals: [
    {
      id: 'user-001',
      displayName: 'Avery Analyst',
      department: 'Finance',
      managerId: 'user-002',
      status: PrincipalStatus.Active,
      roles: ['finance_analyst', 'payment_approver', 'vendor_master_editor'],
      accessGrants: [{ resourceId: 'financial-ledger', accessLevel: 'read' }],
    },
    {
      id: 'user-002',
      displayName: 'Rowan Admin',
      department: 'IT',
      status: PrincipalStatus.Active,
      roles: ['platform_admin'],
      accessGrants: [
        { resourceId: 'privileged-console', accessLevel: 'admin' },
        { resourceId: 'pii-warehouse', accessLevel: 'read' },
      ],
    },
    {
      id: 'user-003',
      displayName: 'Jordan Developer',
      department: 'Engineering',
      managerId: 'user-002',
      status: PrincipalStatus.Active,
      roles: ['developer'],
      accessGrants: [{ resourceId: 'source-repos', accessLevel: 'write' }],
    },
  ],
  elevationRequests: ['pim-req-001'],
});

const sources = createStaticSignalSources({
  identityRisk: { 'user-002': 'Identity Protection Risk: high', 'user-003': 'low' },
  baselines: { 'user-002': { baselineRiskScore: 0.8 } },
  riskySignIns: {
    'user-003': [{ timestamp: new Date().toISOString(), summary: 'Sign-in from unfamiliar location' }],
  },
  activity: {
    'user-001': [{ timestamp: new Date().toISOString(), summary: 'Interactive sign-in' }],
    'user-003': [{ timestamp: new Date().toISOString(), summary: 'Interactive sign-in' }],
  },
  useComplianceRules: true,
  segregationPolicies: [
    {
      policyId: 'SOD001',
      name: 'Segregation of duties: payments',
      conflictingRoles: [['payment_approver', 'vendor_master_editor']],
    },
  ],
});

const context = createAppContext(config, { directory, sources });
const app = createApp(context);

app.listen(config.port, () => {
  logger.info('Server listening', { port: config.port, threshold: config.autoMitigationThreshold });
});
