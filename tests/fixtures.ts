import { AuditService } from '../src/audit/audit-service';
import { MemoryDirectory, MemoryDirectoryOptions } from '../src/directory/memory-directory';
import { AccessGrant, Principal, PrincipalStatus } from '../src/domain/principal';
import { RiskAggregator } from '../src/engine/aggregator';
import { ApprovalCallbackHandler } from '../src/engine/callback-handler';
import { MitigationDecisionEngine } from '../src/engine/decision-engine';
import { RecordingApprovalChannel } from '../src/notifications/approval-channel';
import { StaticSignalData, createStaticSignalSources } from '../src/signals/static-sources';
import { createMemoryStore } from '../src/storage/memory-store';
import { Store } from '../src/storage/store';

export function principal(id: string, accessGrants: AccessGrant[] = []): Principal {
  return {
    id,
    displayName: `Test ${id}`,
    status: PrincipalStatus.Active,
    roles: [],
    accessGrants,
  };
}

export interface Harness {
  store: Store;
  directory: MemoryDirectory;
  channel: RecordingApprovalChannel;
  audit: AuditService;
  aggregator: RiskAggregator;
  engine: MitigationDecisionEngine;
  handler: ApprovalCallbackHandler;
}

export function createHarness(options: {
  signals?: StaticSignalData;
  directory?: MemoryDirectoryOptions;
  threshold?: number;
  sharedSecret?: string;
} = {}): Harness {
  const store = createMemoryStore();
  const directory = new MemoryDirectory(options.directory);
  const channel = new RecordingApprovalChannel();
  const audit = new AuditService(store);
  const aggregator = new RiskAggregator(createStaticSignalSources(options.signals), {
    timeoutMs: 1000,
    analyticsWorkspaceId: 'ws-test',
    analyticsWindowHours: 24,
  });
  const engine = new MitigationDecisionEngine(aggregator, directory, channel, store, audit, {
    autoMitigationThreshold: options.threshold ?? 90,
  });
  const handler = new ApprovalCallbackHandler(directory, channel, store, audit, {
    sharedSecret: options.sharedSecret,
    secretHeader: 'x-approval-secret',
  });
  return { store, directory, channel, audit, aggregator, engine, handler };
}

export function event(summary: string) {
  return { timestamp: '2026-01-01T00:00:00.000Z', summary };
}

/** Callback body for a card button press. */
export function cardSubmit(data: Record<string, string>) {
  return { type: 'message', value: { data } };
}
