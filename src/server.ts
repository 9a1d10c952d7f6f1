/**
 * Express server configuration.
 *
 * Composition root: builds every service once from the engine configuration
 * and the injected capabilities (directory, signal sources, approval channel,
 * store), then assembles the HTTP surface.
 */

import express from 'express';
import { AuditService } from './audit/audit-service';
import { EngineConfig, createEngineConfig } from './config';
import { Directory } from './directory/directory';
import { MemoryDirectory } from './directory/memory-directory';
import { RiskAggregator } from './engine/aggregator';
import { ApprovalCallbackHandler } from './engine/callback-handler';
import { MitigationDecisionEngine } from './engine/decision-engine';
import { RiskReportService } from './engine/risk-report';
import { LifecycleSync } from './groups/lifecycle-sync';
import { GroupReconciler } from './groups/reconciler';
import { ApprovalChannel, HttpApprovalChannel, RecordingApprovalChannel } from './notifications/approval-channel';
import { SignalSources } from './signals/sources';
import { createStaticSignalSources } from './signals/static-sources';
import { createMemoryStore } from './storage/memory-store';
import { Store } from './storage/store';
import { errorHandler } from './api/middleware';
import { createWebhookRoutes } from './api/webhook';
import { createMitigationRoutes } from './api/mitigations';
import { createLifecycleRoutes } from './api/lifecycle';

const startTime = Date.now();

/** Capability strategies chosen by the caller; in-memory ones are used for anything omitted. */
export interface AppServices {
  directory?: Directory;
  sources?: SignalSources;
  channel?: ApprovalChannel;
  store?: Store;
}

/** Application context containing all services. */
export interface AppContext {
  config: EngineConfig;
  store: Store;
  directory: Directory;
  channel: ApprovalChannel;
  auditService: AuditService;
  aggregator: RiskAggregator;
  engine: MitigationDecisionEngine;
  callbackHandler: ApprovalCallbackHandler;
  reconciler: GroupReconciler;
  lifecycleSync: LifecycleSync;
  reports: RiskReportService;
}

/** Create the application context with all services. */
export function createAppContext(config: EngineConfig = createEngineConfig(), services: AppServices = {}): AppContext {
  const store = services.store ?? createMemoryStore();
  const directory = services.directory ?? new MemoryDirectory();
  const sources = services.sources ?? createStaticSignalSources();
  const channel = services.channel
    ?? (config.approvalChannel.serviceUrl
      ? new HttpApprovalChannel(config.approvalChannel)
      : new RecordingApprovalChannel());

  const auditService = new AuditService(store);
  const aggregator = new RiskAggregator(sources, {
    timeoutMs: config.signalTimeoutMs,
    analyticsWorkspaceId: config.analyticsWorkspaceId,
    analyticsWindowHours: config.analyticsWindowHours,
  });
  const engine = new MitigationDecisionEngine(aggregator, directory, channel, store, auditService, {
    autoMitigationThreshold: config.autoMitigationThreshold,
    conditionalAccessPolicyTemplateId: config.conditionalAccessPolicyTemplateId,
  });
  const callbackHandler = new ApprovalCallbackHandler(directory, channel, store, auditService, {
    sharedSecret: config.callback.sharedSecret,
    secretHeader: config.callback.secretHeader,
  });
  const reconciler = new GroupReconciler(directory, auditService, {
    groupPrefix: config.groupPrefix,
    purgeConcurrency: config.batchConcurrency,
  });

  return {
    config,
    store,
    directory,
    channel,
    auditService,
    aggregator,
    engine,
    callbackHandler,
    reconciler,
    lifecycleSync: new LifecycleSync(reconciler, config.roleToGroup),
    reports: new RiskReportService(directory, aggregator, config.batchConcurrency),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      approvalChannel: ctx.config.approvalChannel.serviceUrl ? 'http' : 'recording',
    });
  });

  app.use('/webhook', createWebhookRoutes(ctx.callbackHandler, ctx.config.callback.secretHeader));

  const v1 = express.Router();
  v1.use('/', createMitigationRoutes(ctx.store, ctx.engine, ctx.reports, ctx.auditService));
  v1.use('/', createLifecycleRoutes(ctx.lifecycleSync));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
