/**
 * Identity Risk Engine
 *
 * Aggregates identity risk signals, blocks high-risk principals pending human
 * review, applies approval-channel decisions and keeps directory group
 * memberships in sync with lifecycle events.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppServices } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './signals/sources';
export * from './signals/static-sources';
export * from './directory/directory';
export * from './directory/memory-directory';
export * from './engine/aggregator';
export * from './engine/concurrency';
export * from './engine/state-machine';
export * from './engine/decision-engine';
export * from './engine/callback-handler';
export * from './engine/risk-report';
export * from './groups/reconciler';
export * from './groups/lifecycle-sync';
export * from './notifications/approval-channel';
export * from './storage/store';
export * from './storage/memory-store';
export * from './audit/audit-service';
