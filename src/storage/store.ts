/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends. The
 * mitigation store is the only component whose state transitions must be
 * atomic: resolution is a compare-and-set on the action's state so that
 * duplicate callback deliveries cannot resolve an action twice.
 */

import { AuditAction, AuditRecord } from '../domain/audit';
import { ElevationDecisionRecord } from '../domain/approval';
import { MitigationAction, MitigationState } from '../domain/mitigation';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Result of a conditional create. */
export interface CreateIfNoPendingResult {
  created: boolean;
  /** The stored action: the new one, or the pending action that blocked creation. */
  action: MitigationAction;
}

/** Store interface for mitigation actions, keyed by correlation token. */
export interface MitigationStore {
  create(action: MitigationAction): Promise<MitigationAction>;
  /**
   * Create a pending action unless the principal already has one. Atomic with
   * respect to other calls on the same store.
   */
  createIfNoPending(action: MitigationAction): Promise<CreateIfNoPendingResult>;
  getByToken(token: string): Promise<MitigationAction | null>;
  findPendingByPrincipal(principalId: string): Promise<MitigationAction | null>;
  listByPrincipal(principalId: string, options?: ListOptions): Promise<MitigationAction[]>;
  /** Unconditional field update (does not change state). */
  update(token: string, updates: Partial<Omit<MitigationAction, 'token' | 'state'>>): Promise<MitigationAction | null>;
  /**
   * Apply `updates` only if the action is currently in `expected` state.
   * Returns the updated action, or null when the token is unknown or the
   * state no longer matches.
   */
  compareAndSet(
    token: string,
    expected: MitigationState,
    updates: Partial<Omit<MitigationAction, 'token'>>,
  ): Promise<MitigationAction | null>;
}

/** Store interface for elevation decisions (replay suppression). */
export interface ElevationDecisionStore {
  /** Record a decision; returns false when the request id was already decided. */
  recordIfAbsent(record: ElevationDecisionRecord): Promise<boolean>;
  /** Forget a decision whose directory call failed, so it can be retried. */
  remove(requestId: string): Promise<boolean>;
  get(requestId: string): Promise<ElevationDecisionRecord | null>;
}

/** Store interface for audit records. */
export interface AuditStore {
  create(record: AuditRecord): Promise<AuditRecord>;
  list(options?: ListOptions & { resourceId?: string; action?: AuditAction }): Promise<AuditRecord[]>;
}

/** Composite store interface. */
export interface Store {
  mitigations: MitigationStore;
  elevationDecisions: ElevationDecisionStore;
  audit: AuditStore;
}
