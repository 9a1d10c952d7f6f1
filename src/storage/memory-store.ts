/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every method body
 * runs synchronously up to its return, so a check-then-write inside one call
 * cannot interleave with another call on the same store.
 */

import { AuditAction, AuditRecord } from '../domain/audit';
import { ElevationDecisionRecord } from '../domain/approval';
import { MitigationAction, MitigationState } from '../domain/mitigation';
import {
  Store,
  MitigationStore,
  ElevationDecisionStore,
  AuditStore,
  CreateIfNoPendingResult,
  ListOptions,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Returned records are copies so callers cannot mutate stored state through
 * nested references.
 */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryMitigationStore implements MitigationStore {
  private data = new Map<string, MitigationAction>();
  /** principalId → token of its pending_review action. */
  private pendingIndex = new Map<string, string>();

  async create(action: MitigationAction): Promise<MitigationAction> {
    this.data.set(action.token, deepCopy(action));
    if (action.state === MitigationState.PendingReview) {
      this.pendingIndex.set(action.principalId, action.token);
    }
    return deepCopy(action);
  }

  async createIfNoPending(action: MitigationAction): Promise<CreateIfNoPendingResult> {
    const existing = this.pendingAction(action.principalId);
    if (existing) {
      return { created: false, action: deepCopy(existing) };
    }
    return { created: true, action: await this.create(action) };
  }

  async getByToken(token: string): Promise<MitigationAction | null> {
    const action = this.data.get(token);
    return action ? deepCopy(action) : null;
  }

  async findPendingByPrincipal(principalId: string): Promise<MitigationAction | null> {
    const action = this.pendingAction(principalId);
    return action ? deepCopy(action) : null;
  }

  async listByPrincipal(principalId: string, options?: ListOptions): Promise<MitigationAction[]> {
    const items = [...this.data.values()]
      .filter((a) => a.principalId === principalId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return applyListOptions(items.map(deepCopy), options);
  }

  async update(
    token: string,
    updates: Partial<Omit<MitigationAction, 'token' | 'state'>>,
  ): Promise<MitigationAction | null> {
    const existing = this.data.get(token);
    if (!existing) return null;
    const updated: MitigationAction = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      token: existing.token,
      state: existing.state,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(token, updated);
    return deepCopy(updated);
  }

  async compareAndSet(
    token: string,
    expected: MitigationState,
    updates: Partial<Omit<MitigationAction, 'token'>>,
  ): Promise<MitigationAction | null> {
    const existing = this.data.get(token);
    if (!existing || existing.state !== expected) return null;
    const updated: MitigationAction = {
      ...deepCopy(existing),
      ...deepCopy(updates),
      token: existing.token,
      updatedAt: new Date().toISOString(),
    };
    this.data.set(token, updated);
    if (updated.state === MitigationState.PendingReview) {
      this.pendingIndex.set(updated.principalId, token);
    } else if (this.pendingIndex.get(updated.principalId) === token) {
      this.pendingIndex.delete(updated.principalId);
    }
    return deepCopy(updated);
  }

  private pendingAction(principalId: string): MitigationAction | undefined {
    const token = this.pendingIndex.get(principalId);
    if (!token) return undefined;
    const action = this.data.get(token);
    if (!action || action.state !== MitigationState.PendingReview) {
      this.pendingIndex.delete(principalId);
      return undefined;
    }
    return action;
  }
}

class MemoryElevationDecisionStore implements ElevationDecisionStore {
  private data = new Map<string, ElevationDecisionRecord>();

  async recordIfAbsent(record: ElevationDecisionRecord): Promise<boolean> {
    if (this.data.has(record.requestId)) return false;
    this.data.set(record.requestId, deepCopy(record));
    return true;
  }

  async remove(requestId: string): Promise<boolean> {
    return this.data.delete(requestId);
  }

  async get(requestId: string): Promise<ElevationDecisionRecord | null> {
    const record = this.data.get(requestId);
    return record ? deepCopy(record) : null;
  }
}

class MemoryAuditStore implements AuditStore {
  private data: AuditRecord[] = [];

  async create(record: AuditRecord): Promise<AuditRecord> {
    this.data.push(deepCopy(record));
    return deepCopy(record);
  }

  async list(options?: ListOptions & { resourceId?: string; action?: AuditAction }): Promise<AuditRecord[]> {
    let items = this.data;
    if (options?.resourceId) items = items.filter((r) => r.resourceId === options.resourceId);
    if (options?.action) items = items.filter((r) => r.action === options.action);
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    mitigations: new MemoryMitigationStore(),
    elevationDecisions: new MemoryElevationDecisionStore(),
    audit: new MemoryAuditStore(),
  };
}
