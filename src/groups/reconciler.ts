/**
 * Group Membership Reconciler.
 *
 * Idempotent group operations on top of a strict directory: get-or-create by
 * display name, set-union membership adds, set-difference removals, and a
 * continue-on-error purge of one principal from every group.
 */

import { AuditService } from '../audit/audit-service';
import { Directory, DirectoryErrorCode, isDirectoryError } from '../directory/directory';
import { errorMessage, groupSyncError } from '../domain/errors';
import { GroupRecord, GroupRemovalResult, MembershipChange, PurgeReport } from '../domain/group';
import { Result, fail, ok } from '../domain/result';
import { mapWithConcurrency } from '../engine/concurrency';
import { createLogger } from '../logger';

export interface ReconcilerConfig {
  /** Prefix applied to every group display name. */
  groupPrefix: string;
  /** Concurrent removals during a purge. */
  purgeConcurrency: number;
}

const DEFAULT_CONFIG: ReconcilerConfig = {
  groupPrefix: '',
  purgeConcurrency: 4,
};

const ACTOR_ID = 'system:group-reconciler';

const log = createLogger({ component: 'group-reconciler' });

function unique(ids: string[]): string[] {
  return [...new Set(ids)];
}

export class GroupReconciler {
  private config: ReconcilerConfig;
  /** In-flight get-or-create calls keyed by normalized display name. */
  private creating = new Map<string, Promise<Result<GroupRecord>>>();

  constructor(
    private directory: Directory,
    private audit: AuditService,
    config?: Partial<ReconcilerConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /** Directory display name for a logical group name: always `<prefix><name>`. */
  normalizeName(displayName: string): string {
    return `${this.config.groupPrefix}${displayName.trim()}`;
  }

  /**
   * Return the group with this display name, creating it when absent.
   * Concurrent callers for the same name share one lookup-or-create.
   */
  async getOrCreateGroup(displayName: string): Promise<Result<GroupRecord>> {
    const name = this.normalizeName(displayName);
    const pending = this.creating.get(name);
    if (pending) return pending;

    const promise = this.lookupOrCreate(name).finally(() => {
      this.creating.delete(name);
    });
    this.creating.set(name, promise);
    return promise;
  }

  /** Look up a group by display name without creating it. */
  async findGroup(displayName: string): Promise<Result<GroupRecord | null>> {
    const name = this.normalizeName(displayName);
    try {
      return ok((await this.findByName(name)) ?? null);
    } catch (err) {
      return fail(groupSyncError('listGroups', errorMessage(err), { displayName: name }));
    }
  }

  /** Add principals to a group. Members already present are skipped. */
  async addMembers(groupId: string, principalIds: string[]): Promise<Result<MembershipChange>> {
    const result = await this.applyMembership('addGroupMembers', 'CONFLICT', groupId, unique(principalIds));
    if (result.success && result.value.principalIds.length > 0) {
      await this.audit.recordSafely({
        actorId: ACTOR_ID,
        action: 'group.member_added',
        resourceType: 'group',
        resourceId: groupId,
        outcome: 'success',
        details: { principalIds: result.value.principalIds },
      });
    }
    return result;
  }

  /** Remove principals from a group. Members already absent are skipped. */
  async removeMembers(groupId: string, principalIds: string[]): Promise<Result<MembershipChange>> {
    const result = await this.applyMembership('removeGroupMembers', 'NOT_FOUND', groupId, unique(principalIds));
    if (result.success && result.value.principalIds.length > 0) {
      await this.audit.recordSafely({
        actorId: ACTOR_ID,
        action: 'group.member_removed',
        resourceType: 'group',
        resourceId: groupId,
        outcome: 'success',
        details: { principalIds: result.value.principalIds },
      });
    }
    return result;
  }

  /**
   * Remove a principal from every group it belongs to. Each removal is
   * independent; failures are reported per group and excluded from
   * `removedCount`.
   */
  async purgePrincipal(principalId: string): Promise<PurgeReport> {
    let groups: GroupRecord[];
    try {
      groups = await this.directory.listGroups();
    } catch (err) {
      const error = groupSyncError('listGroups', errorMessage(err), { principalId });
      log.error('Purge could not enumerate groups', { principalId, error: error.message });
      return { principalId, removedCount: 0, results: [], enumerationError: error };
    }

    const memberships = groups.filter((g) => g.members.includes(principalId));
    const results = await mapWithConcurrency(memberships, this.config.purgeConcurrency, (group) =>
      this.removeFromGroup(group, principalId),
    );

    const report: PurgeReport = {
      principalId,
      removedCount: results.filter((r) => r.removed).length,
      results,
    };

    const failed = results.filter((r) => r.error).length;
    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: 'group.principal_purged',
      resourceType: 'principal',
      resourceId: principalId,
      outcome: failed === 0 ? 'success' : 'failure',
      details: { removedCount: report.removedCount, failed },
    });
    log.info('Principal purged from groups', { principalId, removedCount: report.removedCount, failed });

    return report;
  }

  private async lookupOrCreate(name: string): Promise<Result<GroupRecord>> {
    try {
      const existing = await this.findByName(name);
      if (existing) return ok(existing);

      try {
        const created = await this.directory.createGroup(name);
        await this.audit.recordSafely({
          actorId: ACTOR_ID,
          action: 'group.created',
          resourceType: 'group',
          resourceId: created.id,
          outcome: 'success',
          details: { displayName: name },
        });
        log.info('Group created', { groupId: created.id, displayName: name });
        return ok(created);
      } catch (err) {
        if (!isDirectoryError(err, 'CONFLICT')) throw err;
        // Another writer created it first.
        const winner = await this.findByName(name);
        if (winner) return ok(winner);
        throw err;
      }
    } catch (err) {
      log.error('Get-or-create group failed', { displayName: name, error: errorMessage(err) });
      return fail(groupSyncError('getOrCreateGroup', errorMessage(err), { displayName: name }));
    }
  }

  private async findByName(name: string): Promise<GroupRecord | undefined> {
    const matches = await this.directory.listGroups({ displayName: name });
    return matches.find((g) => g.displayName === name);
  }

  /**
   * Try the whole batch first. When the directory answers with the
   * "already done" code, retry member by member and skip those members.
   * An unknown group is never "already done".
   */
  private async applyMembership(
    operation: 'addGroupMembers' | 'removeGroupMembers',
    alreadyDoneCode: DirectoryErrorCode,
    groupId: string,
    principalIds: string[],
  ): Promise<Result<MembershipChange>> {
    if (principalIds.length === 0) return ok({ groupId, principalIds: [] });

    const call = (ids: string[]) =>
      operation === 'addGroupMembers'
        ? this.directory.addGroupMembers(groupId, ids)
        : this.directory.removeGroupMembers(groupId, ids);

    try {
      await call(principalIds);
      return ok({ groupId, principalIds });
    } catch (err) {
      if (!isDirectoryError(err, alreadyDoneCode)) {
        return fail(groupSyncError(operation, errorMessage(err), { groupId, principalIds }));
      }
    }

    const changed: string[] = [];
    for (const principalId of principalIds) {
      try {
        await call([principalId]);
        changed.push(principalId);
      } catch (err) {
        if (isDirectoryError(err, alreadyDoneCode)) continue;
        return fail(groupSyncError(operation, errorMessage(err), { groupId, principalId, changed }));
      }
    }
    return ok({ groupId, principalIds: changed });
  }

  private async removeFromGroup(group: GroupRecord, principalId: string): Promise<GroupRemovalResult> {
    try {
      await this.directory.removeGroupMembers(group.id, [principalId]);
      return { groupId: group.id, displayName: group.displayName, removed: true };
    } catch (err) {
      // Member already gone, or the whole group deleted since enumeration.
      if (isDirectoryError(err, 'NOT_FOUND') || isDirectoryError(err, 'GROUP_NOT_FOUND')) {
        return { groupId: group.id, displayName: group.displayName, removed: false };
      }
      const error = groupSyncError('removeGroupMembers', errorMessage(err), { groupId: group.id, principalId });
      log.warn('Purge removal failed', { principalId, groupId: group.id, error: error.message });
      return { groupId: group.id, displayName: group.displayName, removed: false, error };
    }
  }
}
