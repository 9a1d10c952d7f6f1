/**
 * Lifecycle-driven group sync.
 *
 * Maps joiner / mover / leaver / access-granted events onto reconciler calls
 * using the configured role → group map. Every step is recorded in the
 * result; a failed step does not stop the remaining ones.
 */

import { lifecycleEventError } from '../domain/errors';
import {
  LifecycleEvent,
  LifecycleEventType,
  LifecycleStep,
  LifecycleSyncResult,
} from '../domain/group';
import { Result, fail, ok } from '../domain/result';
import { createLogger } from '../logger';
import { GroupReconciler } from './reconciler';

const log = createLogger({ component: 'lifecycle-sync' });

const EVENT_TYPES: readonly string[] = Object.values(LifecycleEventType);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

/** Validate an inbound lifecycle event. */
export function parseLifecycleEvent(body: unknown): Result<LifecycleEvent> {
  if (!isRecord(body)) return fail(lifecycleEventError('Lifecycle event must be a JSON object'));

  const { type, principalId, role, previousRole, resourceId } = body;
  if (typeof type !== 'string' || !EVENT_TYPES.includes(type)) {
    return fail(lifecycleEventError(`"type" must be one of: ${EVENT_TYPES.join(', ')}`, { type }));
  }
  if (!nonEmptyString(principalId)) {
    return fail(lifecycleEventError('"principalId" is required'));
  }

  switch (type) {
    case LifecycleEventType.Joiner:
      if (!nonEmptyString(role)) return fail(lifecycleEventError('"role" is required for joiner events'));
      return ok({ type: LifecycleEventType.Joiner, principalId, role });
    case LifecycleEventType.Mover:
      if (!nonEmptyString(role)) return fail(lifecycleEventError('"role" is required for mover events'));
      if (previousRole !== undefined && typeof previousRole !== 'string') {
        return fail(lifecycleEventError('"previousRole" must be a string'));
      }
      return ok({ type: LifecycleEventType.Mover, principalId, role, previousRole });
    case LifecycleEventType.Leaver:
      return ok({ type: LifecycleEventType.Leaver, principalId });
    default:
      if (!nonEmptyString(resourceId)) {
        return fail(lifecycleEventError('"resourceId" is required for access_granted events'));
      }
      return ok({ type: LifecycleEventType.AccessGranted, principalId, resourceId });
  }
}

export class LifecycleSync {
  constructor(
    private reconciler: GroupReconciler,
    private roleToGroup: Record<string, string>,
  ) {}

  async handle(event: LifecycleEvent): Promise<LifecycleSyncResult> {
    log.info('Lifecycle event received', { type: event.type, principalId: event.principalId });

    switch (event.type) {
      case LifecycleEventType.Joiner:
        return { event, steps: [await this.join(event.principalId, event.role)] };

      case LifecycleEventType.Mover: {
        const steps = [await this.join(event.principalId, event.role)];
        const previousRole = event.previousRole;
        if (!previousRole || previousRole === event.role) return { event, steps };

        if (this.sameGroup(previousRole, event.role)) {
          steps.push({ status: 'skipped', detail: `"${previousRole}" and "${event.role}" share a group` });
        } else {
          steps.push(await this.leave(event.principalId, previousRole));
        }
        return { event, steps };
      }

      case LifecycleEventType.Leaver: {
        const purge = await this.reconciler.purgePrincipal(event.principalId);
        const step: LifecycleStep = purge.enumerationError
          ? { status: 'failed', detail: 'Group enumeration failed', error: purge.enumerationError }
          : { status: 'purged', detail: `Removed from ${purge.removedCount} groups` };
        return { event, steps: [step], purge };
      }

      case LifecycleEventType.AccessGranted:
        return { event, steps: [await this.join(event.principalId, event.resourceId)] };
    }
  }

  private mappedGroup(key: string): string | undefined {
    return Object.hasOwn(this.roleToGroup, key) ? this.roleToGroup[key] : undefined;
  }

  /** Both roles resolve to the same directory group. */
  private sameGroup(roleA: string, roleB: string): boolean {
    const a = this.mappedGroup(roleA);
    const b = this.mappedGroup(roleB);
    return a !== undefined && b !== undefined && this.reconciler.normalizeName(a) === this.reconciler.normalizeName(b);
  }

  private async join(principalId: string, key: string): Promise<LifecycleStep> {
    const groupName = this.mappedGroup(key);
    if (!groupName) return { status: 'skipped', detail: `No group mapped for "${key}"` };

    const group = await this.reconciler.getOrCreateGroup(groupName);
    if (!group.success) return { status: 'failed', displayName: groupName, error: group.error };

    const added = await this.reconciler.addMembers(group.value.id, [principalId]);
    if (!added.success) {
      return { status: 'failed', groupId: group.value.id, displayName: group.value.displayName, error: added.error };
    }
    return {
      status: 'member_added',
      groupId: group.value.id,
      displayName: group.value.displayName,
      detail: added.value.principalIds.length > 0 ? undefined : 'Already a member',
    };
  }

  /** Best-effort removal from the group of a role the principal no longer holds. */
  private async leave(principalId: string, role: string): Promise<LifecycleStep> {
    const groupName = this.mappedGroup(role);
    if (!groupName) return { status: 'skipped', detail: `No group mapped for "${role}"` };

    const group = await this.reconciler.findGroup(groupName);
    if (!group.success) {
      log.warn('Mover cleanup skipped', { principalId, role, error: group.error.message });
      return { status: 'failed', displayName: groupName, error: group.error };
    }
    if (!group.value) return { status: 'skipped', displayName: groupName, detail: 'Group does not exist' };

    const removed = await this.reconciler.removeMembers(group.value.id, [principalId]);
    if (!removed.success) {
      log.warn('Mover cleanup failed', { principalId, role, error: removed.error.message });
      return { status: 'failed', groupId: group.value.id, displayName: group.value.displayName, error: removed.error };
    }
    return { status: 'member_removed', groupId: group.value.id, displayName: group.value.displayName };
  }
}
