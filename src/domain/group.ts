/**
 * Directory group and lifecycle event domain model.
 */

import { TypedError } from './errors';

export interface GroupRecord {
  id: string;
  displayName: string;
  members: string[];
}

/** Filter accepted by directory group listings. */
export interface GroupFilter {
  displayName?: string;
  memberId?: string;
}

export interface MembershipChange {
  groupId: string;
  principalIds: string[];
}

export interface GroupRemovalResult {
  groupId: string;
  displayName: string;
  removed: boolean;
  error?: TypedError;
}

export interface PurgeReport {
  principalId: string;
  /** Number of groups actually modified. */
  removedCount: number;
  results: GroupRemovalResult[];
  /** Set when the group listing itself could not be read. */
  enumerationError?: TypedError;
}

export enum LifecycleEventType {
  Joiner = 'joiner',
  Mover = 'mover',
  Leaver = 'leaver',
  AccessGranted = 'access_granted',
}

export type LifecycleEvent =
  | { type: LifecycleEventType.Joiner; principalId: string; role: string }
  | { type: LifecycleEventType.Mover; principalId: string; role: string; previousRole?: string }
  | { type: LifecycleEventType.Leaver; principalId: string }
  | { type: LifecycleEventType.AccessGranted; principalId: string; resourceId: string };

export type LifecycleStepStatus = 'member_added' | 'member_removed' | 'purged' | 'skipped' | 'failed';

export interface LifecycleStep {
  status: LifecycleStepStatus;
  groupId?: string;
  displayName?: string;
  detail?: string;
  error?: TypedError;
}

export interface LifecycleSyncResult {
  event: LifecycleEvent;
  steps: LifecycleStep[];
  purge?: PurgeReport;
}
