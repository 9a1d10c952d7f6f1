/**
 * Mitigation action domain model.
 *
 * An action is created by the decision engine on every evaluation. Blocking
 * actions wait in `pending_review` until a human decision arrives through the
 * approval channel; `monitor` actions are terminal at creation.
 */

import { TypedError } from './errors';

export enum MitigationKind {
  Monitor = 'monitor',
  ConditionalAccessBlock = 'conditional_access_block',
  Disable = 'disable',
}

export enum MitigationState {
  Applied = 'applied',
  PendingReview = 'pending_review',
  Resolved = 'resolved',
}

export enum MitigationOutcome {
  Restored = 'restored',
  ConfirmedBlocked = 'confirmed_blocked',
}

/** Valid state transitions for mitigation actions. */
export const VALID_MITIGATION_TRANSITIONS: Record<MitigationState, MitigationState[]> = {
  [MitigationState.Applied]: [],
  [MitigationState.PendingReview]: [MitigationState.Resolved],
  [MitigationState.Resolved]: [],
};

/** What happened at the directory when the action was applied. */
export interface DirectoryOutcome {
  /** Mechanisms attempted, in order. */
  attempted: MitigationKind[];
  succeeded: boolean;
  message: string;
  /** Failures encountered along the way, one per failed mechanism. */
  failures: TypedError[];
}

export type NotificationStatus = 'sent' | 'failed';

export interface NotificationRecord {
  status: NotificationStatus;
  error?: string;
  at: string;
}

export interface MitigationAction {
  /** Opaque correlation token, unique per action. */
  token: string;
  principalId: string;
  kind: MitigationKind;
  state: MitigationState;
  reason: string;
  compositeScore: number;
  createdAt: string;
  updatedAt: string;
  directory?: DirectoryOutcome;
  notification?: NotificationRecord;
  resolvedAt?: string;
  outcome?: MitigationOutcome;
  /** Decision kind that resolved the action. */
  resolvedBy?: string;
}
