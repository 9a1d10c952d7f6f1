/**
 * Approval decision domain model.
 *
 * Decisions arrive as inbound approval-channel messages. They are acted on
 * and dropped; only the mitigation action they resolve is persisted.
 */

export enum ApprovalDecisionKind {
  ReEnable = 're_enable',
  KeepBlocked = 'keep_blocked',
  Approve = 'approve',
  Reject = 'reject',
}

export const APPROVAL_DECISION_KINDS: readonly string[] = Object.values(ApprovalDecisionKind);

export function isApprovalDecisionKind(value: string): value is ApprovalDecisionKind {
  return APPROVAL_DECISION_KINDS.includes(value);
}

export interface ApprovalDecision {
  kind: ApprovalDecisionKind;
  /** Mitigation correlation token, when the card carried one. */
  token?: string;
  principalId?: string;
  /** Privileged elevation request id (approve / reject only). */
  requestId?: string;
  receivedAt: string;
}

/** Action data attached to a card button and echoed back on submit. */
export interface CardActionData {
  action: string;
  user_id?: string;
  request_id?: string;
  token?: string;
}

/** Inbound approval-channel message envelope. */
export interface ApprovalCallbackEnvelope {
  type: string;
  value?: {
    data?: CardActionData;
  };
}

/** A recorded elevation decision, kept only to suppress replays. */
export interface ElevationDecisionRecord {
  requestId: string;
  decision: ApprovalDecisionKind.Approve | ApprovalDecisionKind.Reject;
  decidedAt: string;
}
