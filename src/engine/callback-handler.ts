/**
 * Approval Callback Handler.
 *
 * Applies human decisions posted back by the approval channel:
 *
 *   re_enable     undo the block, resolve the action as `restored`
 *   keep_blocked  resolve the action as `confirmed_blocked`
 *   approve       approve a privileged elevation request
 *   reject        reject a privileged elevation request
 *
 * Decisions on one correlation key run one at a time in arrival order; a
 * second delivery of a decision already queued on the key is dropped.
 * Resolution is a compare-and-set on the action's state and elevation
 * decisions are recorded by request id, so replays after the fact are no-ops.
 */

import { createHash, timingSafeEqual } from 'crypto';
import { AuditService } from '../audit/audit-service';
import { Directory } from '../directory/directory';
import {
  ApprovalCallbackEnvelope,
  ApprovalDecision,
  ApprovalDecisionKind,
  CardActionData,
  isApprovalDecisionKind,
} from '../domain/approval';
import {
  TypedError,
  callbackAuthError,
  callbackPayloadError,
  errorMessage,
  internalError,
} from '../domain/errors';
import { MitigationAction, MitigationKind, MitigationOutcome, MitigationState } from '../domain/mitigation';
import { Result, fail, ok } from '../domain/result';
import { createLogger } from '../logger';
import { ApprovalChannel } from '../notifications/approval-channel';
import { Store } from '../storage/store';
import { isTerminalMitigationState, transitionMitigationState } from './state-machine';

export interface CallbackHandlerConfig {
  /** Expected shared secret. Unset disables the check. */
  sharedSecret?: string;
  /** Header the secret travels in; used in error messages. */
  secretHeader: string;
}

export interface CallbackRequest {
  /** Value of the shared-secret header, if present. */
  secret?: string;
  body: unknown;
}

export type CallbackResult =
  | { accepted: true; text: string; action?: MitigationAction }
  | { accepted: false; error: TypedError };

export const RESTORED_NOTICE_TEXT = 'Access restored after investigation.';
export const REJECT_JUSTIFICATION = 'Rejected via approval channel';

const ACTOR_ID = 'system:approval-callback';

const log = createLogger({ component: 'approval-callback' });

/** Constant-time comparison of two secrets of any length. */
export function secretsMatch(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const OPTIONAL_STRING_FIELDS = ['action', 'user_id', 'request_id', 'token'] as const;

/** Validate the inbound envelope shape. Unknown extra fields are ignored. */
export function parseCallbackEnvelope(body: unknown): Result<ApprovalCallbackEnvelope> {
  if (!isRecord(body)) {
    return fail(callbackPayloadError('Callback body must be a JSON object'));
  }
  if (typeof body.type !== 'string') {
    return fail(callbackPayloadError('Callback body requires a string "type"'));
  }
  const envelope: ApprovalCallbackEnvelope = { type: body.type };

  if (body.value === undefined || body.value === null) return ok(envelope);
  if (!isRecord(body.value)) {
    return fail(callbackPayloadError('"value" must be an object'));
  }

  const rawData = body.value.data;
  if (rawData === undefined || rawData === null) {
    envelope.value = {};
    return ok(envelope);
  }
  if (!isRecord(rawData)) {
    return fail(callbackPayloadError('"value.data" must be an object'));
  }

  for (const field of OPTIONAL_STRING_FIELDS) {
    const fieldValue = rawData[field];
    if (fieldValue !== undefined && typeof fieldValue !== 'string') {
      return fail(callbackPayloadError(`"value.data.${field}" must be a string`, { field }));
    }
  }

  const data: CardActionData = { action: typeof rawData.action === 'string' ? rawData.action : '' };
  if (typeof rawData.user_id === 'string') data.user_id = rawData.user_id;
  if (typeof rawData.request_id === 'string') data.request_id = rawData.request_id;
  if (typeof rawData.token === 'string') data.token = rawData.token;
  envelope.value = { data };
  return ok(envelope);
}

/** Decisions on one correlation key, running or waiting, in arrival order. */
interface DecisionLane {
  tail: Promise<unknown>;
  kinds: Set<ApprovalDecisionKind>;
}

export class ApprovalCallbackHandler {
  private lanes = new Map<string, DecisionLane>();

  constructor(
    private directory: Directory,
    private channel: ApprovalChannel,
    private store: Store,
    private audit: AuditService,
    private config: CallbackHandlerConfig,
  ) {}

  async handle(request: CallbackRequest): Promise<CallbackResult> {
    const { sharedSecret, secretHeader } = this.config;
    if (sharedSecret && (request.secret === undefined || !secretsMatch(request.secret, sharedSecret))) {
      log.warn('Approval callback rejected: shared secret mismatch', { header: secretHeader });
      return { accepted: false, error: callbackAuthError(secretHeader) };
    }

    const parsed = parseCallbackEnvelope(request.body);
    if (!parsed.success) {
      log.warn('Approval callback rejected: malformed payload', { error: parsed.error.message });
      return { accepted: false, error: parsed.error };
    }

    const envelope = parsed.value;
    if (envelope.type !== 'message') return accepted('Ignored.');

    const data = envelope.value?.data;
    if (!data) return accepted('No action data provided.');
    if (!data.action) return accepted('Missing action.');
    if (!isApprovalDecisionKind(data.action)) {
      log.info('Ignoring unknown approval action', { action: data.action });
      return accepted(`Ignored: unknown action "${data.action}".`);
    }

    const decision: ApprovalDecision = {
      kind: data.action,
      token: data.token,
      principalId: data.user_id,
      requestId: data.request_id,
      receivedAt: new Date().toISOString(),
    };

    try {
      switch (decision.kind) {
        case ApprovalDecisionKind.ReEnable:
        case ApprovalDecisionKind.KeepBlocked:
          return await this.resolveMitigation(decision);
        case ApprovalDecisionKind.Approve:
        case ApprovalDecisionKind.Reject:
          return await this.decideElevation(decision);
      }
    } catch (err) {
      log.error('Approval callback failed', { action: decision.kind, error: errorMessage(err) });
      return { accepted: false, error: internalError(`Callback handling failed: ${errorMessage(err)}`) };
    }
  }

  private async resolveMitigation(decision: ApprovalDecision): Promise<CallbackResult> {
    const located = await this.locatePending(decision);
    if (typeof located === 'string') return accepted(located);

    const token = located.token;
    const queued = this.enqueue(token, decision.kind, async () => {
      // Re-read in the lane; an earlier decision may have resolved it.
      const current = await this.store.mitigations.getByToken(token);
      if (!current || isTerminalMitigationState(current.state)) {
        return accepted(`Nothing to do: mitigation ${token} is already resolved.`);
      }

      return decision.kind === ApprovalDecisionKind.ReEnable
        ? this.restore(current)
        : this.confirmBlocked(current);
    });
    return queued ?? accepted(`Decision for mitigation ${token} is already being processed.`);
  }

  /**
   * Run `task` after every earlier decision on `key`. A decision of the same
   * kind already running or waiting on the key makes this one a duplicate:
   * nothing is queued and null is returned.
   */
  private enqueue(
    key: string,
    kind: ApprovalDecisionKind,
    task: () => Promise<CallbackResult>,
  ): Promise<CallbackResult> | null {
    const lane = this.lanes.get(key) ?? { tail: Promise.resolve(), kinds: new Set<ApprovalDecisionKind>() };
    if (lane.kinds.has(kind)) return null;

    lane.kinds.add(kind);
    this.lanes.set(key, lane);
    const run = lane.tail.then(task).finally(() => {
      lane.kinds.delete(kind);
      if (lane.kinds.size === 0 && this.lanes.get(key) === lane) this.lanes.delete(key);
    });
    // Ordering only; the caller of `run` receives its rejection.
    lane.tail = run.catch(() => undefined);
    return run;
  }

  /** Find the pending action a decision refers to, or explain why there is none. */
  private async locatePending(decision: ApprovalDecision): Promise<MitigationAction | string> {
    if (decision.token) {
      const action = await this.store.mitigations.getByToken(decision.token);
      if (!action) return `Nothing to do: no pending mitigation for token ${decision.token}.`;
      if (isTerminalMitigationState(action.state)) {
        return `Nothing to do: mitigation ${action.token} is already resolved.`;
      }
      return action;
    }

    if (!decision.principalId) return 'Missing user identifier.';
    const action = await this.store.mitigations.findPendingByPrincipal(decision.principalId);
    return action ?? `Nothing to do: no pending mitigation for ${decision.principalId}.`;
  }

  private async restore(action: MitigationAction): Promise<CallbackResult> {
    let message: string;
    try {
      message = action.kind === MitigationKind.ConditionalAccessBlock
        ? await this.directory.removeConditionalAccessBlock(action.principalId)
        : await this.directory.enablePrincipal(action.principalId);
    } catch (err) {
      const error = errorMessage(err);
      log.error('Re-enable failed; mitigation stays pending', { token: action.token, error });
      await this.audit.recordSafely({
        actorId: ACTOR_ID,
        action: 'mitigation.resolved',
        resourceType: 'mitigation',
        resourceId: action.token,
        outcome: 'failure',
        details: { principalId: action.principalId, decision: ApprovalDecisionKind.ReEnable, error },
      });
      return accepted(`Re-enable failed for ${action.principalId}: ${error}. The mitigation remains pending.`, action);
    }

    const resolved = await this.resolve(action, MitigationOutcome.Restored, ApprovalDecisionKind.ReEnable);
    if (!resolved) return accepted(`Nothing to do: mitigation ${action.token} is already resolved.`);

    const notice = await this.channel
      .sendNotice({ principalId: action.principalId, title: 'ACCESS RESTORED', text: RESTORED_NOTICE_TEXT })
      .catch((err: unknown) => ({ success: false, error: errorMessage(err) }));
    if (!notice.success) {
      log.warn('Restoration notice not delivered', { token: action.token, error: notice.error });
    }

    return accepted(message, resolved);
  }

  private async confirmBlocked(action: MitigationAction): Promise<CallbackResult> {
    const resolved = await this.resolve(action, MitigationOutcome.ConfirmedBlocked, ApprovalDecisionKind.KeepBlocked);
    if (!resolved) return accepted(`Nothing to do: mitigation ${action.token} is already resolved.`);
    return accepted(`${action.principalId} remains blocked pending investigation.`, resolved);
  }

  private async resolve(
    action: MitigationAction,
    outcome: MitigationOutcome,
    decision: ApprovalDecisionKind,
  ): Promise<MitigationAction | null> {
    const transition = transitionMitigationState(action.state, MitigationState.Resolved);
    if (!transition.success) return null;

    const resolved = await this.store.mitigations.compareAndSet(action.token, MitigationState.PendingReview, {
      state: transition.value,
      outcome,
      resolvedAt: new Date().toISOString(),
      resolvedBy: decision,
    });
    if (!resolved) return null;

    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: 'mitigation.resolved',
      resourceType: 'mitigation',
      resourceId: action.token,
      outcome: 'success',
      details: { principalId: action.principalId, decision, outcome },
    });
    log.info('Mitigation resolved', { token: action.token, principalId: action.principalId, outcome });
    return resolved;
  }

  private async decideElevation(decision: ApprovalDecision): Promise<CallbackResult> {
    const requestId = decision.requestId;
    if (!requestId) return accepted('Missing approval context.');

    const queued = this.enqueue(`elevation:${requestId}`, decision.kind, () =>
      this.applyElevation(requestId, decision),
    );
    return queued ?? accepted(`Decision for elevation request ${requestId} is already being processed.`);
  }

  private async applyElevation(requestId: string, decision: ApprovalDecision): Promise<CallbackResult> {
    const approve = decision.kind === ApprovalDecisionKind.Approve;
    const recorded = await this.store.elevationDecisions.recordIfAbsent({
      requestId,
      decision: approve ? ApprovalDecisionKind.Approve : ApprovalDecisionKind.Reject,
      decidedAt: decision.receivedAt,
    });
    if (!recorded) return accepted(`Nothing to do: elevation request ${requestId} was already decided.`);

    try {
      if (approve) {
        await this.directory.approveElevationRequest(requestId);
      } else {
        await this.directory.rejectElevationRequest(requestId, REJECT_JUSTIFICATION);
      }
    } catch (err) {
      await this.store.elevationDecisions.remove(requestId);
      const error = errorMessage(err);
      log.error('Elevation decision failed', { requestId, decision: decision.kind, error });
      await this.audit.recordSafely({
        actorId: ACTOR_ID,
        action: approve ? 'elevation.approved' : 'elevation.rejected',
        resourceType: 'elevation-request',
        resourceId: requestId,
        outcome: 'failure',
        details: { error },
      });
      return accepted(`Error processing request: ${error}`);
    }

    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: approve ? 'elevation.approved' : 'elevation.rejected',
      resourceType: 'elevation-request',
      resourceId: requestId,
      outcome: 'success',
    });
    log.info('Elevation request decided', { requestId, decision: decision.kind });
    return accepted(approve ? 'Access approved and activated!' : 'Request rejected.');
  }
}

function accepted(text: string, action?: MitigationAction): CallbackResult {
  return action ? { accepted: true, text, action } : { accepted: true, text };
}
