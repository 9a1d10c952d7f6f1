/**
 * Mitigation Decision Engine.
 *
 * Turns a risk assessment into a mitigation action. Below the threshold the
 * principal is only monitored. At or above it the engine blocks sign-in
 * (conditional access first, account disable as the fallback), records a
 * `pending_review` action and asks the approval channel for a human decision.
 *
 * A principal never has two pending actions: an existing one is returned
 * as-is, concurrent evaluations of the same principal are rejected in
 * process, and the store creates the pending record atomically.
 */

import { v4 as uuid } from 'uuid';
import { AuditService } from '../audit/audit-service';
import { Directory, isDirectoryError } from '../directory/directory';
import {
  TypedError,
  directoryActionError,
  directoryLookupError,
  errorMessage,
  internalError,
  mitigationInProgressError,
  notificationError,
  principalNotFoundError,
} from '../domain/errors';
import {
  DirectoryOutcome,
  MitigationAction,
  MitigationKind,
  MitigationState,
  NotificationRecord,
} from '../domain/mitigation';
import { Principal } from '../domain/principal';
import { Result, fail, ok } from '../domain/result';
import { RiskAssessment } from '../domain/risk';
import { createLogger } from '../logger';
import { ApprovalChannel } from '../notifications/approval-channel';
import { Store } from '../storage/store';
import { RiskAggregator } from './aggregator';

export interface DecisionEngineConfig {
  /** Composite scores at or above this are blocked. */
  autoMitigationThreshold: number;
  conditionalAccessPolicyTemplateId?: string;
}

const DEFAULT_CONFIG: DecisionEngineConfig = {
  autoMitigationThreshold: 90,
};

export interface EvaluationOutcome {
  action: MitigationAction;
  assessment: RiskAssessment;
  /** True when an existing pending action was returned instead of a new one. */
  deduplicated: boolean;
}

export type EvaluationResult = Result<EvaluationOutcome>;

/** A freshly created pending action whose approval card is still to be sent. */
interface GuardedStep {
  outcome: EvaluationOutcome;
  awaitingApproval?: Principal;
}

const ACTOR_ID = 'system:decision-engine';

const log = createLogger({ component: 'decision-engine' });

/** e.g. "Auto-mitigation: risk 95 (identity_protection: 80, security_analytics: 0, ...)" */
export function formatMitigationReason(assessment: RiskAssessment): string {
  const parts = assessment.subScores.map((s) => `${s.source}: ${s.score}`);
  return `Auto-mitigation: risk ${assessment.compositeScore} (${parts.join(', ')})`;
}

export class MitigationDecisionEngine {
  private config: DecisionEngineConfig;
  /** Principals with an evaluation in flight. */
  private evaluating = new Set<string>();

  constructor(
    private aggregator: RiskAggregator,
    private directory: Directory,
    private channel: ApprovalChannel,
    private store: Store,
    private audit: AuditService,
    config?: Partial<DecisionEngineConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Evaluate a principal and act on the result. Never rejects.
   * The in-progress guard covers assessment, the directory block and the
   * pending record; the approval card goes out after the guard is released.
   */
  async evaluate(principalId: string): Promise<EvaluationResult> {
    if (this.evaluating.has(principalId)) {
      log.warn('Evaluation already in progress', { principalId });
      return fail(mitigationInProgressError(principalId));
    }

    let step: Result<GuardedStep>;
    this.evaluating.add(principalId);
    try {
      step = await this.runEvaluation(principalId);
    } catch (err) {
      return fail(this.evaluationFailed(principalId, err));
    } finally {
      this.evaluating.delete(principalId);
    }

    if (!step.success) return fail(step.error);
    const { outcome, awaitingApproval } = step.value;
    if (!awaitingApproval) return ok(outcome);

    try {
      return ok(await this.completeApproval(outcome, awaitingApproval));
    } catch (err) {
      return fail(this.evaluationFailed(principalId, err));
    }
  }

  private evaluationFailed(principalId: string, err: unknown): TypedError {
    log.error('Evaluation failed', { principalId, error: errorMessage(err) });
    return { ...internalError(`Evaluation failed: ${errorMessage(err)}`), principalId };
  }

  private async runEvaluation(principalId: string): Promise<Result<GuardedStep>> {
    let principal: Principal | null;
    try {
      principal = await this.directory.getPrincipal(principalId);
    } catch (err) {
      return fail(directoryLookupError(principalId, errorMessage(err)));
    }
    if (!principal) {
      return fail(principalNotFoundError(principalId));
    }

    const assessment = await this.aggregator.assess(principalId, principal.accessGrants);
    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: 'risk.assessed',
      resourceType: 'principal',
      resourceId: principalId,
      outcome: 'success',
      details: { compositeScore: assessment.compositeScore, riskLevel: assessment.riskLevel },
    });

    if (assessment.compositeScore < this.config.autoMitigationThreshold) {
      return ok({ outcome: { action: await this.recordMonitor(assessment), assessment, deduplicated: false } });
    }

    const existing = await this.store.mitigations.findPendingByPrincipal(principalId);
    if (existing) {
      log.info('Pending mitigation already exists', { principalId, token: existing.token });
      return ok({ outcome: { action: existing, assessment, deduplicated: true } });
    }

    const reason = formatMitigationReason(assessment);
    const { kind, outcome } = await this.block(principalId, reason);

    const now = new Date().toISOString();
    const candidate: MitigationAction = {
      token: `mit_${uuid()}`,
      principalId,
      kind,
      state: MitigationState.PendingReview,
      reason,
      compositeScore: assessment.compositeScore,
      createdAt: now,
      updatedAt: now,
      directory: outcome,
    };

    const created = await this.store.mitigations.createIfNoPending(candidate);
    if (!created.created) {
      log.warn('Pending mitigation created concurrently', { principalId, token: created.action.token });
      return ok({ outcome: { action: created.action, assessment, deduplicated: true } });
    }

    return ok({ outcome: { action: created.action, assessment, deduplicated: false }, awaitingApproval: principal });
  }

  /** Send the approval card for a new pending action and record how it went. */
  private async completeApproval(outcome: EvaluationOutcome, principal: Principal): Promise<EvaluationOutcome> {
    const { assessment } = outcome;
    const principalId = principal.id;
    const pending = outcome.action;
    const kind = pending.kind;
    const directory = pending.directory;

    const notification = await this.requestApproval(pending, principal, assessment);
    const action = (await this.store.mitigations.update(pending.token, { notification })) ?? {
      ...pending,
      notification,
    };

    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: 'mitigation.applied',
      resourceType: 'mitigation',
      resourceId: action.token,
      outcome: directory?.succeeded ? 'success' : 'failure',
      details: {
        principalId,
        kind,
        compositeScore: assessment.compositeScore,
        attempted: directory?.attempted,
        notification: notification.status,
      },
    });

    log.info('Mitigation applied', {
      principalId,
      token: action.token,
      kind,
      succeeded: directory?.succeeded,
      notification: notification.status,
    });

    return { action, assessment, deduplicated: false };
  }

  private async recordMonitor(assessment: RiskAssessment): Promise<MitigationAction> {
    const now = new Date().toISOString();
    const action = await this.store.mitigations.create({
      token: `mit_${uuid()}`,
      principalId: assessment.principalId,
      kind: MitigationKind.Monitor,
      state: MitigationState.Applied,
      reason: `Monitoring: risk ${assessment.compositeScore} below threshold ${this.config.autoMitigationThreshold}`,
      compositeScore: assessment.compositeScore,
      createdAt: now,
      updatedAt: now,
    });

    await this.audit.recordSafely({
      actorId: ACTOR_ID,
      action: 'mitigation.monitored',
      resourceType: 'mitigation',
      resourceId: action.token,
      outcome: 'success',
      details: { principalId: action.principalId, compositeScore: action.compositeScore },
    });

    return action;
  }

  /** Conditional-access block, falling back to disabling the account. */
  private async block(
    principalId: string,
    reason: string,
  ): Promise<{ kind: MitigationKind; outcome: DirectoryOutcome }> {
    const attempted: MitigationKind[] = [MitigationKind.ConditionalAccessBlock];
    const failures: TypedError[] = [];

    try {
      const message = await this.directory.conditionalAccessBlock(
        principalId,
        reason,
        this.config.conditionalAccessPolicyTemplateId,
      );
      return {
        kind: MitigationKind.ConditionalAccessBlock,
        outcome: { attempted, succeeded: true, message, failures },
      };
    } catch (err) {
      failures.push(this.actionError('conditionalAccessBlock', err, principalId));
      log.warn('Conditional access block failed, falling back to disable', {
        principalId,
        error: errorMessage(err),
      });
    }

    attempted.push(MitigationKind.Disable);
    try {
      const message = await this.directory.disablePrincipal(principalId, reason);
      return { kind: MitigationKind.Disable, outcome: { attempted, succeeded: true, message, failures } };
    } catch (err) {
      const error = this.actionError('disablePrincipal', err, principalId);
      failures.push(error);
      log.error('Disable fallback failed', { principalId, error: error.message });
      return { kind: MitigationKind.Disable, outcome: { attempted, succeeded: false, message: error.message, failures } };
    }
  }

  private actionError(operation: string, err: unknown, principalId: string): TypedError {
    return directoryActionError(
      operation,
      errorMessage(err),
      { directoryCode: isDirectoryError(err) ? err.code : undefined },
      principalId,
    );
  }

  private async requestApproval(
    action: MitigationAction,
    principal: Principal,
    assessment: RiskAssessment,
  ): Promise<NotificationRecord> {
    const at = new Date().toISOString();
    try {
      const result = await this.channel.sendMitigationApproval({
        token: action.token,
        principalId: action.principalId,
        displayName: principal.displayName,
        kind: action.kind,
        reason: action.reason,
        compositeScore: action.compositeScore,
        riskLevel: assessment.riskLevel,
      });
      if (result.success) return { status: 'sent', at };
      const error = notificationError(result.error ?? 'Approval channel did not accept the card');
      log.warn('Approval card not delivered', { token: action.token, code: error.code, error: error.message });
      return { status: 'failed', error: error.message, at };
    } catch (err) {
      const error = notificationError(errorMessage(err));
      log.error('Approval card delivery threw', { token: action.token, code: error.code, error: error.message });
      return { status: 'failed', error: error.message, at };
    }
  }
}
