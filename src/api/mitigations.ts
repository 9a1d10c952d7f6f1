/**
 * Mitigation API routes.
 *
 * POST /principals/:principalId/evaluate — Assess a principal and act on the score
 * GET /principals/:principalId/mitigations — Mitigation history for a principal
 * GET /mitigations/:token — Get one mitigation action
 * GET /reports/compliance — Compliance summary over active principals
 * GET /reports/dormant — Active principals with no activity in `days` (default 90)
 * GET /reports/orphaned — Active principals without an active manager
 * GET /reports/sod — Segregation-of-duties conflicts
 * GET /audit — Audit records, filtered by resource and action
 */

import { Router } from 'express';
import { AuditService } from '../audit/audit-service';
import { isAuditAction } from '../domain/audit';
import { notFoundError, validationError } from '../domain/errors';
import { MitigationDecisionEngine } from '../engine/decision-engine';
import { DEFAULT_INACTIVE_DAYS, RiskReportService } from '../engine/risk-report';
import { Store } from '../storage/store';
import { sendError } from './middleware';

function queryNumber(value: unknown): number | undefined {
  if (typeof value !== 'string') return undefined;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

export const MAX_INACTIVE_DAYS = 3650;

/** `days` for the dormant scan: absent means the default, anything but 1..MAX_INACTIVE_DAYS is rejected. */
function inactiveDays(value: unknown): number | null {
  if (value === undefined) return DEFAULT_INACTIVE_DAYS;
  if (typeof value !== 'string' || !/^\d+$/.test(value)) return null;
  const days = parseInt(value, 10);
  return days >= 1 && days <= MAX_INACTIVE_DAYS ? days : null;
}

export function createMitigationRoutes(
  store: Store,
  engine: MitigationDecisionEngine,
  reports: RiskReportService,
  audit: AuditService,
): Router {
  const router = Router();

  router.post('/principals/:principalId/evaluate', async (req, res, next) => {
    try {
      const result = await engine.evaluate(req.params.principalId);
      if (!result.success) {
        sendError(res, result.error);
        return;
      }
      res.status(201).json(result.value);
    } catch (err) {
      next(err);
    }
  });

  router.get('/principals/:principalId/mitigations', async (req, res, next) => {
    try {
      const mitigations = await store.mitigations.listByPrincipal(req.params.principalId, {
        limit: queryNumber(req.query.limit),
        offset: queryNumber(req.query.offset),
      });
      res.json({ mitigations });
    } catch (err) {
      next(err);
    }
  });

  router.get('/mitigations/:token', async (req, res, next) => {
    try {
      const action = await store.mitigations.getByToken(req.params.token);
      if (!action) {
        sendError(res, notFoundError('Mitigation', req.params.token));
        return;
      }
      res.json({ mitigation: action });
    } catch (err) {
      next(err);
    }
  });

  router.get('/reports/compliance', async (req, res, next) => {
    try {
      const framework = typeof req.query.framework === 'string' && req.query.framework ? req.query.framework : 'SOX';
      res.json({ report: await reports.complianceReport(framework) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/reports/dormant', async (req, res, next) => {
    try {
      const days = inactiveDays(req.query.days);
      if (days === null) {
        sendError(res, validationError(`days must be a whole number from 1 to ${MAX_INACTIVE_DAYS}`));
        return;
      }
      res.json({ report: await reports.dormantAccounts(days) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/reports/orphaned', async (_req, res, next) => {
    try {
      res.json({ report: await reports.orphanedAccounts() });
    } catch (err) {
      next(err);
    }
  });

  router.get('/reports/sod', async (_req, res, next) => {
    try {
      const result = await reports.segregationOfDuties();
      if (!result.success) {
        sendError(res, result.error);
        return;
      }
      res.json({ report: result.value });
    } catch (err) {
      next(err);
    }
  });

  router.get('/audit', async (req, res, next) => {
    try {
      const { action, resourceId } = req.query;
      if (action !== undefined && !isAuditAction(action)) {
        sendError(res, validationError(`Unknown audit action: ${String(action)}`));
        return;
      }
      const records = await audit.query({
        action,
        resourceId: typeof resourceId === 'string' && resourceId ? resourceId : undefined,
        limit: queryNumber(req.query.limit),
        offset: queryNumber(req.query.offset),
      });
      res.json({ records });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
