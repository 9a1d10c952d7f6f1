/**
 * Lifecycle API routes.
 *
 * POST /lifecycle/events — Apply a joiner / mover / leaver / access-granted event
 */

import { Router } from 'express';
import { LifecycleSync, parseLifecycleEvent } from '../groups/lifecycle-sync';
import { sendError } from './middleware';

export function createLifecycleRoutes(sync: LifecycleSync): Router {
  const router = Router();

  router.post('/lifecycle/events', async (req, res, next) => {
    try {
      const event = parseLifecycleEvent(req.body);
      if (!event.success) {
        sendError(res, event.error);
        return;
      }
      res.json({ result: await sync.handle(event.value) });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
