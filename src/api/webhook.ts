/**
 * Approval callback route.
 *
 * POST /webhook/approval — decisions posted back by the approval channel
 */

import { Router } from 'express';
import { ApprovalCallbackHandler } from '../engine/callback-handler';
import { sendError } from './middleware';

export function createWebhookRoutes(handler: ApprovalCallbackHandler, secretHeader: string): Router {
  const router = Router();

  router.post('/approval', async (req, res, next) => {
    try {
      const result = await handler.handle({ secret: req.get(secretHeader), body: req.body });
      if (!result.accepted) {
        sendError(res, result.error);
        return;
      }
      res.json({ text: result.text });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
