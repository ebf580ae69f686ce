import { Router } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { basicAuthGate } from '../middleware/basicAuth.js';
import { ROUTER_OPTIONS, sendRendered, summarize, type RouterContext } from './context.js';

export const PRESENT_PATH = '/present.html';

export function createPresentRouter({ session, log, templates }: RouterContext): Router {
  const router = Router(ROUTER_OPTIONS);

  router.all(
    PRESENT_PATH,
    (req, _res, next) => {
      log.request('PHISH_HOOKED', summarize(req));
      next();
    },
    basicAuthGate(session.auth, log),
    asyncHandler(async (_req, res) => {
      await sendRendered(res, log, 'phish HTML', 'text/html', () =>
        templates.renderPhishingPage(),
      );
    }),
  );

  return router;
}
