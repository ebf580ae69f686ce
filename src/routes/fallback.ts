import { Router } from 'express';
import { basicAuthGate } from '../middleware/basicAuth.js';
import { PRESENT_PATH } from './present.js';
import { ROUTER_OPTIONS, summarize, type RouterContext } from './context.js';

/** Path fragment that exfiltration DTDs put in their callback URLs */
export const EXFIL_PATH_MARKER = 'exfiltrated';

export function createFallbackRouter({ session, log }: RouterContext): Router {
  const router = Router(ROUTER_OPTIONS);

  router.all('/favicon.ico', (_req, res) => {
    res.status(404).send('Not found.');
  });

  router.use(
    (req, _res, next) => {
      const summary = summarize(req);
      if (summary.path.includes(EXFIL_PATH_MARKER)) {
        log.request('EXFILTRATION', summary);
      } else {
        log.request('DETECTION', summary);
        log.event(
          'DETECTION',
          `Odd HTTP request from Host: ${summary.ip}, User Agent: ${summary.userAgent}`,
        );
        log.continuation(`${summary.method} ${summary.path}`);
        log.continuation('... sending to phishing page.');
      }
      next();
    },
    basicAuthGate(session.auth, log),
    (_req, res) => {
      res.redirect(301, PRESENT_PATH);
    },
  );

  return router;
}
