import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthSettings } from '../session/sessionIdentity.js';
import type { EventLog } from '../utils/logger/EventLog.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBasicCredentials(encoded: string): string | undefined {
  const value = encoded.trim();
  if (value.length % 4 !== 0 || !BASE64.test(value)) {
    return undefined;
  }
  return Buffer.from(value, 'base64').toString('utf8');
}

/**
 * Prompts for HTTP Basic credentials and logs whatever the client sends.
 * Every Basic answer is accepted; other schemes get a bare 500.
 */
export function basicAuthGate(auth: AuthSettings, log: EventLog): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!auth.enabled) {
      return next();
    }

    const header = req.headers.authorization;
    if (!header) {
      res
        .status(401)
        .set('WWW-Authenticate', `Basic realm="${auth.realm}"`)
        .type('text/html')
        .send('Unauthorized.');
      return;
    }

    if (header.startsWith('Basic ')) {
      const decoded = decodeBasicCredentials(header.slice('Basic '.length));
      if (decoded !== undefined) {
        log.event('CREDS_GIVEN', `HOST: ${req.realIp ?? 'unknown'}, BASIC-AUTH CREDS: ${decoded}`);
      }
      return next();
    }

    res.status(500).send('Something happened.');
  };
}
