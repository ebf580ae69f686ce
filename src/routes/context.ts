import type { Request, Response } from 'express';
import type { SessionIdentity } from '../session/sessionIdentity.js';
import type { TemplateEngine } from '../templates/TemplateEngine.js';
import { describeError } from '../utils/describeError.js';
import type { EventLog, RequestSummary } from '../utils/logger/EventLog.js';

export interface RouterContext {
  session: SessionIdentity;
  log: EventLog;
  templates: TemplateEngine;
}

export const ROUTER_OPTIONS = { caseSensitive: true, strict: true } as const;

/** Decoded request path, or the raw one when it is not valid percent-encoding */
export function requestPath(req: Request): string {
  const raw = req.baseUrl + req.path;
  try {
    return decodeURIComponent(raw);
  } catch {
    return raw;
  }
}

export function summarize(req: Request): RequestSummary {
  return {
    ip: req.realIp ?? 'unknown',
    userAgent: req.get('user-agent') ?? '',
    method: req.method,
    path: requestPath(req),
  };
}

/**
 * Render and send a template; failures become a bare 500 and the detail goes
 * to the operator log only.
 */
export async function sendRendered(
  res: Response,
  log: EventLog,
  what: string,
  contentType: string,
  render: () => Promise<string>,
): Promise<void> {
  let body: string;
  try {
    body = await render();
  } catch (error) {
    log.event('WARN', `Error building ${what}: ${describeError(error)}`);
    res.status(500).send('Internal Server Error');
    return;
  }
  res.status(200).type(contentType).send(body);
}
