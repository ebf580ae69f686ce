import helmet from 'helmet';
import express, { type ErrorRequestHandler, type Express } from 'express';
import { clientIp } from './middleware/clientIp.js';
import { ASSETS_PREFIX, createAssetRouter } from './routes/assets.js';
import type { RouterContext } from './routes/context.js';
import { createDescriptorRouter } from './routes/descriptors.js';
import { createFallbackRouter } from './routes/fallback.js';
import { createLoginRouter } from './routes/login.js';
import { createPresentRouter } from './routes/present.js';
import { describeError } from './utils/describeError.js';
import type { EventLog } from './utils/logger/EventLog.js';

export interface AppOptions extends RouterContext {
  assetsDir: string;
  loginDelayMs?: number;
}

function errorHandler(log: EventLog): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    log.event('WARN', `Error handling ${req.method} ${req.path}: ${describeError(err)}`);
    if (res.headersSent) {
      return next(err);
    }
    res.status(500).send('Internal Server Error');
  };
}

/**
 * Builds the web surface. Assets are matched first so the catch-all redirect
 * never swallows them.
 */
export function createApp(options: AppOptions): Express {
  const { session, log, templates } = options;
  const context: RouterContext = { session, log, templates };

  const app = express();
  app.set('case sensitive routing', true);
  app.set('strict routing', true);

  // Operator pages bring their own scripts and styles
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
      crossOriginOpenerPolicy: false,
      crossOriginResourcePolicy: false,
      strictTransportSecurity: false,
    }),
  );
  app.use(clientIp);

  app.use(ASSETS_PREFIX, createAssetRouter(options.assetsDir, log));
  app.use(createDescriptorRouter(context));
  app.use(createLoginRouter(context, options.loginDelayMs));
  app.use(createPresentRouter(context));
  app.use(createFallbackRouter(context));

  app.use(errorHandler(log));

  return app;
}
