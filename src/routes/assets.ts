import fs from 'fs';
import path from 'path';
import { Router, type Response } from 'express';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { describeError } from '../utils/describeError.js';
import type { EventLog } from '../utils/logger/EventLog.js';
import { ROUTER_OPTIONS, requestPath } from './context.js';

export const ASSETS_PREFIX = '/assets';

export const ASSET_CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.ico': 'image/x-icon',
  '.svg': 'image/svg+xml',
};

export const DEFAULT_ASSET_CONTENT_TYPE = 'application/octet-stream';

export function assetContentType(filePath: string): string {
  return ASSET_CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? DEFAULT_ASSET_CONTENT_TYPE;
}

/**
 * Map a request path below the prefix to a file under the asset root, or
 * undefined when it escapes the root.
 */
export function resolveAssetPath(assetsRoot: string, relative: string): string | undefined {
  const root = path.resolve(assetsRoot);
  const resolved = path.resolve(root, `.${path.sep}${relative}`);
  if (resolved !== root && !resolved.startsWith(root + path.sep)) {
    return undefined;
  }
  return resolved;
}

function sendFile(res: Response, filePath: string): Promise<void> {
  return new Promise((resolve, reject) => {
    res.sendFile(filePath, (err) => (err ? reject(err) : resolve()));
  });
}

function notFound(res: Response) {
  res.status(404).send('Not found.');
}

export function createAssetRouter(assetsRoot: string, log: EventLog): Router {
  const router = Router(ROUTER_OPTIONS);

  router.use(
    asyncHandler(async (req, res) => {
      // Only the `/assets/` subtree is served; the bare prefix gets the slash added
      if (req.originalUrl.split('?')[0] === ASSETS_PREFIX) {
        res.redirect(301, `${ASSETS_PREFIX}/`);
        return;
      }

      const fullPath = requestPath(req);
      log.event('ASSET', `Serving asset: ${fullPath}`);

      const filePath = resolveAssetPath(assetsRoot, fullPath.slice(ASSETS_PREFIX.length));
      if (!filePath) {
        log.event('DETECTION', `Asset path escapes the asset root from Host: ${req.realIp ?? 'unknown'}: ${fullPath}`);
        notFound(res);
        return;
      }

      const stat = await fs.promises.stat(filePath).catch(() => undefined);
      if (!stat?.isFile()) {
        log.event('ASSET', `File not found: ${filePath}`);
        notFound(res);
        return;
      }

      res.type(assetContentType(filePath));
      try {
        await sendFile(res, filePath);
      } catch (error) {
        log.event('WARN', `Error serving asset ${filePath}: ${describeError(error)}`);
        if (!res.headersSent) {
          notFound(res);
        }
      }
    }),
  );

  return router;
}
