/// <reference path="../../types/express.d.ts" />
import type { Request, Response, NextFunction } from 'express';

export function resolveClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for']?.toString().split(',')[0].trim();
  if (forwarded) {
    return forwarded;
  }

  const realIp = req.headers['x-real-ip']?.toString().trim();
  if (realIp) {
    return realIp;
  }

  const remote = req.socket.remoteAddress;
  if (!remote) {
    return 'unknown';
  }
  return remote.startsWith('::ffff:') ? remote.slice('::ffff:'.length) : remote;
}

export function clientIp(req: Request, _res: Response, next: NextFunction) {
  req.realIp = resolveClientIp(req);
  next();
}
