import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Express 4 ignores rejected handler promises; forward them to the error
 * handler instead.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}
