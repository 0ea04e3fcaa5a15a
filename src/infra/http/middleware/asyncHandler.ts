import type { NextFunction, Request, RequestHandler, Response } from 'express';

export type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Adapt an async route to Express 4, which ignores returned promises:
 * a rejection is handed to the error handler through `next`.
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void route(req, res, next).catch(next);
  };
}
