import type { Request, Response, NextFunction, RequestHandler } from 'express';

export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => unknown;

/**
 * Route rejections from async handlers into the error middleware
 */
export function wrap(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    let result: unknown;
    try {
      result = handler(req, res, next);
    } catch (err) {
      next(err);
      return;
    }
    if (result instanceof Promise) {
      result.catch(next);
    }
  };
}
