import type { NextFunction, Request, Response } from 'express';

/**
 * Lets routes be written as async functions; a rejection goes to `next()`
 * and so to the error handler.
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
