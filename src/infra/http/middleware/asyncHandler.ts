import type { Request, Response, NextFunction } from 'express';

/**
 * Adapt an async handler to Express: the returned handler is void and any rejection goes to next().
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
