import { Request, Response, NextFunction, RequestHandler } from 'express';

// Controllers answer every request themselves; only errors go to `next`
export type AsyncRouteHandler = (req: Request, res: Response) => Promise<void>;

export const asyncHandler = (fn: AsyncRouteHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
};
