import type { NextFunction, Request, Response } from 'express';

export type AsyncRequestHandler<P = Request['params'], ResBody = unknown, ReqBody = unknown> = (
  req: Request<P, ResBody, ReqBody>,
  res: Response<ResBody>,
  next: NextFunction,
) => Promise<void | Response>;

// Express 4 ignores rejected promises; route them to the error handler instead.
export const asyncHandler =
  <P = Request['params'], ResBody = unknown, ReqBody = unknown>(handler: AsyncRequestHandler<P, ResBody, ReqBody>) =>
  (req: Request<P, ResBody, ReqBody>, res: Response<ResBody>, next: NextFunction) => {
    void handler(req, res, next).catch(next);
  };
