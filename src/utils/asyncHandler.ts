import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Lets route handlers throw (AppError, domain errors, validation failures);
 * a rejected handler is forwarded to the global error handler.
 */
export const asyncHandler =
  (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    route(req, res, next).catch(next);
  };

export default asyncHandler;
