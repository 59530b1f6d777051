import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections to the error middleware.
 */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    void handler(req, res).catch(next);
  };
}
