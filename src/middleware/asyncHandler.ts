// src/middleware/asyncHandler.ts
import { NextFunction, Request, RequestHandler, Response } from "express";

/** Chart route: resolves with the sent response, rejects with an IntakeReportError or a store failure. */
export type AsyncRoute = (req: Request, res: Response) => Promise<Response>;

/**
 * Hands a rejected chart route to errorHandler, which picks the status
 * (400 / 404 / 503 / 500) from the error class.
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    route(req, res).catch(next);
  };
}
