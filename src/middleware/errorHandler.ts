// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import {
  DataUnavailable,
  IntakeReportError,
  RenderingFailure,
  ValidationError,
  errMessage,
} from '../services/errors';
import { sendError, sendNotFound, sendValidationError } from './responseHelper';

export function notFoundHandler(req: Request, res: Response): void {
  sendNotFound(res, `Route ${req.method} ${req.path} not found`);
}

/**
 * Maps IntakeReportError subclasses to their status codes. Server-side
 * failures get an error id that is logged and returned in the apology.
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ValidationError) {
    sendValidationError(res, err.details.length > 0 ? [err.message, ...err.details] : err.message);
    return;
  }

  if (err instanceof DataUnavailable) {
    sendError(res, err.message, 404, { reason: 'no_data' });
    return;
  }

  const errorId = uuid();
  const statusCode = err instanceof IntakeReportError ? err.statusCode : 500;
  console.error(`[Error ${errorId}] ${req.method} ${req.originalUrl}:`, errMessage(err));

  if (err instanceof RenderingFailure) {
    sendError(
      res,
      `Sorry, the chart could not be generated right now. Please try again later. Error ID: ${errorId}`,
      statusCode,
      { errorId }
    );
    return;
  }

  sendError(res, `Something went wrong. Error ID: ${errorId}`, statusCode, { errorId });
}
