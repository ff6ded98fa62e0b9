// src/middleware/responseHelper.ts
import { Response } from "express";

/**
 * JSON envelope shared by every non-binary response.
 */
export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: Record<string, unknown>;
}

export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): Response {
  const body: ApiResponse<T> = { ok: true, data };
  return res.status(statusCode).json(body);
}

export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  meta?: Record<string, unknown>
): Response {
  const response: ApiResponse = {
    ok: false,
    error,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

export function sendNotFound(res: Response, message: string = "Resource not found"): Response {
  return sendError(res, message, 404);
}

export function sendForbidden(
  res: Response,
  message: string = "Forbidden",
  meta?: Record<string, unknown>
): Response {
  return sendError(res, message, 403, meta);
}

export function sendValidationError(res: Response, errors: string | string[]): Response {
  const list = Array.isArray(errors) ? errors : [errors];
  return sendError(res, list.join(", "), 400, { type: "validation", details: list });
}

/**
 * Binary artifact (PNG / PDF) sent inline.
 */
export function sendFile(
  res: Response,
  body: Buffer,
  contentType: string,
  headers: Record<string, string> = {}
): Response {
  res.status(200);
  res.setHeader("Content-Type", contentType);
  res.setHeader("Cache-Control", "no-store");
  for (const [name, value] of Object.entries(headers)) {
    res.setHeader(name, value);
  }
  return res.send(body);
}
