// src/middleware/validation.ts
// Input validation middleware using express-validator

import { param, query, validationResult } from "express-validator";
import { Request, Response, NextFunction } from "express";
import { sendValidationError } from "./responseHelper";

/**
 * Returns 400 with every failed check, otherwise continues.
 */
export function handleValidationErrors(req: Request, res: Response, next: NextFunction) {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return sendValidationError(
      res,
      errors.array().map((e) => String(e.msg))
    );
  }
  next();
}

/**
 * :identity path parameter. Format checks (whatsapp number / p: token)
 * happen in the service, which also normalizes bare numbers.
 */
export const validateIdentityParam = param("identity")
  .trim()
  .isLength({ min: 1, max: 80 })
  .withMessage("identity must be between 1 and 80 characters")
  .matches(/^[A-Za-z0-9:+_.-]+$/)
  .withMessage("identity contains invalid characters");

/**
 * Optional ?days= window length, bounded by MAX_WINDOW_DAYS.
 */
export function validateDaysQuery(maxWindowDays: number) {
  return query("days")
    .optional()
    .isInt({ min: 1, max: maxWindowDays })
    .withMessage(`days must be a whole number between 1 and ${maxWindowDays}`)
    .toInt();
}

export function validateWindowRequest(maxWindowDays: number) {
  return [validateIdentityParam, validateDaysQuery(maxWindowDays), handleValidationErrors];
}

export const validateIdentityRequest = [validateIdentityParam, handleValidationErrors];
