// src/routes/charts.ts
import { Router, Request, Response } from "express";
import { matchedData } from "express-validator";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendFile, sendForbidden, sendSuccess } from "../middleware/responseHelper";
import { validateIdentityRequest, validateWindowRequest } from "../middleware/validation";
import { IntakeReportService, ReportResult } from "../services/intakeReportService";

export interface ChartsRouterOptions {
  maxWindowDays: number;
}

function windowDays(req: Request): number | undefined {
  const { days } = matchedData(req, { locations: ["query"] });
  return typeof days === "number" ? days : undefined;
}

/**
 * Artifact -> inline PNG/PDF with its export URL in X-Artifact-Url.
 * Upsell -> 403 JSON carrying the upgrade message.
 */
function sendResult(res: Response, result: ReportResult): Response {
  if (result.status === "upsell") {
    return sendForbidden(res, result.message, {
      reason: result.reason,
      feature: result.featureKey,
    });
  }

  const headers: Record<string, string> = { "X-Artifact-Url": result.reference.url };
  if (result.insufficientData) {
    headers["X-Data-Notice"] = "insufficient-data";
  }
  if (result.kind === "intake_report") {
    headers["Content-Disposition"] = `inline; filename="${result.reference.fileName}"`;
  }
  return sendFile(res, result.body, result.contentType, headers);
}

export function createChartsRouter(service: IntakeReportService, options: ChartsRouterOptions): Router {
  const router = Router();
  const windowRequest = validateWindowRequest(options.maxWindowDays);

  /**
   * GET /mpasi-milk-graph/:identity?days=7
   *
   * Daily MPASI + milk volumes (stacked) with calorie lines, PNG.
   */
  router.get(
    "/mpasi-milk-graph/:identity",
    windowRequest,
    asyncHandler(async (req: Request, res: Response) => {
      const result = await service.getIntakeChart(req.params.identity, windowDays(req));
      return sendResult(res, result);
    })
  );

  /**
   * GET /report-mpasi-milk/:identity?days=7
   *
   * PDF report (premium: pdf_reports).
   */
  router.get(
    "/report-mpasi-milk/:identity",
    windowRequest,
    asyncHandler(async (req: Request, res: Response) => {
      const result = await service.getIntakeReport(req.params.identity, windowDays(req));
      return sendResult(res, result);
    })
  );

  /**
   * GET /growth-chart/:identity
   *
   * Weight / height / head circumference panels, PNG (premium: advanced_charts).
   */
  router.get(
    "/growth-chart/:identity",
    validateIdentityRequest,
    asyncHandler(async (req: Request, res: Response) => {
      const result = await service.getGrowthChart(req.params.identity);
      return sendResult(res, result);
    })
  );

  // GET /api/v1/charts/:identity/share
  router.get(
    "/api/v1/charts/:identity/share",
    windowRequest,
    asyncHandler(async (req: Request, res: Response) => {
      const links = await service.getShareLinks(req.params.identity, windowDays(req));
      return sendSuccess(res, links);
    })
  );

  return router;
}
