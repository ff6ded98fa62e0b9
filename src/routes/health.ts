// src/routes/health.ts
import { Router, Request, Response } from "express";
import { RenderCapabilities } from "../services/renderCapabilities";

/**
 * GET /health
 * Returns: { ok, status: "healthy" | "degraded", capabilities }
 *
 * Always 200. "degraded" means artifact routes answer 503.
 */
export function createHealthRouter(capabilities: RenderCapabilities): Router {
  const router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    const healthy = capabilities.charts && capabilities.pdf;
    res.status(200).json({
      ok: true,
      status: healthy ? "healthy" : "degraded",
      capabilities: {
        charts: capabilities.charts,
        pdf: capabilities.pdf,
      },
      details: capabilities.details,
    });
  });

  return router;
}
