import express, { Express } from "express";
import cors from "cors";
import morgan from "morgan";
import * as path from "path";

import { AppConfig, loadConfig } from "./env";
import { createPool } from "./db/pool";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";
import { createChartsRouter } from "./routes/charts";
import { createHealthRouter } from "./routes/health";
import { AccessGate, SubscriptionStore } from "./services/accessGate";
import { FileExporter } from "./services/fileExporter";
import { IntakeReportService } from "./services/intakeReportService";
import { PgRecordStore, RecordStore } from "./services/recordStore";
import { RenderCapabilities, detectRenderCapabilities } from "./services/renderCapabilities";
import { PgSubscriptionStore } from "./services/subscriptionStore";

export interface AppDeps {
  config: AppConfig;
  records: RecordStore;
  subscriptions: SubscriptionStore;
  capabilities: RenderCapabilities;
  now?: () => Date;
}

export function createApp(deps: AppDeps): Express {
  const { config } = deps;
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING)
  // ======================================================================

  const allowlist = new Set<string>(config.allowedOrigins);
  app.use(
    cors({
      origin: (origin, cb) => {
        // Server-to-server / same-origin requests carry no Origin header
        if (!origin) return cb(null, true);
        if (allowlist.size === 0 || allowlist.has(origin)) return cb(null, true);
        return cb(new Error(`CORS blocked: ${origin}`));
      },
      methods: ["GET", "OPTIONS"],
      exposedHeaders: ["X-Artifact-Url", "X-Data-Notice"],
    })
  );

  if (config.nodeEnv !== "test") {
    app.use(morgan("dev"));
  }

  // ======================================================================
  //                       STATIC EXPORTS + ROUTES
  // ======================================================================

  app.use(config.export.publicPath, express.static(path.resolve(config.export.rootDir)));

  const service = new IntakeReportService({
    records: deps.records,
    gate: new AccessGate(deps.subscriptions, { disabledFeatures: config.disabledFeatures }),
    exporter: new FileExporter(config.export),
    capabilities: deps.capabilities,
    config: {
      ...config.reporting,
      baseUrl: config.export.baseUrl,
    },
    now: deps.now,
  });

  app.use(createHealthRouter(deps.capabilities));
  app.use(createChartsRouter(service, { maxWindowDays: config.reporting.maxWindowDays }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required to start the server");
  }

  const pool = createPool(config.databaseUrl);
  const capabilities = await detectRenderCapabilities();

  const app = createApp({
    config,
    records: new PgRecordStore(pool, {
      timezone: config.reporting.timezone,
      asiKcalPerMl: config.reporting.asiKcalPerMl,
    }),
    subscriptions: new PgSubscriptionStore(pool),
    capabilities,
  });

  app.listen(config.port, () => {
    console.log(`Intake report service listening on port ${config.port}`);
  });
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}
