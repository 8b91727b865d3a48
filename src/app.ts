import cors from "cors";
import express from "express";

import { createRiskRouter } from "./api/routes";
import type { AppState } from "./context";
import { createErrorHandler, sendError } from "./http/error";
import { createHttpLogger, logger as defaultLogger, type Logger } from "./observability/logger";
import { createMetrics, type RiskMetrics } from "./observability/metrics";

export interface AppOptions {
  logger?: Logger;
  metrics?: RiskMetrics;
  apiPrefix?: string;
  corsOrigins?: "*" | readonly string[];
}

export function createApp(state: AppState, options: AppOptions = {}) {
  const log = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? createMetrics();
  const origins = options.corsOrigins ?? "*";

  const app = express();
  app.disable("x-powered-by");
  app.use(cors({ origin: origins === "*" ? "*" : [...origins] }));
  app.use(express.json({ limit: "1mb" }));
  app.use(createHttpLogger(log));
  app.use(metrics.middleware);

  app.get("/health", (_req, res) => {
    const healthy = state.dataset.status === "ready" && state.model.isReady;
    res.json({
      status: healthy ? "healthy" : "degraded",
      data_loaded: state.dataset.status === "ready",
      model_ready: state.model.isReady,
      ...(state.dataset.status === "not_ready" ? { dataset_reason: state.dataset.reason } : {}),
      ...(state.model.availability.status === "not_ready"
        ? { model_reason: state.model.availability.reason }
        : {}),
    });
  });
  app.get("/metrics", metrics.handler);

  app.use(options.apiPrefix ?? "/api/v1", createRiskRouter(state, metrics));

  app.use((req, res) => {
    sendError(req, res, 404, "NotFound", { detail: `No route for ${req.method} ${req.path}` });
  });
  app.use(createErrorHandler(log));

  return app;
}
