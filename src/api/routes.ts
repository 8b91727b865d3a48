import { Router } from "express";
import type { NextFunction, Request, Response } from "express";

import type { AppState } from "../context";
import { HttpError } from "../http/error";
import { customersQuerySchema, featureImportanceQuerySchema, parseWith } from "../http/validate";
import type { RiskMetrics } from "../observability/metrics";
import { scoreCustomerPayload } from "../services/customerScoring";
import type { RiskAnalytics } from "../services/riskAnalytics";

type AnalyticsHandler = (req: Request, res: Response, analytics: RiskAnalytics) => void;

/**
 * Wraps a handler that needs the enriched dataset. The availability check
 * happens here once, so handlers never see a missing dataset.
 */
function withAnalytics(state: AppState, handler: AnalyticsHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (state.analytics.status !== "ready") {
      next(new HttpError(503, "ServiceUnavailable", `Risk service not available: ${state.analytics.reason}`));
      return;
    }
    try {
      handler(req, res, state.analytics.value);
    } catch (error) {
      next(error);
    }
  };
}

export function createRiskRouter(state: AppState, metrics: Pick<RiskMetrics, "customersScored">): Router {
  const router = Router();

  router.get(
    "/portfolio-summary",
    withAnalytics(state, (_req, res, analytics) => {
      res.json(analytics.getPortfolioSummary());
    }),
  );

  router.get(
    "/signals",
    withAnalytics(state, (_req, res, analytics) => {
      res.json(analytics.getSignalEffectiveness());
    }),
  );

  router.get(
    "/risk-distribution",
    withAnalytics(state, (_req, res, analytics) => {
      res.json(analytics.getRiskDistribution());
    }),
  );

  router.get(
    "/customers",
    withAnalytics(state, (req, res, analytics) => {
      const { tier, limit } = parseWith(customersQuerySchema, req.query);
      res.json(analytics.getCustomers(tier, limit));
    }),
  );

  router.get(
    "/intervention-roi",
    withAnalytics(state, (_req, res, analytics) => {
      res.json(analytics.calculateRoi());
    }),
  );

  router.get(
    "/dashboard-stats",
    withAnalytics(state, (_req, res, analytics) => {
      res.json(analytics.getDashboardStats());
    }),
  );

  // Scoring does not depend on the dataset; a missing model only degrades the probability.
  router.post("/score-customer", (req, res, next) => {
    try {
      const result = scoreCustomerPayload(req.body, { config: state.config, model: state.model });
      metrics.customersScored.inc({ tier: result.risk_tier, probability_status: result.probability_status });
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  router.get("/feature-importance", (req, res, next) => {
    try {
      const { top } = parseWith(featureImportanceQuerySchema, req.query);
      res.json({ top_features: state.model.topFeatures(top) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
