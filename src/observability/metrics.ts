import type { NextFunction, Request, Response } from "express";
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";

export interface RiskMetrics {
  register: Registry;
  requestLatency: Histogram<"route" | "method" | "status">;
  customersScored: Counter<"tier" | "probability_status">;
  middleware: (req: Request, res: Response, next: NextFunction) => void;
  handler: (req: Request, res: Response, next: NextFunction) => void;
}

// One registry per app, so several apps can live in one process.
export function createMetrics(): RiskMetrics {
  const register = new Registry();
  collectDefaultMetrics({ register });

  const requestLatency = new Histogram({
    name: "risk_http_request_duration_seconds",
    help: "HTTP request latency for the risk signals service",
    labelNames: ["route", "method", "status"] as const,
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2],
    registers: [register],
  });

  const customersScored = new Counter({
    name: "risk_customers_scored_total",
    help: "Customers scored through the scoring endpoint",
    labelNames: ["tier", "probability_status"] as const,
    registers: [register],
  });

  const middleware = (req: Request, res: Response, next: NextFunction) => {
    const end = requestLatency.startTimer({ method: req.method });
    res.once("finish", () => {
      const route = req.route?.path ? `${req.baseUrl}${req.route.path}` : "unmatched";
      end({ route, status: String(res.statusCode) });
    });
    next();
  };

  const handler = (_req: Request, res: Response, next: NextFunction) => {
    register
      .metrics()
      .then((body) => {
        res.setHeader("Content-Type", register.contentType);
        res.send(body);
      })
      .catch(next);
  };

  return { register, requestLatency, customersScored, middleware, handler };
}
