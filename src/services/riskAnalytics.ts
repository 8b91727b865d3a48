import type { RiskConfig } from "../config/risk";
import {
  PortfolioSummary,
  RiskDistribution,
  SignalEffectiveness,
  portfolioSummary,
  riskDistribution,
  signalEffectiveness,
} from "../risk/effectiveness";
import { RoiAnalysis, simulateRoi } from "../risk/roi";
import { triggeredSignalLabels } from "../risk/signals";
import { round } from "../risk/stats";
import type { EnrichedDataset, RiskTier } from "../risk/types";

export const DEFAULT_CUSTOMER_LIMIT = 20;
export const MAX_CUSTOMER_LIMIT = 100;

export interface CustomerSummary {
  customer_id: string;
  risk_tier: RiskTier;
  risk_score: number;
  utilization: number;
  payment_ratio: number;
  spend_change: number;
  is_delinquent: boolean;
  credit_limit: number;
  triggered_signals: string[];
}

export interface DashboardStats {
  portfolio: PortfolioSummary;
  roi: RoiAnalysis;
  top_signals: SignalEffectiveness[];
}

export function effectiveCustomerLimit(limit: number = DEFAULT_CUSTOMER_LIMIT): number {
  if (!Number.isFinite(limit)) {
    return DEFAULT_CUSTOMER_LIMIT;
  }
  return Math.min(MAX_CUSTOMER_LIMIT, Math.max(0, Math.floor(limit)));
}

/**
 * Population-level analytics over one enriched dataset. Every call rescans
 * the dataset; nothing is cached, so a reload only needs a new instance.
 */
export class RiskAnalytics {
  constructor(
    private readonly dataset: EnrichedDataset,
    private readonly config: RiskConfig,
  ) {}

  get size(): number {
    return this.dataset.length;
  }

  getPortfolioSummary(): PortfolioSummary {
    return portfolioSummary(this.dataset);
  }

  getSignalEffectiveness(): SignalEffectiveness[] {
    return signalEffectiveness(this.dataset);
  }

  getRiskDistribution(): RiskDistribution {
    return riskDistribution(this.dataset);
  }

  calculateRoi(): RoiAnalysis {
    return simulateRoi(this.dataset, this.config.economics);
  }

  /** Customers in dataset order, optionally filtered by tier. The limit is capped at 100. */
  getCustomers(tier?: RiskTier, limit?: number): CustomerSummary[] {
    const max = effectiveCustomerLimit(limit);
    const rows = tier ? this.dataset.filter((c) => c.risk_tier === tier) : this.dataset;
    return rows.slice(0, max).map((c) => ({
      customer_id: c.customer_id,
      risk_tier: c.risk_tier,
      risk_score: c.risk_score,
      utilization: round(c.utilisation_pct, 1),
      payment_ratio: round(c.avg_payment_ratio, 1),
      spend_change: round(c.recent_spend_change_pct, 1),
      is_delinquent: c.is_delinquent,
      credit_limit: Math.trunc(c.credit_limit),
      triggered_signals: triggeredSignalLabels(c.signals),
    }));
  }

  getDashboardStats(topSignals = 3): DashboardStats {
    return {
      portfolio: this.getPortfolioSummary(),
      roi: this.calculateRoi(),
      top_signals: this.getSignalEffectiveness().slice(0, topSignals),
    };
  }
}
