import type { InterventionEconomics } from "../config/risk";
import { rate, round, safeDivide } from "./stats";
import { RISK_TIERS, EnrichedDataset, RiskTier } from "./types";

export interface TierRoi {
  tier: RiskTier;
  count: number;
  delinquency_rate: number;
  prevention_rate: number;
  unit_cost: number;
  prevented: number;
  cost: number;
}

export interface RoiTotals {
  total_prevented: number;
  total_cost: number;
  revenue_protected: number;
  net_benefit: number;
  roi_percentage: number;
  per_dollar_yield: number;
}

export interface RoiAnalysis {
  program_cost: {
    high_tier: number;
    medium_tier: number;
    low_tier: number;
    total: number;
  };
  prevented_defaults: number;
  revenue_protected: number;
  net_benefit: number;
  roi_percentage: number;
  per_dollar_yield: number;
  tiers: TierRoi[];
}

/**
 * Per-tier intervention economics. The delinquency rate is the empirical
 * rate inside the tier, so an empty tier contributes nothing.
 */
export function tierRoi(dataset: EnrichedDataset, economics: InterventionEconomics): TierRoi[] {
  return RISK_TIERS.map((tier) => {
    const members = dataset.filter((c) => c.risk_tier === tier);
    const delinquencyRate = rate(members.map((c) => c.is_delinquent));
    const preventionRate = economics.prevention_rate[tier];
    const unitCost = economics.unit_cost[tier];
    return {
      tier,
      count: members.length,
      delinquency_rate: delinquencyRate,
      prevention_rate: preventionRate,
      unit_cost: unitCost,
      prevented: members.length * preventionRate * delinquencyRate,
      cost: members.length * unitCost,
    };
  });
}

// roi_percentage and per_dollar_yield are 0 when the programme costs nothing.
export function roiTotals(tiers: ReadonlyArray<TierRoi>, avgLossPerDefault: number): RoiTotals {
  const totalPrevented = tiers.reduce((acc, t) => acc + t.prevented, 0);
  const totalCost = tiers.reduce((acc, t) => acc + t.cost, 0);
  const revenueProtected = totalPrevented * avgLossPerDefault;
  return {
    total_prevented: totalPrevented,
    total_cost: totalCost,
    revenue_protected: revenueProtected,
    net_benefit: revenueProtected - totalCost,
    roi_percentage: safeDivide(revenueProtected - totalCost, totalCost) * 100,
    per_dollar_yield: safeDivide(revenueProtected, totalCost),
  };
}

export function simulateRoi(dataset: EnrichedDataset, economics: InterventionEconomics): RoiAnalysis {
  const tiers = tierRoi(dataset, economics);
  const totals = roiTotals(tiers, economics.avg_loss_per_default);
  const costOf = (tier: RiskTier) => tiers.find((t) => t.tier === tier)?.cost ?? 0;

  return {
    program_cost: {
      high_tier: costOf("HIGH"),
      medium_tier: costOf("MEDIUM"),
      low_tier: costOf("LOW"),
      total: totals.total_cost,
    },
    prevented_defaults: round(totals.total_prevented, 1),
    revenue_protected: totals.revenue_protected,
    net_benefit: totals.net_benefit,
    roi_percentage: round(totals.roi_percentage, 1),
    per_dollar_yield: round(totals.per_dollar_yield, 2),
    tiers: tiers.map((t) => ({
      ...t,
      delinquency_rate: round(t.delinquency_rate * 100, 1),
      prevented: round(t.prevented, 2),
    })),
  };
}
