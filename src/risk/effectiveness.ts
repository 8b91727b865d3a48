import { SIGNAL_LABELS } from "./signals";
import { mean, rate, round, safeDivide } from "./stats";
import { RISK_TIERS, SIGNAL_CODES, EnrichedDataset, RiskTier, SignalCode } from "./types";

export interface SignalEffectiveness {
  name: string;
  code: SignalCode;
  prevalence: number;
  prevalence_pct: number;
  delinquency_rate_when_present: number;
  delinquency_rate_when_absent: number;
  risk_lift: number;
}

export interface TierRate {
  count: number;
  delinquency_rate: number;
}

export interface PortfolioSummary {
  total_customers: number;
  total_delinquent: number;
  delinquency_rate: number;
  tier_breakdown: Record<RiskTier, number>;
  high_risk: TierRate;
  medium_risk: TierRate;
  low_risk: TierRate;
}

export interface TierDistributionEntry {
  tier: RiskTier;
  count: number;
  percentage: number;
  delinquency_rate: number;
  avg_utilization: number;
  avg_payment_ratio: number;
  avg_min_due_frequency: number;
  avg_merchant_mix: number;
  avg_cash_withdrawal: number;
  avg_spend_change: number;
}

export interface RiskDistribution {
  /** Dense histogram keyed "0".."5"; scores that never occur report 0. */
  risk_score_distribution: Record<string, number>;
  tier_distribution: TierDistributionEntry[];
}

export const MAX_RISK_SCORE = SIGNAL_CODES.length;

/**
 * Lift of the delinquency rate when a signal fires over the rate when it does
 * not. A signal with no flagged customers, or a population whose unflagged
 * rate is zero, gets a neutral lift of 1 so the ratio never becomes infinite.
 */
export function computeLift(presentRate: number, absentRate: number, prevalence: number): number {
  if (prevalence === 0 || absentRate === 0) {
    return 1;
  }
  return presentRate / absentRate;
}

export function signalEffectiveness(dataset: EnrichedDataset): SignalEffectiveness[] {
  const total = dataset.length;

  const rows = SIGNAL_CODES.map((code): SignalEffectiveness => {
    const flagged = dataset.filter((c) => c.signals[code]);
    const unflagged = dataset.filter((c) => !c.signals[code]);

    const presentRate = rate(flagged.map((c) => c.is_delinquent)) * 100;
    const absentRate = rate(unflagged.map((c) => c.is_delinquent)) * 100;

    return {
      name: SIGNAL_LABELS[code],
      code,
      prevalence: flagged.length,
      prevalence_pct: round(safeDivide(flagged.length, total) * 100, 1),
      delinquency_rate_when_present: round(presentRate, 1),
      delinquency_rate_when_absent: round(absentRate, 1),
      risk_lift: round(computeLift(presentRate, absentRate, flagged.length), 2),
    };
  });

  // Array#sort is stable, so ties keep the fixed signal order.
  return rows.sort((a, b) => b.risk_lift - a.risk_lift);
}

export function portfolioSummary(dataset: EnrichedDataset): PortfolioSummary {
  const total = dataset.length;
  const delinquent = dataset.filter((c) => c.is_delinquent).length;

  const tierRate = (tier: RiskTier): TierRate => {
    const members = dataset.filter((c) => c.risk_tier === tier);
    return {
      count: members.length,
      delinquency_rate: round(rate(members.map((c) => c.is_delinquent)) * 100, 1),
    };
  };

  const high = tierRate("HIGH");
  const medium = tierRate("MEDIUM");
  const low = tierRate("LOW");

  return {
    total_customers: total,
    total_delinquent: delinquent,
    delinquency_rate: round(safeDivide(delinquent, total) * 100, 2),
    tier_breakdown: { HIGH: high.count, MEDIUM: medium.count, LOW: low.count },
    high_risk: high,
    medium_risk: medium,
    low_risk: low,
  };
}

export function riskDistribution(dataset: EnrichedDataset): RiskDistribution {
  const histogram: Record<string, number> = {};
  for (let score = 0; score <= MAX_RISK_SCORE; score += 1) {
    histogram[String(score)] = 0;
  }
  for (const customer of dataset) {
    histogram[String(customer.risk_score)] += 1;
  }

  const tiers = RISK_TIERS.map((tier): TierDistributionEntry => {
    const members = dataset.filter((c) => c.risk_tier === tier);
    const avg = (pick: (c: (typeof members)[number]) => number, digits = 1) =>
      round(mean(members.map(pick)), digits);
    return {
      tier,
      count: members.length,
      percentage: round(safeDivide(members.length, dataset.length) * 100, 1),
      delinquency_rate: round(rate(members.map((c) => c.is_delinquent)) * 100, 1),
      avg_utilization: avg((c) => c.utilisation_pct),
      avg_payment_ratio: avg((c) => c.avg_payment_ratio),
      avg_min_due_frequency: avg((c) => c.min_due_paid_frequency),
      avg_merchant_mix: avg((c) => c.merchant_mix_index, 2),
      avg_cash_withdrawal: avg((c) => c.cash_withdrawal_pct),
      avg_spend_change: avg((c) => c.recent_spend_change_pct),
    };
  });

  return { risk_score_distribution: histogram, tier_distribution: tiers };
}
