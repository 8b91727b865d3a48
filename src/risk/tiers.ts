import type { TierThresholds } from "../config/risk";
import { SIGNAL_CODES, RiskTier, SignalSet } from "./types";

export function riskScore(signals: SignalSet): number {
  return SIGNAL_CODES.reduce((sum, code) => sum + (signals[code] ? 1 : 0), 0);
}

// Both cut points are inclusive: with high=3, medium=2 a score of 2 is MEDIUM.
export function classifyTier(score: number, thresholds: TierThresholds): RiskTier {
  if (score >= thresholds.high) {
    return "HIGH";
  }
  if (score >= thresholds.medium) {
    return "MEDIUM";
  }
  return "LOW";
}
