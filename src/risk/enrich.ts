import type { RiskConfig } from "../config/risk";
import { evaluateSignals } from "./signals";
import { classifyTier, riskScore } from "./tiers";
import type { CustomerRecord, EnrichedCustomer, EnrichedDataset } from "./types";

export function isDelinquent(record: Pick<CustomerRecord, "dpd_bucket_next_month">): boolean {
  return record.dpd_bucket_next_month > 0;
}

export function enrichCustomer(record: CustomerRecord, config: RiskConfig): EnrichedCustomer {
  const signals = evaluateSignals(record, config.signals);
  const score = riskScore(signals);
  return Object.freeze({
    ...record,
    signals,
    risk_score: score,
    risk_tier: classifyTier(score, config.tiers),
    is_delinquent: isDelinquent(record),
  });
}

/**
 * Builds the enriched dataset from raw records. The result is frozen; a
 * reload produces a new dataset rather than mutating this one.
 */
export function enrichDataset(records: ReadonlyArray<CustomerRecord>, config: RiskConfig): EnrichedDataset {
  return Object.freeze(records.map((record) => enrichCustomer(record, config)));
}
