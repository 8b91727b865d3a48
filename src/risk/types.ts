export const RISK_TIERS = ["HIGH", "MEDIUM", "LOW"] as const;

export type RiskTier = (typeof RISK_TIERS)[number];

export const SIGNAL_CODES = [
  "spend_decline",
  "high_utilization",
  "payment_decline",
  "cash_surge",
  "low_merchant_mix",
] as const;

export type SignalCode = (typeof SIGNAL_CODES)[number];

export type SignalSet = Readonly<Record<SignalCode, boolean>>;

export const CONTINUOUS_FIELDS = [
  "utilisation_pct",
  "avg_payment_ratio",
  "min_due_paid_frequency",
  "merchant_mix_index",
  "cash_withdrawal_pct",
  "recent_spend_change_pct",
] as const;

export type ContinuousField = (typeof CONTINUOUS_FIELDS)[number];

export type BehaviourFields = Readonly<Record<ContinuousField, number>>;

export interface CustomerRecord extends BehaviourFields {
  readonly customer_id: string;
  readonly credit_limit: number;
  readonly dpd_bucket_next_month: number;
}

export interface EnrichedCustomer extends CustomerRecord {
  readonly signals: SignalSet;
  readonly risk_score: number;
  readonly risk_tier: RiskTier;
  readonly is_delinquent: boolean;
}

export type EnrichedDataset = ReadonlyArray<EnrichedCustomer>;

