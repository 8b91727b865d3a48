import type { SignalThresholds } from "../config/risk";
import { MalformedRecordError } from "./errors";
import { BehaviourFields, CONTINUOUS_FIELDS, SIGNAL_CODES, SignalCode, SignalSet } from "./types";

export const SIGNAL_LABELS: Readonly<Record<SignalCode, string>> = Object.freeze({
  spend_decline: "Spending Decline",
  high_utilization: "High Utilization",
  payment_decline: "Payment Decline",
  cash_surge: "Cash Surge",
  low_merchant_mix: "Low Merchant Mix",
});

/**
 * Evaluates the five behavioural signals for one record.
 *
 * Every continuous field must be a finite number; anything else is reported
 * as a {@link MalformedRecordError} naming the offending fields.
 */
export function evaluateSignals(record: BehaviourFields, thresholds: SignalThresholds): SignalSet {
  assertBehaviourFields(record);

  const util = record.utilisation_pct;
  const payRatio = record.avg_payment_ratio;
  const minDue = record.min_due_paid_frequency;
  const mix = record.merchant_mix_index;
  const cash = record.cash_withdrawal_pct;
  const spendChange = record.recent_spend_change_pct;

  return Object.freeze({
    spend_decline: spendChange < thresholds.spend_decline,
    high_utilization:
      util > thresholds.utilization_high ||
      (util > thresholds.utilization_medium && cash > thresholds.cash_withdrawal),
    payment_decline:
      payRatio < thresholds.payment_ratio_high ||
      (payRatio < thresholds.payment_ratio_medium && minDue < thresholds.min_due_paid_frequency),
    cash_surge: cash > thresholds.cash_withdrawal,
    low_merchant_mix: mix < thresholds.merchant_mix,
  });
}

export function evaluateSignalBatch(
  records: ReadonlyArray<BehaviourFields>,
  thresholds: SignalThresholds,
): SignalSet[] {
  return records.map((record) => evaluateSignals(record, thresholds));
}

export function triggeredSignalLabels(signals: SignalSet): string[] {
  return SIGNAL_CODES.filter((code) => signals[code]).map((code) => SIGNAL_LABELS[code]);
}

function assertBehaviourFields(record: BehaviourFields): void {
  const invalid = CONTINUOUS_FIELDS.filter((field) => {
    const value: unknown = record[field];
    return typeof value !== "number" || !Number.isFinite(value);
  });
  if (invalid.length) {
    throw new MalformedRecordError(invalid);
  }
}
