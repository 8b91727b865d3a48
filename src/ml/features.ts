import { BehaviourFields, CONTINUOUS_FIELDS, SIGNAL_CODES, SignalSet } from "../risk/types";

export type FeatureVector = number[];

/**
 * Training-time feature order: the six behavioural fields, then the five
 * signals as 0/1. Models are only valid against vectors built in this order.
 */
export const FEATURE_NAMES: readonly string[] = Object.freeze([
  "Utilisation %",
  "Avg Payment Ratio",
  "Min Due Paid Frequency",
  "Merchant Mix Index",
  "Cash Withdrawal %",
  "Recent Spend Change %",
  ...SIGNAL_CODES.map((code) => `signal_${code}`),
]);

export function buildFeatureVector(fields: BehaviourFields, signals: SignalSet): FeatureVector {
  return [
    ...CONTINUOUS_FIELDS.map((field) => fields[field]),
    ...SIGNAL_CODES.map((code) => (signals[code] ? 1 : 0)),
  ];
}
