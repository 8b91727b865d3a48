import type { CustomerRecord } from "../risk/types";

/** Source column headers, as they appear in the portfolio extract. */
export const COLUMN_HEADERS: Readonly<Record<keyof CustomerRecord, string>> = Object.freeze({
  customer_id: "Customer ID",
  utilisation_pct: "Utilisation %",
  avg_payment_ratio: "Avg Payment Ratio",
  min_due_paid_frequency: "Min Due Paid Frequency",
  merchant_mix_index: "Merchant Mix Index",
  cash_withdrawal_pct: "Cash Withdrawal %",
  recent_spend_change_pct: "Recent Spend Change %",
  credit_limit: "Credit Limit",
  dpd_bucket_next_month: "DPD Bucket Next Month",
});

export type CustomerField = keyof CustomerRecord;

export const CUSTOMER_FIELDS: readonly CustomerField[] = Object.freeze([
  "customer_id",
  "utilisation_pct",
  "avg_payment_ratio",
  "min_due_paid_frequency",
  "merchant_mix_index",
  "cash_withdrawal_pct",
  "recent_spend_change_pct",
  "credit_limit",
  "dpd_bucket_next_month",
]);

export function headerToField(header: string): CustomerField | undefined {
  const trimmed = header.trim();
  return CUSTOMER_FIELDS.find((field) => COLUMN_HEADERS[field] === trimmed);
}
