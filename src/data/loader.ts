import fs from "node:fs/promises";
import { existsSync } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import { DataUnavailableError, MalformedRecordError } from "../risk/errors";
import type { CustomerRecord } from "../risk/types";
import { COLUMN_HEADERS, CUSTOMER_FIELDS, headerToField } from "./columns";

const numericCell = z
  .string()
  .trim()
  .min(1)
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const customerRowSchema = z.object({
  customer_id: z.string().trim().min(1),
  utilisation_pct: numericCell,
  avg_payment_ratio: numericCell,
  min_due_paid_frequency: numericCell,
  merchant_mix_index: numericCell,
  cash_withdrawal_pct: numericCell,
  recent_spend_change_pct: numericCell,
  credit_limit: numericCell,
  dpd_bucket_next_month: numericCell,
});

const csvRowsSchema = z.array(z.record(z.string()));

/** Candidate locations, relative to the project root, tried in order. */
export const DEFAULT_DATA_LOCATIONS = [
  "data/cc_delinquency.csv",
  "cc_delinquency.csv",
  "data/cc_deliquency.csv",
  "cc_deliquency.csv",
];

export function resolveDataFile(explicit: string | undefined, rootDir = process.cwd()): string {
  if (explicit) {
    return path.resolve(rootDir, explicit);
  }
  const found = DEFAULT_DATA_LOCATIONS.map((rel) => path.resolve(rootDir, rel)).find((candidate) =>
    existsSync(candidate),
  );
  return found ?? path.resolve(rootDir, DEFAULT_DATA_LOCATIONS[0]);
}

/**
 * Parses the portfolio extract. Every row must carry every column; the first
 * bad row aborts the parse with a {@link MalformedRecordError}.
 */
export function parseCustomerCsv(text: string): CustomerRecord[] {
  const rows = csvRowsSchema.parse(
    parse(text, {
      // Known headers become record field names; unknown columns keep their header and are ignored.
      columns: (header: string[]) => header.map((h) => headerToField(h) ?? h.trim()),
      skip_empty_lines: true,
      trim: true,
    }),
  );

  const first = rows[0];
  if (first) {
    const missing = CUSTOMER_FIELDS.filter((field) => !(field in first));
    if (missing.length) {
      throw new MalformedRecordError(
        missing.map((field) => COLUMN_HEADERS[field]),
        "header",
      );
    }
  }

  return rows.map((row, idx) => {
    const candidate = Object.fromEntries(CUSTOMER_FIELDS.map((field) => [field, row[field]]));
    const parsed = customerRowSchema.safeParse(candidate);
    if (!parsed.success) {
      const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
      // Line numbers count the header as line 1.
      throw new MalformedRecordError(fields, `row ${idx + 2}`);
    }
    return Object.freeze(parsed.data);
  });
}

export async function loadCustomerDataset(filePath: string): Promise<CustomerRecord[]> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error: unknown) {
    throw new DataUnavailableError(`Data file not found at ${filePath}`, { cause: error });
  }
  try {
    return parseCustomerCsv(text);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new DataUnavailableError(`Data file ${filePath} could not be parsed: ${detail}`, { cause: error });
  }
}
