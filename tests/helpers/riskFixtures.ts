import fs from "node:fs";
import path from "node:path";
import pino from "pino";

import { defaultRiskConfig } from "../../src/config/risk";
import { createAppState, type AppState } from "../../src/context";
import { parseCustomerCsv } from "../../src/data/loader";
import { ProbabilityModelAdapter, type ProbabilityModel } from "../../src/ml/model";
import { enrichDataset } from "../../src/risk/enrich";
import type { BehaviourFields, CustomerRecord, EnrichedDataset } from "../../src/risk/types";
import { ready } from "../../src/types/availability";

export const FIXTURE_CSV = path.join(__dirname, "..", "fixtures", "customers.csv");

export const silentLogger = pino({ level: "silent" });

export function fixtureRecords(): CustomerRecord[] {
  return parseCustomerCsv(fs.readFileSync(FIXTURE_CSV, "utf8"));
}

export function fixtureDataset(): EnrichedDataset {
  return enrichDataset(fixtureRecords(), defaultRiskConfig);
}

export function customer(overrides: Partial<CustomerRecord> = {}): CustomerRecord {
  return {
    customer_id: "T001",
    credit_limit: 10000,
    utilisation_pct: 30,
    avg_payment_ratio: 90,
    min_due_paid_frequency: 95,
    merchant_mix_index: 0.8,
    cash_withdrawal_pct: 0,
    recent_spend_change_pct: 0,
    dpd_bucket_next_month: 0,
    ...overrides,
  };
}

/** Trips all five signals under the default thresholds. */
export const ALL_SIGNALS: BehaviourFields = {
  utilisation_pct: 90,
  avg_payment_ratio: 30,
  min_due_paid_frequency: 20,
  merchant_mix_index: 0.3,
  cash_withdrawal_pct: 20,
  recent_spend_change_pct: -20,
};

export function fixedModel(probability: number): ProbabilityModel {
  return {
    name: "fixed",
    version: "v001",
    predict: () => probability,
    importances: () => [
      { feature: "Utilisation %", importance: 0.6 },
      { feature: "signal_cash_surge", importance: 0.3 },
      { feature: "Merchant Mix Index", importance: 0.1 },
    ],
  };
}

export function fixtureState(model = ProbabilityModelAdapter.notReady("No trained model registered")): AppState {
  return createAppState({ dataset: ready(fixtureDataset()), model });
}
