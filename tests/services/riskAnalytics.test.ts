import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { defaultRiskConfig } from "../../src/config/risk";
import { enrichDataset } from "../../src/risk/enrich";
import { RiskAnalytics, effectiveCustomerLimit } from "../../src/services/riskAnalytics";
import { ALL_SIGNALS, customer, fixtureDataset } from "../helpers/riskFixtures";

describe("RiskAnalytics.getCustomers", () => {
  const analytics = new RiskAnalytics(fixtureDataset(), defaultRiskConfig);

  it("summarises customers in dataset order", () => {
    const [first] = analytics.getCustomers(undefined, 1);
    assert.deepEqual(first, {
      customer_id: "C001",
      risk_tier: "HIGH",
      risk_score: 5,
      utilization: 90,
      payment_ratio: 30,
      spend_change: -20,
      is_delinquent: true,
      credit_limit: 5000,
      triggered_signals: [
        "Spending Decline",
        "High Utilization",
        "Payment Decline",
        "Cash Surge",
        "Low Merchant Mix",
      ],
    });
  });

  it("filters by tier", () => {
    assert.deepEqual(
      analytics.getCustomers("MEDIUM").map((c) => c.customer_id),
      ["C003", "C004"],
    );
  });

  it("caps the limit at 100", () => {
    const records = Array.from({ length: 150 }, (_, i) => customer({ customer_id: `B${i}`, ...ALL_SIGNALS }));
    const large = new RiskAnalytics(enrichDataset(records, defaultRiskConfig), defaultRiskConfig);
    assert.equal(large.getCustomers("HIGH", 150).length, 100);
    assert.equal(large.getCustomers().length, 20);
  });
});

describe("effectiveCustomerLimit", () => {
  it("defaults, floors and clamps", () => {
    assert.equal(effectiveCustomerLimit(), 20);
    assert.equal(effectiveCustomerLimit(7.9), 7);
    assert.equal(effectiveCustomerLimit(500), 100);
    assert.equal(effectiveCustomerLimit(-4), 0);
    assert.equal(effectiveCustomerLimit(Number.NaN), 20);
  });
});

describe("RiskAnalytics.getDashboardStats", () => {
  it("bundles portfolio, ROI and the strongest signals", () => {
    const analytics = new RiskAnalytics(fixtureDataset(), defaultRiskConfig);
    const stats = analytics.getDashboardStats();
    assert.equal(stats.portfolio.total_customers, 8);
    assert.equal(stats.roi.program_cost.total, 57);
    assert.deepEqual(
      stats.top_signals.map((s) => s.code),
      ["low_merchant_mix", "spend_decline", "high_utilization"],
    );
  });
});
