import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { defaultRiskConfig } from "../../src/config/risk";
import { MalformedRecordError } from "../../src/risk/errors";
import { evaluateSignalBatch, evaluateSignals, triggeredSignalLabels } from "../../src/risk/signals";
import { classifyTier, riskScore } from "../../src/risk/tiers";
import { ALL_SIGNALS, customer } from "../helpers/riskFixtures";

const thresholds = defaultRiskConfig.signals;

describe("evaluateSignals", () => {
  it("fires every signal for a stressed customer", () => {
    const signals = evaluateSignals(ALL_SIGNALS, thresholds);
    assert.deepEqual(signals, {
      spend_decline: true,
      high_utilization: true,
      payment_decline: true,
      cash_surge: true,
      low_merchant_mix: true,
    });
    assert.equal(riskScore(signals), 5);
  });

  it("scores a stressed account at 5 and tiers it HIGH", () => {
    const signals = evaluateSignals(
      {
        utilisation_pct: 85,
        cash_withdrawal_pct: 20,
        avg_payment_ratio: 35,
        min_due_paid_frequency: 10,
        merchant_mix_index: 0.2,
        recent_spend_change_pct: -15,
      },
      thresholds,
    );
    assert.equal(riskScore(signals), 5);
    assert.equal(classifyTier(riskScore(signals), defaultRiskConfig.tiers), "HIGH");
  });

  it("fires nothing for a healthy customer", () => {
    const signals = evaluateSignals(customer(), thresholds);
    assert.equal(riskScore(signals), 0);
    assert.deepEqual(triggeredSignalLabels(signals), []);
  });

  it("uses strict comparisons at the thresholds", () => {
    const signals = evaluateSignals(
      customer({
        recent_spend_change_pct: -10,
        utilisation_pct: 80,
        cash_withdrawal_pct: 15,
        avg_payment_ratio: 40,
        merchant_mix_index: 0.4,
      }),
      thresholds,
    );
    assert.equal(signals.spend_decline, false);
    assert.equal(signals.high_utilization, false);
    assert.equal(signals.payment_decline, false);
    assert.equal(signals.cash_surge, false);
    assert.equal(signals.low_merchant_mix, false);
  });

  it("flags high utilization from the medium band when cash withdrawals are high", () => {
    const signals = evaluateSignals(customer({ utilisation_pct: 72, cash_withdrawal_pct: 16 }), thresholds);
    assert.equal(signals.high_utilization, true);
    assert.equal(signals.cash_surge, true);
  });

  it("flags payment decline from the medium band when minimum-due frequency is low", () => {
    const low = evaluateSignals(customer({ avg_payment_ratio: 55, min_due_paid_frequency: 25 }), thresholds);
    const steady = evaluateSignals(customer({ avg_payment_ratio: 55, min_due_paid_frequency: 30 }), thresholds);
    assert.equal(low.payment_decline, true);
    assert.equal(steady.payment_decline, false);
  });

  it("rejects non-finite fields by name", () => {
    assert.throws(
      () => evaluateSignals(customer({ utilisation_pct: Number.NaN, merchant_mix_index: Infinity }), thresholds),
      (error: unknown) =>
        error instanceof MalformedRecordError &&
        error.code === "MALFORMED_RECORD" &&
        error.fields.join(",") === "utilisation_pct,merchant_mix_index",
    );
  });

  it("lists triggered labels in signal order", () => {
    const signals = evaluateSignals(customer({ merchant_mix_index: 0.2, recent_spend_change_pct: -30 }), thresholds);
    assert.deepEqual(triggeredSignalLabels(signals), ["Spending Decline", "Low Merchant Mix"]);
  });
});

describe("evaluateSignalBatch", () => {
  it("evaluates each record independently", () => {
    const batch = evaluateSignalBatch([ALL_SIGNALS, customer(), customer({ cash_withdrawal_pct: 40 })], thresholds);
    assert.deepEqual(batch.map(riskScore), [5, 0, 1]);
  });
});

describe("classifyTier", () => {
  it("maps scores onto inclusive cut points", () => {
    const tiers = defaultRiskConfig.tiers;
    assert.deepEqual(
      [0, 1, 2, 3, 4, 5].map((score) => classifyTier(score, tiers)),
      ["LOW", "LOW", "MEDIUM", "HIGH", "HIGH", "HIGH"],
    );
  });

  it("never lowers the tier as the score rises", () => {
    const rank = { LOW: 0, MEDIUM: 1, HIGH: 2 };
    const ranks = [0, 1, 2, 3, 4, 5].map((score) => rank[classifyTier(score, defaultRiskConfig.tiers)]);
    for (let i = 1; i < ranks.length; i += 1) {
      assert.ok(ranks[i] >= ranks[i - 1]);
    }
  });

  it("honours custom cut points", () => {
    assert.equal(classifyTier(4, { high: 5, medium: 4 }), "MEDIUM");
    assert.equal(classifyTier(1, { high: 1, medium: 1 }), "HIGH");
  });
});
