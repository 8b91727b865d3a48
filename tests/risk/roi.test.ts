import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { defaultRiskConfig, resolveRiskConfig } from "../../src/config/risk";
import { enrichDataset } from "../../src/risk/enrich";
import { interventionRecommendations } from "../../src/risk/recommendations";
import { roiTotals, simulateRoi, tierRoi } from "../../src/risk/roi";
import { customer, fixtureDataset } from "../helpers/riskFixtures";

function assertClose(actual: number, expected: number, tolerance = 1e-6) {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${actual} to be within ${tolerance} of ${expected}`);
}

describe("tierRoi", () => {
  it("applies per-tier costs and prevention rates", () => {
    const tiers = tierRoi(fixtureDataset(), defaultRiskConfig.economics);
    assert.deepEqual(
      tiers.map((t) => [t.tier, t.count, t.cost]),
      [
        ["HIGH", 2, 40],
        ["MEDIUM", 2, 15],
        ["LOW", 4, 2],
      ],
    );
    assertClose(tiers[0].prevented, 0.8);
    assertClose(tiers[1].prevented, 0.25);
    assert.equal(tiers[2].prevented, 0);
  });
});

describe("simulateRoi", () => {
  it("totals programme cost and protected revenue", () => {
    const roi = simulateRoi(fixtureDataset(), defaultRiskConfig.economics);
    assert.deepEqual(roi.program_cost, { high_tier: 40, medium_tier: 15, low_tier: 2, total: 57 });
    assertClose(roi.revenue_protected, 5250, 1e-6);
    assertClose(roi.net_benefit, 5193, 1e-6);
    assert.equal(roi.roi_percentage, 9110.5);
    assert.equal(roi.per_dollar_yield, 92.11);
    assert.deepEqual(
      roi.tiers.map((t) => t.delinquency_rate),
      [100, 50, 0],
    );
  });

  it("reports zero ROI when the programme costs nothing", () => {
    const free = resolveRiskConfig({ economics: { unit_cost: { HIGH: 0, MEDIUM: 0, LOW: 0 } } });
    const roi = simulateRoi(fixtureDataset(), free.economics);
    assert.equal(roi.program_cost.total, 0);
    assert.equal(roi.roi_percentage, 0);
    assert.equal(roi.per_dollar_yield, 0);
    assertClose(roi.revenue_protected, 5250, 1e-6);
  });

  it("leaves empty tiers out of the prevented total", () => {
    const dataset = enrichDataset([customer()], defaultRiskConfig);
    const roi = simulateRoi(dataset, defaultRiskConfig.economics);
    assert.equal(roi.prevented_defaults, 0);
    assert.equal(roi.program_cost.total, 0.5);
    assert.equal(roi.roi_percentage, -100);
  });
});

describe("roiTotals", () => {
  it("handles no tiers at all", () => {
    assert.deepEqual(roiTotals([], 5000), {
      total_prevented: 0,
      total_cost: 0,
      revenue_protected: 0,
      net_benefit: 0,
      roi_percentage: 0,
      per_dollar_yield: 0,
    });
  });
});

describe("interventionRecommendations", () => {
  it("returns four actions per tier", () => {
    assert.equal(interventionRecommendations("HIGH")[0], "Direct phone outreach within 24-48 hours");
    assert.equal(interventionRecommendations("MEDIUM").length, 4);
    assert.equal(interventionRecommendations("LOW")[3], "Standard customer service");
  });

  it("returns a copy the caller may modify", () => {
    const first = interventionRecommendations("LOW");
    first.push("extra");
    assert.equal(interventionRecommendations("LOW").length, 4);
  });
});
