import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { FEATURE_NAMES, buildFeatureVector } from "../../src/ml/features";
import { LogisticProbabilityModel, ProbabilityModelAdapter } from "../../src/ml/model";
import { buildTrainingSamples } from "../../src/ml/pipeline";
import {
  featureImportances,
  predictProbability,
  sigmoid,
  trainLogisticRegression,
} from "../../src/ml/training";
import { ModelNotReadyError } from "../../src/risk/errors";
import { fixedModel, fixtureDataset } from "../helpers/riskFixtures";

describe("buildFeatureVector", () => {
  it("orders behaviour fields before signal flags", () => {
    const [first] = fixtureDataset();
    assert.deepEqual(buildFeatureVector(first, first.signals), [90, 30, 20, 0.3, 20, -20, 1, 1, 1, 1, 1]);
    assert.equal(FEATURE_NAMES.length, 11);
    assert.equal(FEATURE_NAMES[6], "signal_spend_decline");
  });
});

describe("sigmoid", () => {
  it("stays finite for large magnitudes", () => {
    assert.equal(sigmoid(0), 0.5);
    assert.equal(sigmoid(-1000), 0);
    assert.equal(sigmoid(1000), 1);
  });
});

describe("trainLogisticRegression", () => {
  const samples = buildTrainingSamples(fixtureDataset());

  it("separates delinquent and healthy fixture customers", () => {
    const { model, metrics } = trainLogisticRegression(samples, FEATURE_NAMES);
    const byId = new Map(samples.map((s) => [s.customer_id, s.features]));
    const stressed = byId.get("C001");
    const healthy = byId.get("C008");
    assert.ok(stressed);
    assert.ok(healthy);
    assert.ok(predictProbability(model, stressed) > 0.5);
    assert.ok(predictProbability(model, healthy) < 0.5);
    assert.equal(metrics.samples, 8);
    assert.equal(metrics.positive_rate, 0.375);
  });

  it("produces the same model from the same samples", () => {
    const first = trainLogisticRegression(samples, FEATURE_NAMES, { iterations: 50 });
    const second = trainLogisticRegression(samples, FEATURE_NAMES, { iterations: 50 });
    assert.deepEqual(first.model, second.model);
  });

  it("rejects empty and mis-sized input", () => {
    assert.throws(() => trainLogisticRegression([], FEATURE_NAMES), /No training samples/);
    assert.throws(
      () => trainLogisticRegression([{ customer_id: "Z1", features: [1, 2], label: 0 }], FEATURE_NAMES),
      /Sample Z1 has 2 features, expected 11/,
    );
  });

  it("ranks importances that sum to one", () => {
    const { model } = trainLogisticRegression(samples, FEATURE_NAMES, { iterations: 100 });
    const ranking = featureImportances(model);
    const total = ranking.reduce((acc, entry) => acc + entry.importance, 0);
    assert.ok(Math.abs(total - 1) < 1e-9);
    for (let i = 1; i < ranking.length; i += 1) {
      assert.ok(ranking[i - 1].importance >= ranking[i].importance);
    }
  });
});

describe("ProbabilityModelAdapter", () => {
  it("clamps model output into [0, 1]", () => {
    assert.equal(ProbabilityModelAdapter.ready(fixedModel(1.4)).score([]), 1);
    assert.equal(ProbabilityModelAdapter.ready(fixedModel(-0.2)).score([]), 0);
  });

  it("rejects a non-finite probability", () => {
    assert.throws(() => ProbabilityModelAdapter.ready(fixedModel(Number.NaN)).score([]), /non-finite probability/);
  });

  it("raises ModelNotReadyError with the recorded reason", () => {
    const adapter = ProbabilityModelAdapter.notReady("training disabled");
    assert.equal(adapter.isReady, false);
    assert.throws(
      () => adapter.score([]),
      (error: unknown) => error instanceof ModelNotReadyError && error.message === "training disabled",
    );
    assert.throws(() => adapter.topFeatures(), ModelNotReadyError);
  });

  it("returns the top n importances", () => {
    const adapter = ProbabilityModelAdapter.ready(fixedModel(0.5));
    assert.deepEqual(
      adapter.topFeatures(2).map((f) => f.feature),
      ["Utilisation %", "signal_cash_surge"],
    );
  });

  it("wraps trained parameters", () => {
    const { model } = trainLogisticRegression(buildTrainingSamples(fixtureDataset()), FEATURE_NAMES, {
      iterations: 20,
    });
    const adapter = ProbabilityModelAdapter.ready(new LogisticProbabilityModel(model, "test_model", "v001"));
    const probability = adapter.score(buildTrainingSamples(fixtureDataset())[0].features);
    assert.ok(probability > 0 && probability < 1);
    assert.equal(adapter.topFeatures(100).length, 11);
  });
});
