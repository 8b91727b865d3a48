import type { FeatureVector } from "./features";

export interface TrainingSample {
  customer_id: string;
  features: FeatureVector;
  label: number;
}

export interface LogisticModelParams {
  feature_names: string[];
  means: number[];
  scales: number[];
  weights: number[];
  bias: number;
}

export interface TrainingOptions {
  learningRate?: number;
  iterations?: number;
  lambda?: number;
}

export interface TrainingResult {
  model: LogisticModelParams;
  metrics: Record<string, number>;
}

export interface FeatureImportance {
  feature: string;
  importance: number;
}

const EPSILON = 1e-12;

export function sigmoid(value: number): number {
  if (value >= 0) {
    return 1 / (1 + Math.exp(-value));
  }
  const exp = Math.exp(value);
  return exp / (1 + exp);
}

function standardise(vector: FeatureVector, means: number[], scales: number[]): number[] {
  return vector.map((value, idx) => (value - means[idx]) / scales[idx]);
}

export function predictProbability(model: LogisticModelParams, vector: FeatureVector): number {
  const scaled = standardise(vector, model.means, model.scales);
  const z = scaled.reduce((acc, value, idx) => acc + value * model.weights[idx], model.bias);
  return sigmoid(z);
}

/**
 * Fits a logistic regression on standardised features with batch gradient
 * descent and L2 regularisation. Weights start at zero, so the same samples
 * always produce the same model.
 */
export function trainLogisticRegression(
  samples: TrainingSample[],
  featureNames: readonly string[],
  options: TrainingOptions = {},
): TrainingResult {
  if (!samples.length) {
    throw new Error("No training samples provided");
  }
  const dimension = featureNames.length;
  const mismatched = samples.find((s) => s.features.length !== dimension);
  if (mismatched) {
    throw new Error(
      `Sample ${mismatched.customer_id} has ${mismatched.features.length} features, expected ${dimension}`,
    );
  }

  const learningRate = options.learningRate ?? 0.5;
  const iterations = options.iterations ?? 500;
  const lambda = options.lambda ?? 1e-3;
  const rows = samples.length;

  const means = Array.from({ length: dimension }, (_, j) =>
    samples.reduce((acc, s) => acc + s.features[j], 0) / rows,
  );
  const scales = means.map((m, j) => {
    const variance = samples.reduce((acc, s) => acc + (s.features[j] - m) ** 2, 0) / rows;
    const std = Math.sqrt(variance);
    return std > 0 ? std : 1;
  });

  const design = samples.map((s) => standardise(s.features, means, scales));
  const target: number[] = samples.map((s) => (s.label > 0 ? 1 : 0));

  const weights: number[] = Array(dimension).fill(0);
  let bias = 0;

  for (let iter = 0; iter < iterations; iter += 1) {
    const gradW: number[] = Array(dimension).fill(0);
    let gradB = 0;
    for (let r = 0; r < rows; r += 1) {
      const z = design[r].reduce((acc, value, idx) => acc + value * weights[idx], bias);
      const error = sigmoid(z) - target[r];
      gradB += error;
      for (let j = 0; j < dimension; j += 1) {
        gradW[j] += error * design[r][j];
      }
    }
    for (let j = 0; j < dimension; j += 1) {
      weights[j] -= learningRate * (gradW[j] / rows + lambda * weights[j]);
    }
    bias -= learningRate * (gradB / rows);
  }

  const model: LogisticModelParams = {
    feature_names: [...featureNames],
    means,
    scales,
    weights,
    bias,
  };

  const predictions = samples.map((s) => predictProbability(model, s.features));
  const accuracy =
    predictions.reduce((acc, p, idx) => acc + ((p >= 0.5 ? 1 : 0) === target[idx] ? 1 : 0), 0) / rows;
  const logLoss =
    -predictions.reduce((acc, p, idx) => {
      const clipped = Math.min(1 - EPSILON, Math.max(EPSILON, p));
      return acc + (target[idx] === 1 ? Math.log(clipped) : Math.log(1 - clipped));
    }, 0) / rows;

  return {
    model,
    metrics: {
      accuracy: Number(accuracy.toFixed(4)),
      log_loss: Number(logLoss.toFixed(4)),
      positive_rate: Number((target.reduce((a, b) => a + b, 0) / rows).toFixed(4)),
      samples: rows,
    },
  };
}

/** Importance of each feature as its share of the absolute standardised weights. */
export function featureImportances(model: LogisticModelParams): FeatureImportance[] {
  const magnitudes = model.weights.map((w) => Math.abs(w));
  const total = magnitudes.reduce((a, b) => a + b, 0);
  return model.feature_names
    .map((feature, idx) => ({
      feature,
      importance: total > 0 ? magnitudes[idx] / total : 0,
    }))
    .sort((a, b) => b.importance - a.importance);
}
