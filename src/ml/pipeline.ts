import type { EnrichedDataset } from "../risk/types";
import { FEATURE_NAMES, buildFeatureVector } from "./features";
import { LogisticProbabilityModel } from "./model";
import type { ModelMetadata, ModelRegistry } from "./registry";
import { TrainingOptions, TrainingSample, trainLogisticRegression } from "./training";

export const DEFAULT_MODEL_NAME = "delinquency_logistic";

export function buildTrainingSamples(dataset: EnrichedDataset): TrainingSample[] {
  return dataset.map((customer) => ({
    customer_id: customer.customer_id,
    features: buildFeatureVector(customer, customer.signals),
    label: customer.is_delinquent ? 1 : 0,
  }));
}

export interface TrainedDelinquencyModel {
  model: LogisticProbabilityModel;
  metadata: ModelMetadata;
  metrics: Record<string, number>;
}

/** Trains on the enriched dataset, registers the artifact, and returns the loaded model. */
export async function trainAndRegister(
  dataset: EnrichedDataset,
  registry: ModelRegistry,
  modelName = DEFAULT_MODEL_NAME,
  options: TrainingOptions = {},
): Promise<TrainedDelinquencyModel> {
  const samples = buildTrainingSamples(dataset);
  const result = trainLogisticRegression(samples, FEATURE_NAMES, options);

  const metadata = await registry.registerModel({
    modelName,
    artifact: { model: result.model, metrics: result.metrics },
    trainingData: samples,
    metrics: result.metrics,
  });

  return {
    model: new LogisticProbabilityModel(result.model, modelName, metadata.version),
    metadata,
    metrics: result.metrics,
  };
}
