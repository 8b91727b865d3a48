import { ModelNotReadyError } from "../risk/errors";
import { Availability, notReady, ready } from "../types/availability";
import type { FeatureVector } from "./features";
import {
  FeatureImportance,
  LogisticModelParams,
  featureImportances,
  predictProbability,
} from "./training";

/** Anything that maps a feature vector to a probability of delinquency. */
export interface ProbabilityModel {
  readonly name: string;
  readonly version: string;
  predict(vector: FeatureVector): number;
  importances(): FeatureImportance[];
}

export class LogisticProbabilityModel implements ProbabilityModel {
  private readonly params: LogisticModelParams;
  private readonly ranking: ReadonlyArray<FeatureImportance>;

  constructor(
    params: LogisticModelParams,
    public readonly name: string,
    public readonly version: string,
  ) {
    this.params = Object.freeze({ ...params });
    this.ranking = Object.freeze(featureImportances(params).map((entry) => Object.freeze(entry)));
  }

  predict(vector: FeatureVector): number {
    return predictProbability(this.params, vector);
  }

  importances(): FeatureImportance[] {
    return this.ranking.map((entry) => ({ ...entry }));
  }
}

/**
 * Shared, read-only handle on the probability model. It holds no per-call
 * state, so concurrent handlers may call `score` freely.
 */
export class ProbabilityModelAdapter {
  private constructor(private readonly state: Availability<ProbabilityModel>) {}

  static ready(model: ProbabilityModel): ProbabilityModelAdapter {
    return new ProbabilityModelAdapter(ready(model));
  }

  static notReady(reason: string): ProbabilityModelAdapter {
    return new ProbabilityModelAdapter(notReady(reason));
  }

  get availability(): Availability<ProbabilityModel> {
    return this.state;
  }

  get isReady(): boolean {
    return this.state.status === "ready";
  }

  /** Probability in [0,1]. The vector must follow `FEATURE_NAMES` order. */
  score(vector: FeatureVector): number {
    const model = this.requireModel();
    const probability = model.predict(vector);
    if (!Number.isFinite(probability)) {
      throw new Error(`Model ${model.name}@${model.version} returned a non-finite probability`);
    }
    return Math.min(1, Math.max(0, probability));
  }

  topFeatures(n = 10): FeatureImportance[] {
    return this.requireModel().importances().slice(0, Math.max(0, n));
  }

  private requireModel(): ProbabilityModel {
    if (this.state.status !== "ready") {
      throw new ModelNotReadyError(this.state.reason);
    }
    return this.state.value;
  }
}
