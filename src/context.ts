import path from "node:path";

import type { AppEnv } from "./config/env";
import { RiskConfig, defaultRiskConfig, loadRiskConfig } from "./config/risk";
import { loadCustomerDataset, resolveDataFile } from "./data/loader";
import { LogisticProbabilityModel, ProbabilityModelAdapter } from "./ml/model";
import { trainAndRegister } from "./ml/pipeline";
import { ModelRegistry } from "./ml/registry";
import { logger as defaultLogger, type Logger } from "./observability/logger";
import { enrichDataset } from "./risk/enrich";
import type { EnrichedDataset } from "./risk/types";
import { RiskAnalytics } from "./services/riskAnalytics";
import { Availability, notReady, ready } from "./types/availability";

/**
 * Everything a request handler may read. Built once before the server
 * listens and never mutated afterwards.
 */
export interface AppState {
  readonly config: RiskConfig;
  readonly dataset: Availability<EnrichedDataset>;
  readonly analytics: Availability<RiskAnalytics>;
  readonly model: ProbabilityModelAdapter;
}

export function createAppState(parts: {
  config?: RiskConfig;
  dataset: Availability<EnrichedDataset>;
  model: ProbabilityModelAdapter;
}): AppState {
  const config = parts.config ?? defaultRiskConfig;
  const analytics: Availability<RiskAnalytics> =
    parts.dataset.status === "ready"
      ? ready(new RiskAnalytics(parts.dataset.value, config))
      : notReady<RiskAnalytics>(parts.dataset.reason);
  return Object.freeze({ config, dataset: parts.dataset, analytics, model: parts.model });
}

export interface BootstrapOptions {
  env: Pick<AppEnv, "DATA_FILE" | "RISK_CONFIG_FILE" | "MODELS_DIR" | "MODEL_NAME" | "ALLOW_STARTUP_TRAINING">;
  config?: RiskConfig;
  logger?: Logger;
  rootDir?: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function loadDataset(
  options: BootstrapOptions,
  config: RiskConfig,
  log: Logger,
): Promise<Availability<EnrichedDataset>> {
  const file = resolveDataFile(options.env.DATA_FILE, options.rootDir);
  try {
    const records = await loadCustomerDataset(file);
    const dataset = enrichDataset(records, config);
    log.info({ file, customers: dataset.length }, "dataset_loaded");
    return ready(dataset);
  } catch (error: unknown) {
    log.error({ err: error, file }, "dataset_unavailable");
    return notReady<EnrichedDataset>(describe(error));
  }
}

async function loadModel(
  options: BootstrapOptions,
  dataset: Availability<EnrichedDataset>,
  log: Logger,
): Promise<ProbabilityModelAdapter> {
  const { MODELS_DIR, MODEL_NAME, ALLOW_STARTUP_TRAINING } = options.env;
  const registry = new ModelRegistry(path.resolve(options.rootDir ?? process.cwd(), MODELS_DIR));

  try {
    const loaded = await registry.loadLatest(MODEL_NAME);
    if (loaded) {
      log.info({ model: MODEL_NAME, version: loaded.metadata.version }, "model_loaded");
      return ProbabilityModelAdapter.ready(
        new LogisticProbabilityModel(loaded.artifact.model, MODEL_NAME, loaded.metadata.version),
      );
    }
  } catch (error: unknown) {
    log.error({ err: error, model: MODEL_NAME }, "model_load_failed");
    return ProbabilityModelAdapter.notReady(`Model ${MODEL_NAME} failed to load: ${describe(error)}`);
  }

  if (!ALLOW_STARTUP_TRAINING) {
    log.info({ model: MODEL_NAME }, "model_not_registered");
    return ProbabilityModelAdapter.notReady("No trained model registered and startup training disabled");
  }
  if (dataset.status !== "ready") {
    return ProbabilityModelAdapter.notReady(`Startup training skipped: ${dataset.reason}`);
  }

  try {
    const trained = await trainAndRegister(dataset.value, registry, MODEL_NAME);
    log.info({ model: MODEL_NAME, version: trained.metadata.version, metrics: trained.metrics }, "model_trained");
    return ProbabilityModelAdapter.ready(trained.model);
  } catch (error: unknown) {
    log.error({ err: error, model: MODEL_NAME }, "model_training_failed");
    return ProbabilityModelAdapter.notReady(`Startup training failed: ${describe(error)}`);
  }
}

async function resolveConfig(options: BootstrapOptions, log: Logger): Promise<RiskConfig> {
  if (options.config) {
    return options.config;
  }
  const file = options.env.RISK_CONFIG_FILE;
  if (!file) {
    return defaultRiskConfig;
  }
  const config = await loadRiskConfig(path.resolve(options.rootDir ?? process.cwd(), file));
  log.info({ file, tiers: config.tiers }, "risk_config_loaded");
  return config;
}

/**
 * Loads the dataset and model once. Dataset and model failures are recorded
 * as not-ready states; an invalid risk configuration is thrown.
 */
export async function bootstrapState(options: BootstrapOptions): Promise<AppState> {
  const log = options.logger ?? defaultLogger;
  const config = await resolveConfig(options, log);
  const dataset = await loadDataset(options, config, log);
  const model = await loadModel(options, dataset, log);
  return createAppState({ config, dataset, model });
}
