import "dotenv/config";

import path from "node:path";

import { loadEnv } from "../config/env";
import { loadRiskConfig } from "../config/risk";
import { loadCustomerDataset, resolveDataFile } from "../data/loader";
import { trainAndRegister } from "../ml/pipeline";
import { ModelRegistry } from "../ml/registry";
import { createLogger, logger } from "../observability/logger";
import { enrichDataset } from "../risk/enrich";

interface Args {
  dataFile?: string;
  modelName?: string;
  iterations?: number;
}

function parseArgs(argv: readonly string[]): Args {
  const args: Args = {};
  for (const arg of argv) {
    const [key, value] = arg.split("=");
    if (!value) continue;
    if (key === "--data") args.dataFile = value;
    if (key === "--model") args.modelName = value;
    if (key === "--iterations") {
      const iterations = Number(value);
      if (!Number.isInteger(iterations) || iterations < 1) {
        throw new Error(`--iterations must be a positive integer, got ${value}`);
      }
      args.iterations = iterations;
    }
  }
  return args;
}

async function main() {
  const env = loadEnv();
  const log = createLogger(env.LOG_LEVEL);
  const args = parseArgs(process.argv.slice(2));

  const file = resolveDataFile(args.dataFile ?? env.DATA_FILE);
  const records = await loadCustomerDataset(file);
  const config = await loadRiskConfig(env.RISK_CONFIG_FILE && path.resolve(env.RISK_CONFIG_FILE));
  const dataset = enrichDataset(records, config);

  const modelName = args.modelName ?? env.MODEL_NAME;
  const registry = new ModelRegistry(path.resolve(env.MODELS_DIR));
  const trained = await trainAndRegister(dataset, registry, modelName, { iterations: args.iterations });

  log.info(
    {
      model: modelName,
      version: trained.metadata.version,
      artifact: trained.metadata.artifact_path,
      metrics: trained.metrics,
      top_features: trained.model.importances().slice(0, 5),
    },
    "model_registered",
  );
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "model_training_failed");
  process.exitCode = 1;
});
