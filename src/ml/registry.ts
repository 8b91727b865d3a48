import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { z } from "zod";

import { FEATURE_NAMES } from "./features";
import type { LogisticModelParams } from "./training";

export interface ModelMetadata {
  model_name: string;
  version: string;
  training_data_hash: string;
  metrics: Record<string, number>;
  created_at: string;
  artifact_path: string;
}

export interface ModelArtifact {
  model: LogisticModelParams;
  metrics: Record<string, number>;
}

export interface LoadedModel {
  metadata: ModelMetadata;
  artifact: ModelArtifact;
}

const metadataSchema = z.object({
  model_name: z.string(),
  version: z.string().regex(/^v\d+$/u),
  training_data_hash: z.string(),
  metrics: z.record(z.number()),
  created_at: z.string(),
  artifact_path: z.string(),
});

const registrySchema = z.object({ models: z.array(metadataSchema) });

type RegistryFile = z.infer<typeof registrySchema>;

const artifactSchema = z.object({
  model: z
    .object({
      feature_names: z.array(z.string()),
      means: z.array(z.number()),
      scales: z.array(z.number().positive()),
      weights: z.array(z.number()),
      bias: z.number(),
    })
    .refine(
      (m) => [m.means, m.scales, m.weights].every((arr) => arr.length === m.feature_names.length),
      { message: "means, scales and weights must match feature_names in length" },
    ),
  metrics: z.record(z.number()),
});

export class ModelRegistry {
  private readonly registryPath: string;
  private readonly baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = path.resolve(baseDir ?? path.join(process.cwd(), "models"));
    this.registryPath = path.join(this.baseDir, "metadata.json");
  }

  private async loadRegistry(): Promise<RegistryFile> {
    try {
      const raw = await fs.readFile(this.registryPath, "utf8");
      return registrySchema.parse(JSON.parse(raw));
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return { models: [] };
      }
      throw error;
    }
  }

  private async saveRegistry(registry: RegistryFile): Promise<void> {
    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.registryPath, JSON.stringify(registry, null, 2));
  }

  private static formatVersion(versionNumber: number): string {
    return `v${versionNumber.toString().padStart(3, "0")}`;
  }

  private static versionNumber(version: string): number {
    return parseInt(version.replace(/^v/, ""), 10);
  }

  private nextVersion(registry: RegistryFile, modelName: string): string {
    const versions = registry.models
      .filter((entry) => entry.model_name === modelName)
      .map((entry) => ModelRegistry.versionNumber(entry.version))
      .filter((num) => !Number.isNaN(num));
    const next = versions.length ? Math.max(...versions) + 1 : 1;
    return ModelRegistry.formatVersion(next);
  }

  async registerModel(options: {
    modelName: string;
    artifact: ModelArtifact;
    trainingData: unknown;
    metrics: Record<string, number>;
  }): Promise<ModelMetadata> {
    const registry = await this.loadRegistry();
    const version = this.nextVersion(registry, options.modelName);
    const modelDir = path.join(this.baseDir, options.modelName, version);
    const artifactPath = path.join(modelDir, "model.json");

    await fs.mkdir(modelDir, { recursive: true });
    await fs.writeFile(artifactPath, JSON.stringify(options.artifact, null, 2));

    const metadata: ModelMetadata = {
      model_name: options.modelName,
      version,
      training_data_hash: this.hashTrainingData(options.trainingData),
      metrics: options.metrics,
      created_at: new Date().toISOString(),
      artifact_path: path.relative(this.baseDir, artifactPath),
    };

    registry.models.push(metadata);
    await this.saveRegistry(registry);

    return metadata;
  }

  /**
   * Returns the highest registered version of `modelName`, or `null` when none
   * exists. Throws if the artifact is unreadable or was trained on a different
   * feature order.
   */
  async loadLatest(modelName: string): Promise<LoadedModel | null> {
    const registry = await this.loadRegistry();
    const candidates = registry.models
      .filter((entry) => entry.model_name === modelName)
      .sort((a, b) => ModelRegistry.versionNumber(b.version) - ModelRegistry.versionNumber(a.version));
    const latest = candidates[0];
    if (!latest) {
      return null;
    }

    const raw = await fs.readFile(path.resolve(this.baseDir, latest.artifact_path), "utf8");
    const artifact = artifactSchema.parse(JSON.parse(raw));
    const names = artifact.model.feature_names;
    if (names.length !== FEATURE_NAMES.length || names.some((name, idx) => name !== FEATURE_NAMES[idx])) {
      throw new Error(`MODEL_FEATURE_MISMATCH: ${modelName} ${latest.version} was trained on [${names.join(", ")}]`);
    }

    return { metadata: latest, artifact };
  }

  private hashTrainingData(trainingData: unknown): string {
    const hash = crypto.createHash("sha256");
    hash.update(JSON.stringify(trainingData));
    return hash.digest("hex");
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
