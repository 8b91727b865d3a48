import { z } from "zod";

const TRUTHY = ["1", "true", "yes", "on"];

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => TRUTHY.includes((value ?? "").trim().toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  DATA_FILE: z.string().min(1).optional(),
  RISK_CONFIG_FILE: z.string().min(1).optional(),
  MODELS_DIR: z.string().min(1).default("models"),
  MODEL_NAME: z.string().min(1).default("delinquency_logistic"),
  ALLOW_STARTUP_TRAINING: booleanFlag,
  API_PREFIX: z
    .string()
    .regex(/^\/[\w/-]*$/u, "API_PREFIX must start with /")
    .default("/api/v1"),
  CORS_ORIGINS: z.string().default("*"),
});

export type AppEnv = Readonly<Omit<z.infer<typeof envSchema>, "CORS_ORIGINS">> & {
  readonly CORS_ORIGINS: "*" | readonly string[];
};

/** Parses and freezes the process environment. Throws on invalid values. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment: ${problems.join("; ")}`);
  }
  const { CORS_ORIGINS, ...rest } = parsed.data;
  const origins = CORS_ORIGINS.trim() === "*"
    ? "*"
    : Object.freeze(CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean));
  return Object.freeze({ ...rest, CORS_ORIGINS: origins });
}
