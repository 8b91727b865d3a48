import { z } from "zod";

import { FEATURE_NAMES } from "../ml/features";
import { RISK_TIERS } from "../risk/types";
import { DEFAULT_CUSTOMER_LIMIT, MAX_CUSTOMER_LIMIT } from "../services/riskAnalytics";

// Query strings arrive as strings; `z.coerce` turns "25" into 25 and rejects "abc".
export const customersQuerySchema = z.object({
  // `?tier=` with no value means no filter.
  tier: z.preprocess(
    (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z
      .string()
      .trim()
      .transform((value) => value.toUpperCase())
      .pipe(z.enum(RISK_TIERS))
      .optional(),
  ),
  limit: z.coerce
    .number()
    .int()
    .min(1, "limit must be at least 1")
    .default(DEFAULT_CUSTOMER_LIMIT)
    .transform((value) => Math.min(value, MAX_CUSTOMER_LIMIT)),
});

export const featureImportanceQuerySchema = z.object({
  top: z.coerce
    .number()
    .int()
    .min(1)
    .default(10)
    .transform((value) => Math.min(value, FEATURE_NAMES.length)),
});

/** Parses `input` or throws the `ZodError`, which the error handler maps to 400. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  return schema.parse(input);
}
