import { z } from "zod";

import type { RiskConfig } from "../config/risk";
import { COLUMN_HEADERS } from "../data/columns";
import { buildFeatureVector } from "../ml/features";
import type { ProbabilityModelAdapter } from "../ml/model";
import { InvalidCustomerDataError, ModelNotReadyError } from "../risk/errors";
import { interventionRecommendations } from "../risk/recommendations";
import { evaluateSignals, triggeredSignalLabels } from "../risk/signals";
import { round } from "../risk/stats";
import { classifyTier, riskScore } from "../risk/tiers";
import {
  BehaviourFields,
  CONTINUOUS_FIELDS,
  RiskTier,
  SIGNAL_CODES,
  SignalCode,
  SignalSet,
} from "../risk/types";

const UNKNOWN_CUSTOMER = "UNKNOWN";

const flag = z.union([z.boolean(), z.literal(0), z.literal(1)]).transform((value) => value === true || value === 1);

const customerInputSchema = z.object({
  customer_id: z
    .union([z.string().trim().min(1), z.number().finite()])
    .transform(String)
    .optional(),
  utilisation_pct: z.number().finite(),
  avg_payment_ratio: z.number().finite(),
  min_due_paid_frequency: z.number().finite(),
  merchant_mix_index: z.number().finite(),
  cash_withdrawal_pct: z.number().finite(),
  recent_spend_change_pct: z.number().finite(),
  spend_decline: flag.optional(),
  high_utilization: flag.optional(),
  payment_decline: flag.optional(),
  cash_surge: flag.optional(),
  low_merchant_mix: flag.optional(),
});

export interface CustomerScoreInput extends BehaviourFields {
  customer_id?: string;
  /** Caller-supplied flags; each one replaces the computed signal of the same name. */
  signal_overrides: Partial<Record<SignalCode, boolean>>;
}

export type ProbabilityEstimate =
  | { status: "available"; probability: number; confidence: number }
  | { status: "unavailable"; reason: string };

export interface CustomerScoreResult {
  customer_id: string;
  risk_score: number;
  risk_tier: RiskTier;
  /** `null` when no model is available; never a stand-in 0. */
  delinquency_probability: number | null;
  confidence: number | null;
  probability_status: ProbabilityEstimate["status"];
  probability_unavailable_reason?: string;
  triggered_signals: string[];
  overridden_signals: SignalCode[];
  recommendations: string[];
}

export interface CustomerScoringDeps {
  config: RiskConfig;
  model: ProbabilityModelAdapter;
}

function pick(raw: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) {
      return raw[key];
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a scoring payload. Fields may use snake_case names or the source
 * column headers ("Utilisation %"), and signal flags may carry a `signal_`
 * prefix.
 */
export function parseCustomerInput(raw: unknown): CustomerScoreInput {
  if (!isRecord(raw)) {
    throw new InvalidCustomerDataError(["body"], "Customer payload must be a JSON object");
  }

  const candidate: Record<string, unknown> = {
    customer_id: pick(raw, "customer_id", COLUMN_HEADERS.customer_id),
  };
  for (const field of CONTINUOUS_FIELDS) {
    candidate[field] = pick(raw, field, COLUMN_HEADERS[field]);
  }
  for (const code of SIGNAL_CODES) {
    candidate[code] = pick(raw, code, `signal_${code}`);
  }

  const parsed = customerInputSchema.safeParse(candidate);
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => String(issue.path[0])))];
    throw new InvalidCustomerDataError(fields, `Missing or invalid customer field(s): ${fields.join(", ")}`);
  }

  const data = parsed.data;
  const overrides: Partial<Record<SignalCode, boolean>> = {};
  for (const code of SIGNAL_CODES) {
    const value = data[code];
    if (value !== undefined) {
      overrides[code] = value;
    }
  }

  return {
    customer_id: data.customer_id,
    utilisation_pct: data.utilisation_pct,
    avg_payment_ratio: data.avg_payment_ratio,
    min_due_paid_frequency: data.min_due_paid_frequency,
    merchant_mix_index: data.merchant_mix_index,
    cash_withdrawal_pct: data.cash_withdrawal_pct,
    recent_spend_change_pct: data.recent_spend_change_pct,
    signal_overrides: overrides,
  };
}

export function resolveSignals(
  input: CustomerScoreInput,
  config: RiskConfig,
): { signals: SignalSet; overridden: SignalCode[] } {
  const computed = evaluateSignals(input, config.signals);
  const overridden = SIGNAL_CODES.filter((code) => {
    const supplied = input.signal_overrides[code];
    return supplied !== undefined && supplied !== computed[code];
  });
  const signals = Object.freeze({ ...computed, ...input.signal_overrides });
  return { signals, overridden };
}

export function estimateProbability(model: ProbabilityModelAdapter, vector: number[]): ProbabilityEstimate {
  try {
    const probability = model.score(vector);
    return { status: "available", probability, confidence: Math.abs(probability - 0.5) * 2 };
  } catch (error: unknown) {
    if (error instanceof ModelNotReadyError) {
      return { status: "unavailable", reason: error.message };
    }
    throw error;
  }
}

/**
 * Scores one customer. The rule-based score, tier and signals are always
 * returned; probability and confidence degrade to `null` when the model is
 * unavailable.
 */
export function scoreCustomer(input: CustomerScoreInput, deps: CustomerScoringDeps): CustomerScoreResult {
  const { signals, overridden } = resolveSignals(input, deps.config);
  const score = riskScore(signals);
  const tier = classifyTier(score, deps.config.tiers);
  const estimate = estimateProbability(deps.model, buildFeatureVector(input, signals));

  return {
    customer_id: input.customer_id ?? UNKNOWN_CUSTOMER,
    risk_score: score,
    risk_tier: tier,
    delinquency_probability: estimate.status === "available" ? round(estimate.probability, 3) : null,
    confidence: estimate.status === "available" ? round(estimate.confidence, 3) : null,
    probability_status: estimate.status,
    ...(estimate.status === "unavailable" ? { probability_unavailable_reason: estimate.reason } : {}),
    triggered_signals: triggeredSignalLabels(signals),
    overridden_signals: overridden,
    recommendations: interventionRecommendations(tier),
  };
}

export function scoreCustomerPayload(raw: unknown, deps: CustomerScoringDeps): CustomerScoreResult {
  return scoreCustomer(parseCustomerInput(raw), deps);
}
