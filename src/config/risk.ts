import fs from "node:fs/promises";
import { z } from "zod";

import type { RiskTier } from "../risk/types";

export interface SignalThresholds {
  spend_decline: number;
  utilization_high: number;
  utilization_medium: number;
  cash_withdrawal: number;
  payment_ratio_high: number;
  payment_ratio_medium: number;
  min_due_paid_frequency: number;
  merchant_mix: number;
}

export interface TierThresholds {
  high: number;
  medium: number;
}

export interface InterventionEconomics {
  unit_cost: Record<RiskTier, number>;
  prevention_rate: Record<RiskTier, number>;
  avg_loss_per_default: number;
}

export interface RiskConfig {
  signals: SignalThresholds;
  tiers: TierThresholds;
  economics: InterventionEconomics;
}

export interface RiskConfigOverrides {
  signals?: Partial<SignalThresholds>;
  tiers?: Partial<TierThresholds>;
  economics?: {
    unit_cost?: Partial<Record<RiskTier, number>>;
    prevention_rate?: Partial<Record<RiskTier, number>>;
    avg_loss_per_default?: number;
  };
}

export const defaultRiskConfig: RiskConfig = deepFreeze({
  signals: {
    spend_decline: -10,
    utilization_high: 80,
    utilization_medium: 70,
    cash_withdrawal: 15,
    payment_ratio_high: 40,
    payment_ratio_medium: 60,
    min_due_paid_frequency: 30,
    merchant_mix: 0.4,
  },
  tiers: {
    high: 3,
    medium: 2,
  },
  economics: {
    unit_cost: { HIGH: 20.0, MEDIUM: 7.5, LOW: 0.5 },
    prevention_rate: { HIGH: 0.4, MEDIUM: 0.25, LOW: 0.07 },
    avg_loss_per_default: 5000.0,
  },
});

/**
 * Merges overrides onto the defaults and freezes the result.
 *
 * Throws when the tier cut points would make classification non-monotone or
 * when an economics value is negative.
 */
export function resolveRiskConfig(overrides: RiskConfigOverrides = {}): RiskConfig {
  const base = defaultRiskConfig;
  const config: RiskConfig = {
    signals: { ...base.signals, ...overrides.signals },
    tiers: { ...base.tiers, ...overrides.tiers },
    economics: {
      unit_cost: { ...base.economics.unit_cost, ...overrides.economics?.unit_cost },
      prevention_rate: { ...base.economics.prevention_rate, ...overrides.economics?.prevention_rate },
      avg_loss_per_default: overrides.economics?.avg_loss_per_default ?? base.economics.avg_loss_per_default,
    },
  };

  if (config.tiers.high < config.tiers.medium) {
    throw new Error(`INVALID_TIER_THRESHOLDS: high (${config.tiers.high}) must be >= medium (${config.tiers.medium})`);
  }
  const economicsValues = [
    ...Object.values(config.economics.unit_cost),
    ...Object.values(config.economics.prevention_rate),
    config.economics.avg_loss_per_default,
  ];
  if (economicsValues.some((value) => !Number.isFinite(value) || value < 0)) {
    throw new Error("INVALID_ECONOMICS: costs, rates and losses must be non-negative numbers");
  }

  return deepFreeze(config);
}

const amount = z.number().finite();
const perTier = z.object({ HIGH: amount, MEDIUM: amount, LOW: amount }).partial().strict();

const riskOverridesSchema = z
  .object({
    signals: z
      .object({
        spend_decline: amount,
        utilization_high: amount,
        utilization_medium: amount,
        cash_withdrawal: amount,
        payment_ratio_high: amount,
        payment_ratio_medium: amount,
        min_due_paid_frequency: amount,
        merchant_mix: amount,
      })
      .partial()
      .strict()
      .optional(),
    tiers: z.object({ high: amount, medium: amount }).partial().strict().optional(),
    economics: z
      .object({
        unit_cost: perTier.optional(),
        prevention_rate: perTier.optional(),
        avg_loss_per_default: amount.optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Reads a JSON file of overrides and resolves it onto the defaults. Without
 * a file the defaults are returned unchanged.
 */
export async function loadRiskConfig(file?: string): Promise<RiskConfig> {
  if (!file) {
    return defaultRiskConfig;
  }
  const raw: unknown = JSON.parse(await fs.readFile(file, "utf8"));
  const parsed = riskOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`INVALID_RISK_CONFIG: ${file}: ${problems.join("; ")}`);
  }
  return resolveRiskConfig(parsed.data);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === "object" && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
