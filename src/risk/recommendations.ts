import type { RiskTier } from "./types";

const RECOMMENDATIONS: Readonly<Record<RiskTier, readonly string[]>> = Object.freeze({
  HIGH: Object.freeze([
    "Direct phone outreach within 24-48 hours",
    "Offer payment plan or credit limit review",
    "Connect with financial counselor",
    "Monitor weekly for 3 months",
  ]),
  MEDIUM: Object.freeze([
    "Automated email with account health summary",
    "Offer payment flexibility or rate reduction",
    "Push financial wellness resources",
    "Monitor monthly for 2 months",
  ]),
  LOW: Object.freeze([
    "Educational email campaign",
    "Highlight available resources",
    "Quarterly monitoring",
    "Standard customer service",
  ]),
});

export function interventionRecommendations(tier: RiskTier): string[] {
  return [...RECOMMENDATIONS[tier]];
}
