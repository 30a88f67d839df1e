/**
 * Shared formatting utilities
 */

import type { CostEstimate } from "./cost-estimator.js";

/**
 * Format an integer with thousands separators: 1234567 -> "1,234,567".
 */
export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

export function formatUsd(amount: number, digits = 4): string {
  return `US$${amount.toFixed(digits)}`;
}

/**
 * Lines shown before asking the user to confirm an ingestion.
 */
export function formatEstimate(estimate: CostEstimate, pricePerMillion: number): string[] {
  return [
    `Total characters: ${formatCount(estimate.charCount)}`,
    `Estimated tokens: ${formatCount(estimate.approxTokens)} (~4 chars/token)`,
    `Approximate one-off embedding cost: ${formatUsd(estimate.approxCostUsd)} (at ${formatUsd(pricePerMillion, 2)} per 1M tokens)`,
    "(Coarse estimate; actual billing may differ.)",
  ];
}
