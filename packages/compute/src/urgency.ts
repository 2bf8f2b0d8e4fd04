import {
  TARGET_MONTHS,
  URGENT_BELOW_MONTHS,
  WARNING_BELOW_MONTHS,
} from "../../model/src/constants.js";
import type { Urgency } from "../../model/src/schema.js";

export type UrgencyResult = {
  urgency: Urgency | null; // null = no active demand, not tracked
  months_of_stock: number;
};

export function calculateUrgency(qoh: number, monthlyAverage: number): UrgencyResult {
  if (monthlyAverage <= 0) return { urgency: null, months_of_stock: Infinity };

  // Out of stock while still being used: orders are being lost now
  if (qoh <= 0) return { urgency: "CRITICAL", months_of_stock: 0 };

  const months = qoh / monthlyAverage;

  if (months < URGENT_BELOW_MONTHS) return { urgency: "URGENT", months_of_stock: months };
  if (months < WARNING_BELOW_MONTHS) return { urgency: "WARNING", months_of_stock: months };
  return { urgency: "OK", months_of_stock: months };
}

/**
 * Units needed to bring coverage up to `targetMonths`:
 * `(targetMonths * monthlyAverage) - qoh`, truncated, never negative.
 */
export function calculateSuggestedOrder(
  qoh: number,
  monthlyAverage: number,
  targetMonths: number = TARGET_MONTHS
): number {
  if (monthlyAverage <= 0) return 0;

  const needed = targetMonths * monthlyAverage - qoh;
  return Math.max(0, Math.trunc(needed));
}
