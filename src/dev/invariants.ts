/**
 * Dev-only shared invariant helpers for engine tests.
 * Deterministic predicates and tolerances, no side effects.
 */

import { RATE_FLOOR_PCT } from "@/config/forecastDefaults";
import type { ForecastRow } from "@/domain/forecast/forecast.types";

export const FLOAT_TOLERANCE = 1e-9;

export function approxEqual(a: number, b: number, tolerance = FLOAT_TOLERANCE): boolean {
  return Math.abs(a - b) <= tolerance;
}

export function allNonNegative(arr: number[]): boolean {
  return arr.every((v) => Number.isFinite(v) && v >= 0);
}

/** True when x carries no digits beyond dp decimals. */
export function hasAtMostDecimals(x: number, dp: number): boolean {
  return Number.isFinite(x) && Math.abs(Math.round(x * 10 ** dp) / 10 ** dp - x) <= FLOAT_TOLERANCE;
}

/** Shape checks every emitted forecast row must satisfy. */
export function forecastRowViolations(row: ForecastRow): string[] {
  const violations: string[] = [];
  if (!(row.totalPolicies > 0)) violations.push(`${row.year}: totalPolicies must be positive`);
  if (!allNonNegative([row.averagePremium, row.averagePremiumPerUnit, row.averageMortalityRate])) {
    violations.push(`${row.year}: premiums and mortality must be non-negative`);
  }
  if (!hasAtMostDecimals(row.averagePremium, 2)) violations.push(`${row.year}: averagePremium not rounded to 2 dp`);
  if (!hasAtMostDecimals(row.averageLifeExpectancy, 1)) {
    violations.push(`${row.year}: averageLifeExpectancy not rounded to 1 dp`);
  }
  if (!hasAtMostDecimals(row.averageMortalityRate, 4)) {
    violations.push(`${row.year}: averageMortalityRate not rounded to 4 dp`);
  }
  if (row.inflationRate < RATE_FLOOR_PCT || row.interestRate < RATE_FLOOR_PCT) {
    violations.push(`${row.year}: rate below ${RATE_FLOOR_PCT}% floor`);
  }
  return violations;
}
