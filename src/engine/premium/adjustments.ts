/**
 * Premium adjustment factors (pure). Each returns either a multiplier or an
 * additive adjustment `adj` that the calculator applies as `× (1 + adj)`.
 */

import { PREMIUM_SENSITIVITY } from "@/config/forecastDefaults";
import type { EconomicRecord, PolicyType } from "@/domain/premium/premium.schema";

/**
 * Compounded Π(1 + inflation/100) over history rows with baseYear ≤ y ≤ year.
 * Exactly 1 for year ≤ baseYear: no backward adjustment.
 */
export function cumulativeInflationFactor(
  year: number,
  baseYear: number,
  history: ReadonlyArray<EconomicRecord>
): number {
  if (year <= baseYear) return 1;
  return history
    .filter((r) => r.year >= baseYear && r.year <= year)
    .sort((a, b) => a.year - b.year)
    .reduce((factor, r) => factor * (1 + r.inflationRate / 100), 1);
}

/** 1 + (projected/base − 1) × 0.3; 1 when base is not a positive number. */
export function mortalityMultiplier(projectedRate: number, baseRate: number): number {
  if (!(baseRate > 0)) return 1;
  const mortalityFactor = projectedRate / baseRate;
  return 1 + (mortalityFactor - 1) * PREMIUM_SENSITIVITY.mortalityPassThrough;
}

/**
 * Term Life: longer life lowers annual risk (−0.005 per year).
 * Whole Life: longer life extends exposure (+0.003 per year).
 */
export function longevityAdjustment(policyType: PolicyType, lifeExpectancyChange: number): number {
  switch (policyType) {
    case "Term Life":
      return PREMIUM_SENSITIVITY.termLifeLongevity * lifeExpectancyChange;
    case "Whole Life":
      return PREMIUM_SENSITIVITY.wholeLifeLongevity * lifeExpectancyChange;
  }
}

/** −0.12 × Δinterest/100: higher rates discount future claims. */
export function interestAdjustment(projectedRate: number, baseRate: number): number {
  return PREMIUM_SENSITIVITY.interest * ((projectedRate - baseRate) / 100);
}

/** −0.05 × Δgdp/100. */
export function gdpAdjustment(projectedGrowth: number, baseGrowth: number): number {
  return PREMIUM_SENSITIVITY.gdp * ((projectedGrowth - baseGrowth) / 100);
}
