/**
 * Central constants for the premium forecast engine (tunable, read-only at runtime).
 */

/** Seed for economic noise; every projection call starts a fresh generator from it. */
export const DEFAULT_NOISE_SEED = 42;

/** Std-dev (percentage points) of the noise added to each projected indicator. */
export const NOISE_SIGMA = {
  inflation: 0.3,
  interest: 0.3,
  gdp: 0.5,
} as const;

/** Years over which projected rates close ~63% of the gap to scenario targets. */
export const CONVERGENCE_HORIZON_YEARS = 5;

/** Floor for projected inflation and interest (percent). */
export const RATE_FLOOR_PCT = 0.5;

/** GDP growth is modelled as a fixed share of the scenario inflation target. */
export const GDP_TO_INFLATION_RATIO = 0.8;

/** Used when the economic table has no rows for the requested country. */
export const FALLBACK_ECONOMICS = {
  inflationRate: 5.0,
  interestRate: 6.5,
  gdpGrowth: 6.5,
} as const;

/** Pricing sensitivities applied by the premium calculator. */
export const PREMIUM_SENSITIVITY = {
  /** Share of the raw mortality ratio change passed through to price. */
  mortalityPassThrough: 0.3,
  /** Per year of added life expectancy. */
  termLifeLongevity: -0.005,
  wholeLifeLongevity: 0.003,
  /** Applied as coefficient × (Δ percentage points vs base year) / 100. */
  interest: -0.12,
  gdp: -0.05,
} as const;

/** premiumPerUnit is quoted per this much sum insured. */
export const COVERAGE_UNIT = 100_000;

/** Multiplier used when the demographic table carries no sum insured (10 units = 1,000,000). */
export const DEFAULT_COVERAGE_UNITS = 10;

/** Upper bound on forecast span, in years. */
export const MAX_FORECAST_YEARS = 100;

/** Calendar years accepted in input tables and forecast ranges. */
export const YEAR_BOUNDS = {
  min: 1900,
  max: 2300,
} as const;
