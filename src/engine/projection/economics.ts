/**
 * Economic projection: inflation and interest converge from the latest observed
 * values toward scenario targets; GDP growth tracks the scenario inflation target.
 * Noise comes from an explicit seeded generator so identical inputs give identical output.
 */

import { DEBUG_PROJECTION } from "@/config/debug";
import {
  CONVERGENCE_HORIZON_YEARS,
  DEFAULT_NOISE_SEED,
  FALLBACK_ECONOMICS,
  GDP_TO_INFLATION_RATIO,
  NOISE_SIGMA,
  RATE_FLOOR_PCT,
} from "@/config/forecastDefaults";
import type { EconomicRecord } from "@/domain/premium/premium.schema";
import type { ColumnOf, Table } from "@/domain/table/table";
import { scopedLogger } from "@/lib/debug";
import { createSeededRandom, type RandomSource } from "@/lib/random";
import { requireTable, round, validateYearRange, yearsBetween } from "@/engine/validate";
import type { ProjectionArgs } from "./mortality";

const log = scopedLogger("projection/economics");

export const ECONOMIC_REQUIRED_COLUMNS: ReadonlyArray<ColumnOf<EconomicRecord>> = [
  "year",
  "country",
  "inflationRate",
  "interestRate",
  "gdpGrowth",
];

export type EconomicBaseline = {
  year: number;
  inflationRate: number;
  interestRate: number;
  gdpGrowth: number;
  /** "fallback" when the country has no rows and FALLBACK_ECONOMICS was used. */
  source: "country" | "fallback";
};

/**
 * Latest record for the country. When the country has no rows at all, uses
 * FALLBACK_ECONOMICS anchored at the table's latest year and logs a warning.
 * Throws EmptyDataset for an empty table.
 */
export function resolveEconomicBaseline(table: Table<EconomicRecord>, country: string): EconomicBaseline {
  requireTable("economic", table, ECONOMIC_REQUIRED_COLUMNS);

  let latest: EconomicRecord | undefined;
  for (const row of table.rows) {
    if (row.country !== country) continue;
    if (!latest || row.year > latest.year) latest = row;
  }

  if (latest) {
    return {
      year: latest.year,
      inflationRate: latest.inflationRate,
      interestRate: latest.interestRate,
      gdpGrowth: latest.gdpGrowth,
      source: "country",
    };
  }

  const tableLatestYear = table.rows.reduce((max, r) => (r.year > max ? r.year : max), -Infinity);
  log.warn(
    `No economic rows for "${country}"; using fallback inflation ${FALLBACK_ECONOMICS.inflationRate}%, ` +
      `interest ${FALLBACK_ECONOMICS.interestRate}%, gdp ${FALLBACK_ECONOMICS.gdpGrowth}% as of ${tableLatestYear}`
  );
  return { year: tableLatestYear, ...FALLBACK_ECONOMICS, source: "fallback" };
}

/** Fraction of the way from current conditions to scenario targets: 1 − e^(−yearsAhead/5). */
export function convergenceFactor(yearsAhead: number): number {
  return 1 - Math.exp(-yearsAhead / CONVERGENCE_HORIZON_YEARS);
}

/**
 * Projects inflation, interest and GDP growth for each year in [startYear, endYear].
 * A fresh generator seeded with DEFAULT_NOISE_SEED is used unless `random` is given;
 * each year draws inflation, interest, then GDP noise in that order.
 * GDP growth ignores the convergence path (inflation target × 0.8 + noise).
 */
export function projectEconomics(
  table: Table<EconomicRecord>,
  args: ProjectionArgs,
  random: RandomSource = createSeededRandom(DEFAULT_NOISE_SEED)
): EconomicRecord[] {
  validateYearRange(args.startYear, args.endYear);
  const baseline = resolveEconomicBaseline(table, args.country);
  const { scenario } = args;

  if (DEBUG_PROJECTION) {
    log.log(`baseline ${args.country} ${baseline.year} (${baseline.source})`, baseline);
  }

  return yearsBetween(args.startYear, args.endYear).map((year) => {
    const yearsAhead = year - baseline.year;
    const c = convergenceFactor(yearsAhead);

    const inflationNoise = random.normal(0, NOISE_SIGMA.inflation) * (1 - c);
    const interestNoise = random.normal(0, NOISE_SIGMA.interest) * (1 - c);
    const gdpNoise = random.normal(0, NOISE_SIGMA.gdp);

    const inflation = baseline.inflationRate * (1 - c) + scenario.inflationBase * c + inflationNoise;
    const interest = baseline.interestRate * (1 - c) + scenario.interestBase * c + interestNoise;
    const gdp = scenario.inflationBase * GDP_TO_INFLATION_RATIO + gdpNoise;

    return {
      year,
      country: args.country,
      inflationRate: round(Math.max(RATE_FLOOR_PCT, inflation), 2),
      interestRate: round(Math.max(RATE_FLOOR_PCT, interest), 2),
      gdpGrowth: round(gdp, 2),
    };
  });
}
