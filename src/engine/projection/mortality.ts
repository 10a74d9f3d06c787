/**
 * Mortality projection (pure, deterministic).
 * Extrapolates each (gender, age[, smokingStatus]) cell from the country's latest historical year.
 */

import type { MortalityRecord } from "@/domain/premium/premium.schema";
import { hasColumn, type ColumnOf, type Table } from "@/domain/table/table";
import type { Scenario } from "@/engine/scenario/scenarios";
import { compositeKey, indexFirstBy } from "@/engine/keys";
import { clampNonNegative, requireTable, round, rowsForCountry, validateYearRange, yearsBetween } from "@/engine/validate";

export const MORTALITY_REQUIRED_COLUMNS: ReadonlyArray<ColumnOf<MortalityRecord>> = [
  "year",
  "country",
  "gender",
  "age",
  "mortalityRate",
  "lifeExpectancy",
];

export type ProjectionArgs = {
  startYear: number;
  endYear: number;
  scenario: Scenario;
  country: string;
};

export type MortalityBaseline = {
  year: number;
  rows: MortalityRecord[];
  hasSmokingStatus: boolean;
};

/**
 * Latest historical year for the country and its cells.
 * Throws EmptyDataset for an empty table, NoDataForCountry when the country is absent.
 */
export function resolveMortalityBaseline(table: Table<MortalityRecord>, country: string): MortalityBaseline {
  requireTable("mortality", table, MORTALITY_REQUIRED_COLUMNS);
  const countryRows = rowsForCountry("mortality", table, country);
  const latestYear = countryRows.reduce((max, r) => (r.year > max ? r.year : max), -Infinity);
  return {
    year: latestYear,
    rows: countryRows.filter((r) => r.year === latestYear),
    hasSmokingStatus: hasColumn(table, "smokingStatus"),
  };
}

/** Key used to match a cell across mortality tables; smokingStatus only when both sides carry it. */
export function mortalityCellKey(
  cell: { gender: string; age: number; smokingStatus?: string },
  includeSmoking: boolean
): string {
  return compositeKey([cell.gender, cell.age, includeSmoking ? cell.smokingStatus : undefined]);
}

/** First baseline cell per key. */
export function indexMortalityBaseline(baseline: MortalityBaseline, includeSmoking: boolean): Map<string, MortalityRecord> {
  return indexFirstBy(baseline.rows, (r) => mortalityCellKey(r, includeSmoking && baseline.hasSmokingStatus));
}

/**
 * Projects every baseline cell to each year in [startYear, endYear].
 * mortalityRate(y) = base × ((100 − pct)/100)^(y − latest); lifeExpectancy(y) = base + (y − latest) × pct/100.
 * Years before the latest historical year extrapolate backwards with the same formulas.
 */
export function projectMortality(table: Table<MortalityRecord>, args: ProjectionArgs): Table<MortalityRecord> {
  validateYearRange(args.startYear, args.endYear);
  const baseline = resolveMortalityBaseline(table, args.country);
  const pct = args.scenario.mortalityImprovementPct;

  const rows: MortalityRecord[] = [];
  for (const year of yearsBetween(args.startYear, args.endYear)) {
    const yearsAhead = year - baseline.year;
    const improvementFactor = ((100 - pct) / 100) ** yearsAhead;
    const lifeExpectancyIncrease = yearsAhead * (pct / 100);

    for (const cell of baseline.rows) {
      const projected: MortalityRecord = {
        year,
        country: args.country,
        gender: cell.gender,
        age: cell.age,
        mortalityRate: clampNonNegative(round(cell.mortalityRate * improvementFactor, 4)),
        lifeExpectancy: clampNonNegative(round(cell.lifeExpectancy + lifeExpectancyIncrease, 2)),
      };
      if (baseline.hasSmokingStatus && cell.smokingStatus !== undefined) {
        projected.smokingStatus = cell.smokingStatus;
      }
      rows.push(projected);
    }
  }

  const columns: ColumnOf<MortalityRecord>[] = baseline.hasSmokingStatus
    ? [...MORTALITY_REQUIRED_COLUMNS, "smokingStatus"]
    : [...MORTALITY_REQUIRED_COLUMNS];
  return { columns, rows };
}
