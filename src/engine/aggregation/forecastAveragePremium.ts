/**
 * Population-weighted premium forecast for one scenario.
 */

import { DEBUG_FORECAST } from "@/config/debug";
import { COVERAGE_UNIT, DEFAULT_COVERAGE_UNITS, DEFAULT_NOISE_SEED } from "@/config/forecastDefaults";
import {
  FORECAST_COLUMNS,
  type ForecastRow,
  type ForecastTable,
  type ForecastTables,
  type PremiumRecord,
} from "@/domain/forecast/forecast.types";
import type { DemographicRecord, EconomicRecord, ForecastFilters } from "@/domain/premium/premium.schema";
import { hasColumn, withRows, type ColumnOf } from "@/domain/table/table";
import { ForecastError, withContext } from "@/engine/errors";
import { calculatePremiums, premiumColumns } from "@/engine/premium/calculatePremiums";
import { projectEconomics } from "@/engine/projection/economics";
import { projectMortality } from "@/engine/projection/mortality";
import { getScenario } from "@/engine/scenario/scenarios";
import { parseFilters, requireTable, round, rowsForCountry, validateYearRange, yearsBetween } from "@/engine/validate";
import { scopedLogger } from "@/lib/debug";
import { createSeededRandom } from "@/lib/random";
import { applyFilters } from "./filters";
import { actualPremium, innerJoinCells, resolveJoinKeys, type JoinedCell } from "./join";

const log = scopedLogger("forecast");

export const DEMOGRAPHIC_REQUIRED_COLUMNS: ReadonlyArray<ColumnOf<DemographicRecord>> = [
  "country",
  "gender",
  "age",
  "policyType",
  "policyCount",
];

export type ForecastArgs = {
  startYear: number;
  endYear: number;
  scenario: string;
  country: string;
  filters?: ForecastFilters | null;
};

export type ForecastOptions = {
  /** Seed for economic noise; defaults to DEFAULT_NOISE_SEED. */
  seed?: number;
};

export type PricedCell = JoinedCell<PremiumRecord, DemographicRecord>;

/**
 * Aggregates one year's joined cells into a ForecastRow, or null when no policies remain.
 * Premiums are policy-count weighted; life expectancy and mortality are plain means over cells.
 */
export function aggregateJoinedCells(
  cells: ReadonlyArray<PricedCell>,
  context: { year: number; scenario: string; economic: EconomicRecord; includeSumInsured: boolean }
): ForecastRow | null {
  if (cells.length === 0) return null;

  let totalPolicies = 0;
  let weightedPremium = 0;
  let weightedPerUnit = 0;
  let weightedSumInsured = 0;
  let lifeExpectancySum = 0;
  let mortalitySum = 0;

  for (const { left: premium, right: demographic } of cells) {
    const count = demographic.policyCount;
    totalPolicies += count;
    weightedPremium += actualPremium(premium.premiumPerUnit, demographic.sumInsured) * count;
    weightedPerUnit += premium.premiumPerUnit * count;
    weightedSumInsured += (demographic.sumInsured ?? DEFAULT_COVERAGE_UNITS * COVERAGE_UNIT) * count;
    lifeExpectancySum += premium.lifeExpectancy;
    mortalitySum += premium.mortalityRate;
  }

  if (!(totalPolicies > 0)) return null;

  const row: ForecastRow = {
    year: context.year,
    scenario: context.scenario,
    averagePremium: round(weightedPremium / totalPolicies, 2),
    averagePremiumPerUnit: round(weightedPerUnit / totalPolicies, 2),
    totalPolicies,
    inflationRate: context.economic.inflationRate,
    interestRate: context.economic.interestRate,
    gdpGrowth: context.economic.gdpGrowth,
    averageLifeExpectancy: round(lifeExpectancySum / cells.length, 1),
    averageMortalityRate: round(mortalitySum / cells.length, 4),
  };
  if (context.includeSumInsured) row.averageSumInsured = round(weightedSumInsured / totalPolicies, 0);
  return row;
}

function groupByYear(premiums: ReadonlyArray<PremiumRecord>): Map<number, PremiumRecord[]> {
  const byYear = new Map<number, PremiumRecord[]>();
  for (const p of premiums) {
    const bucket = byYear.get(p.year);
    if (bucket) bucket.push(p);
    else byYear.set(p.year, [p]);
  }
  return byYear;
}

/**
 * Forecasts the policy-weighted average premium per year for a scenario.
 * Years whose filtered, joined population has zero policies are omitted.
 * Any projection or premium failure aborts the whole call (ForecastError with context).
 */
export function forecastAveragePremium(
  tables: ForecastTables,
  args: ForecastArgs,
  options: ForecastOptions = {}
): ForecastTable {
  const { startYear, endYear, country } = args;
  const context = { startYear, endYear, country, scenario: args.scenario, filters: args.filters ?? undefined };

  try {
    validateYearRange(startYear, endYear);
    const scenario = getScenario(args.scenario);
    const filters = parseFilters(args.filters);
    const projectionArgs = { startYear, endYear, scenario, country };

    const mortalityProjection = projectMortality(tables.mortality, projectionArgs);
    const economicProjection = projectEconomics(
      tables.economic,
      projectionArgs,
      createSeededRandom(options.seed ?? DEFAULT_NOISE_SEED)
    );

    const years = yearsBetween(startYear, endYear);
    const allPremiums = years.flatMap((year) =>
      calculatePremiums(tables, {
        year,
        mortalityProjection,
        economicProjection,
        economicHistory: economicProjection,
        country,
      })
    );

    requireTable("demographics", tables.demographics, DEMOGRAPHIC_REQUIRED_COLUMNS);
    const demographics = applyFilters(
      withRows(tables.demographics, rowsForCountry("demographics", tables.demographics, country)),
      filters
    );
    const premiums = applyFilters({ columns: premiumColumns(tables.basePremiums), rows: allPremiums }, filters);

    const keys = resolveJoinKeys(premiums, demographics);
    const includeSumInsured = hasColumn(demographics, "sumInsured");
    const premiumsByYear = groupByYear(premiums.rows);
    const economicByYear = new Map(economicProjection.map((e) => [e.year, e]));

    const rows: ForecastRow[] = [];
    for (const year of years) {
      const economic = economicByYear.get(year);
      if (!economic) {
        throw new ForecastError("MissingEconomicData", `No economic projection for ${year}`, { year });
      }

      let cells = innerJoinCells(premiumsByYear.get(year) ?? [], demographics.rows, keys);
      if (filters.sumInsured != null && includeSumInsured) {
        cells = cells.filter((c) => c.right.sumInsured === filters.sumInsured);
      }

      const row = aggregateJoinedCells(cells, { year, scenario: scenario.name, economic, includeSumInsured });
      if (DEBUG_FORECAST) log.log(`${scenario.name} ${year}: ${cells.length} joined cells`);
      if (!row) {
        log.warn(`${scenario.name} ${year}: no policies after filtering/join; year omitted`);
        continue;
      }
      rows.push(row);
    }

    const columns: ColumnOf<ForecastRow>[] = includeSumInsured
      ? [...FORECAST_COLUMNS, "averageSumInsured"]
      : [...FORECAST_COLUMNS];
    return { columns, rows };
  } catch (err) {
    if (err instanceof ForecastError) throw withContext(err, context);
    throw err;
  }
}
