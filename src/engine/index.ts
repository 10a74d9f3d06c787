/**
 * Premium forecast engine: pure deterministic functions over four read-only tables.
 * Scenario registry → mortality/economic projection → premium calculation → weighted aggregation.
 */

import type { FilteredDataRow, ForecastTable, ForecastTables, PremiumRecord } from "@/domain/forecast/forecast.types";
import type { EconomicRecord, MortalityRecord } from "@/domain/premium/premium.schema";
import type { Table } from "@/domain/table/table";
import { compareScenarios, type CompareArgs, type CompareOptions, type ScenarioComparison } from "./aggregation/compareScenarios";
import { buildFilteredDataTable, type FilteredDataArgs } from "./aggregation/filteredDataTable";
import { forecastAveragePremium, type ForecastArgs, type ForecastOptions } from "./aggregation/forecastAveragePremium";
import { calculatePremiums, type CalculatePremiumsArgs } from "./premium/calculatePremiums";
import { projectEconomics } from "./projection/economics";
import { projectMortality } from "./projection/mortality";
import { getScenario } from "./scenario/scenarios";
import { DEFAULT_NOISE_SEED } from "@/config/forecastDefaults";
import { createSeededRandom, type RandomSource } from "@/lib/random";

export type { ForecastArgs, ForecastOptions, PricedCell } from "./aggregation/forecastAveragePremium";
export type { CompareArgs, CompareOptions, ForecastFn, ScenarioComparison, ScenarioFailure } from "./aggregation/compareScenarios";
export type { FilteredDataArgs } from "./aggregation/filteredDataTable";
export type { CalculatePremiumsArgs } from "./premium/calculatePremiums";
export type { ProjectionArgs, MortalityBaseline } from "./projection/mortality";
export type { EconomicBaseline } from "./projection/economics";
export type { Scenario, ScenarioName } from "./scenario/scenarios";
export type { ForecastErrorCode, ForecastErrorContext } from "./errors";

export { ForecastError, describeForecastError, isForecastError } from "./errors";
export { getScenario, listScenarios, isScenarioName } from "./scenario/scenarios";
export { projectMortality, resolveMortalityBaseline } from "./projection/mortality";
export { projectEconomics, resolveEconomicBaseline, convergenceFactor } from "./projection/economics";
export { calculatePremiums, premiumColumns } from "./premium/calculatePremiums";
export {
  cumulativeInflationFactor,
  mortalityMultiplier,
  longevityAdjustment,
  interestAdjustment,
  gdpAdjustment,
} from "./premium/adjustments";
export { applyFilters } from "./aggregation/filters";
export { actualPremium, innerJoinCells, resolveJoinKeys } from "./aggregation/join";
export { forecastAveragePremium, aggregateJoinedCells } from "./aggregation/forecastAveragePremium";
export { compareScenarios } from "./aggregation/compareScenarios";
export { summarizeForecast, summarizeByScenario } from "./aggregation/summarizeForecast";
export { buildFilteredDataTable } from "./aggregation/filteredDataTable";

type YearRange = { startYear: number; endYear: number };

export type PremiumForecaster = {
  readonly tables: ForecastTables;
  projectMortality: (args: YearRange & { scenario: string; country: string }) => Table<MortalityRecord>;
  projectEconomics: (
    args: YearRange & { scenario: string; country: string },
    random?: RandomSource
  ) => EconomicRecord[];
  calculatePremiums: (args: CalculatePremiumsArgs) => PremiumRecord[];
  forecast: (args: ForecastArgs) => ForecastTable;
  compareScenarios: (args: CompareArgs) => ScenarioComparison;
  filteredDataTable: (args: FilteredDataArgs) => Table<FilteredDataRow>;
};

/**
 * Binds the four input tables once. Scenario names are resolved per call
 * (UnknownScenario for anything outside the registry).
 */
export function createPremiumForecaster(
  tables: ForecastTables,
  options: ForecastOptions & Pick<CompareOptions, "forecast"> = {}
): PremiumForecaster {
  const { forecast: forecastFn, ...forecastOptions } = options;
  return {
    tables,
    projectMortality: ({ scenario, ...rest }) =>
      projectMortality(tables.mortality, { ...rest, scenario: getScenario(scenario) }),
    projectEconomics: ({ scenario, ...rest }, random) =>
      projectEconomics(
        tables.economic,
        { ...rest, scenario: getScenario(scenario) },
        random ?? createSeededRandom(forecastOptions.seed ?? DEFAULT_NOISE_SEED)
      ),
    calculatePremiums: (args) => calculatePremiums(tables, args),
    forecast: (args) => (forecastFn ?? forecastAveragePremium)(tables, args, forecastOptions),
    compareScenarios: (args) => compareScenarios(tables, args, { ...forecastOptions, forecast: forecastFn }),
    filteredDataTable: (args) => buildFilteredDataTable(tables, args),
  };
}
