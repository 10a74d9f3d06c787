/**
 * Runs the forecast for every registered scenario and stacks the results.
 * A failing scenario is logged and skipped; the others still return.
 */

import { FORECAST_COLUMNS, type ForecastRow, type ForecastTable, type ForecastTables } from "@/domain/forecast/forecast.types";
import type { ColumnOf } from "@/domain/table/table";
import { describeForecastError } from "@/engine/errors";
import { listScenarios, type ScenarioName } from "@/engine/scenario/scenarios";
import { scopedLogger } from "@/lib/debug";
import { forecastAveragePremium, type ForecastArgs, type ForecastOptions } from "./forecastAveragePremium";

const log = scopedLogger("forecast/compare");

export type CompareArgs = Omit<ForecastArgs, "scenario">;

export type ForecastFn = (tables: ForecastTables, args: ForecastArgs, options?: ForecastOptions) => ForecastTable;

export type CompareOptions = ForecastOptions & {
  /** Per-scenario forecast; defaults to forecastAveragePremium. */
  forecast?: ForecastFn;
};

export type ScenarioFailure = {
  scenario: ScenarioName;
  message: string;
  error: unknown;
};

export type ScenarioComparison = ForecastTable & {
  failures: ScenarioFailure[];
};

/**
 * Concatenates per-scenario rows in registry order (base, optimistic, pessimistic).
 * Each scenario seeds its own generator, so results do not depend on run order.
 * When every scenario fails or yields nothing, returns no rows with the full forecast columns.
 */
export function compareScenarios(
  tables: ForecastTables,
  args: CompareArgs,
  options: CompareOptions = {}
): ScenarioComparison {
  const { forecast = forecastAveragePremium, ...forecastOptions } = options;

  const rows: ForecastRow[] = [];
  const failures: ScenarioFailure[] = [];
  let columns: ReadonlyArray<ColumnOf<ForecastRow>> = FORECAST_COLUMNS;

  for (const scenario of listScenarios()) {
    try {
      const result = forecast(tables, { ...args, scenario }, forecastOptions);
      if (result.rows.length === 0) continue;
      rows.push(...result.rows);
      if (result.columns.length > columns.length) columns = result.columns;
    } catch (err) {
      const message = describeForecastError(err);
      log.warn(`Failed to forecast scenario "${scenario}": ${message}`);
      failures.push({ scenario, message, error: err });
    }
  }

  return { columns: [...columns], rows, failures };
}
