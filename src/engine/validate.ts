/**
 * Input guards for the forecast engine: required columns, non-empty tables,
 * year-range bounds, filter shape, and numeric clamping helpers.
 */

import { MAX_FORECAST_YEARS, YEAR_BOUNDS } from "@/config/forecastDefaults";
import { ForecastFiltersSchema, type ForecastFilters } from "@/domain/premium/premium.schema";
import type { ColumnOf, Table } from "@/domain/table/table";
import { ForecastError } from "./errors";

/** Returns defaultVal if x is not a finite number. */
export function safeNum(x: unknown, defaultVal: number): number {
  if (typeof x !== "number" || !Number.isFinite(x)) return defaultVal;
  return x;
}

/** Clamps value to non-negative finite number. */
export function clampNonNegative(x: number, defaultVal = 0): number {
  const n = safeNum(x, defaultVal);
  return n < 0 ? 0 : n;
}

/** Half-away-from-zero rounding to dp decimals; -0 normalised to 0. */
export function round(x: number, dp: number): number {
  const f = 10 ** dp;
  const r = (Math.sign(x) * Math.round(Math.abs(x) * f)) / f;
  return r === 0 ? 0 : r;
}

/**
 * Throws MissingColumns if any required column is absent,
 * EmptyDataset if the table has no rows.
 */
export function requireTable<R>(name: string, table: Table<R>, required: ReadonlyArray<ColumnOf<R>>): void {
  const missing = required.filter((c) => !table.columns.includes(c));
  if (missing.length > 0) {
    throw new ForecastError("MissingColumns", `Table "${name}" is missing required columns: ${missing.join(", ")}`, {
      table: name,
      columns: missing,
    });
  }
  if (table.rows.length === 0) {
    throw new ForecastError("EmptyDataset", `Table "${name}" has no rows`, { table: name });
  }
}

/**
 * Rows of a table for one country. Throws NoDataForCountry when the table has rows but none match.
 */
export function rowsForCountry<R extends { country: string }>(name: string, table: Table<R>, country: string): R[] {
  const rows = table.rows.filter((r) => r.country === country);
  if (rows.length === 0) {
    const available = [...new Set(table.rows.map((r) => r.country))].sort();
    throw new ForecastError(
      "NoDataForCountry",
      `Table "${name}" has no rows for country "${country}". Available countries: ${available.join(", ")}`,
      { table: name, country }
    );
  }
  return rows;
}

/** Integer years within YEAR_BOUNDS, start ≤ end, span within MAX_FORECAST_YEARS. */
export function validateYearRange(startYear: number, endYear: number): void {
  const context = { startYear, endYear };
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear)) {
    throw new ForecastError("InvalidYearRange", "startYear and endYear must be integers", context);
  }
  for (const year of [startYear, endYear]) {
    if (year < YEAR_BOUNDS.min || year > YEAR_BOUNDS.max) {
      throw new ForecastError(
        "InvalidYearRange",
        `Year ${year} is outside ${YEAR_BOUNDS.min}–${YEAR_BOUNDS.max}`,
        context
      );
    }
  }
  if (startYear > endYear) {
    throw new ForecastError("InvalidYearRange", `startYear ${startYear} is after endYear ${endYear}`, context);
  }
  const span = endYear - startYear + 1;
  if (span > MAX_FORECAST_YEARS) {
    throw new ForecastError(
      "InvalidYearRange",
      `Forecast span of ${span} years exceeds the maximum of ${MAX_FORECAST_YEARS}`,
      context
    );
  }
}

/** Parses caller filters; unknown keys and wrong types are rejected. */
export function parseFilters(filters: unknown): ForecastFilters {
  if (filters == null) return {};
  const parsed = ForecastFiltersSchema.safeParse(filters);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "filters"}: ${i.message}`).join("; ");
    throw new ForecastError("InvalidInput", `Invalid filters: ${detail}`, { filters });
  }
  return parsed.data;
}

export function yearsBetween(startYear: number, endYear: number): number[] {
  return Array.from({ length: endYear - startYear + 1 }, (_, i) => startYear + i);
}
