/**
 * Builds the four engine tables from CSV/XLSX sources.
 * Headers are matched in camelCase (snake_case files work unchanged); a column is
 * present in the resulting table only if its header is.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import type { ForecastTables } from "@/domain/forecast/forecast.types";
import {
  BasePremiumRecordSchema,
  DemographicRecordSchema,
  EconomicRecordSchema,
  MortalityRecordSchema,
  type BasePremiumRecord,
  type DemographicRecord,
  type EconomicRecord,
  type MortalityRecord,
} from "@/domain/premium/premium.schema";
import type { ColumnOf, Table } from "@/domain/table/table";
import { ForecastError } from "@/engine/errors";
import { compositeKey } from "@/engine/keys";
import { scopedLogger } from "./debug";
import { parseSheet, type ParsedSheet } from "./tableImport";

const log = scopedLogger("data/load");

export type TableName = keyof ForecastTables;

export const TABLE_FILE_NAMES: Readonly<Record<TableName, string>> = {
  mortality: "mortality_data.csv",
  economic: "economic_data.csv",
  basePremiums: "base_premiums.csv",
  demographics: "demographic_distribution.csv",
};

/** Older rate tables carry a flat premium for the default 10 units of cover instead of a per-unit rate. */
const LEGACY_BASE_PREMIUM_HEADER = "basePremium";
const LEGACY_COVERAGE_UNITS = 10;

type TableSpec<R> = {
  schema: z.ZodType<R, z.ZodTypeDef, unknown>;
  columns: ReadonlyArray<ColumnOf<R>>;
  keyOf: (row: R) => string;
};

const MORTALITY_SPEC: TableSpec<MortalityRecord> = {
  schema: MortalityRecordSchema,
  columns: ["year", "country", "gender", "age", "smokingStatus", "mortalityRate", "lifeExpectancy"],
  keyOf: (r) => compositeKey([r.year, r.country, r.gender, r.age, r.smokingStatus]),
};

const ECONOMIC_SPEC: TableSpec<EconomicRecord> = {
  schema: EconomicRecordSchema,
  columns: ["year", "country", "inflationRate", "interestRate", "gdpGrowth"],
  keyOf: (r) => compositeKey([r.year, r.country]),
};

const BASE_PREMIUM_SPEC: TableSpec<BasePremiumRecord> = {
  schema: BasePremiumRecordSchema,
  columns: ["country", "group", "gender", "age", "policyType", "smokingStatus", "premiumPerUnit"],
  keyOf: (r) => compositeKey([r.country, r.group, r.gender, r.age, r.policyType, r.smokingStatus]),
};

const DEMOGRAPHIC_SPEC: TableSpec<DemographicRecord> = {
  schema: DemographicRecordSchema,
  columns: ["country", "group", "gender", "age", "policyType", "smokingStatus", "sumInsured", "policyCount"],
  keyOf: (r) => compositeKey([r.country, r.group, r.gender, r.age, r.policyType, r.smokingStatus, r.sumInsured]),
};

/**
 * Validates every row against the table schema. Row numbers in errors are 1-based
 * file lines (the header is line 1); blank lines still count.
 */
function toTable<R>(name: TableName, sheet: ParsedSheet, spec: TableSpec<R>): Table<R> {
  const columns = spec.columns.filter((c) => sheet.headers.includes(c));
  const seen = new Map<string, number>();
  const rows: R[] = [];

  sheet.rows.forEach((raw, i) => {
    const line = sheet.lines[i] ?? i + 2;
    const parsed = spec.schema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new ForecastError("InvalidInput", `Table "${name}" line ${line}: ${detail}`, { table: name });
    }
    const key = spec.keyOf(parsed.data);
    const firstLine = seen.get(key);
    if (firstLine !== undefined) {
      throw new ForecastError("InvalidInput", `Table "${name}" line ${line} duplicates line ${firstLine}`, {
        table: name,
      });
    }
    seen.set(key, line);
    rows.push(parsed.data);
  });

  return { columns, rows };
}

/** Maps a legacy flat basePremium column onto premiumPerUnit when no per-unit column exists. */
function withPremiumPerUnit(sheet: ParsedSheet): ParsedSheet {
  if (sheet.headers.includes("premiumPerUnit") || !sheet.headers.includes(LEGACY_BASE_PREMIUM_HEADER)) {
    return sheet;
  }
  log.warn(`basePremiums has no premium_per_unit column; deriving it from base_premium / ${LEGACY_COVERAGE_UNITS}`);
  return {
    ...sheet,
    headers: [...sheet.headers, "premiumPerUnit"],
    rows: sheet.rows.map((row) => {
      const flat = Number(row[LEGACY_BASE_PREMIUM_HEADER]);
      return { ...row, premiumPerUnit: Number.isFinite(flat) ? flat / LEGACY_COVERAGE_UNITS : undefined };
    }),
  };
}

export type ForecastTableSources = Record<TableName, string | Uint8Array>;

/** Parses and validates all four tables from in-memory CSV text or xlsx/csv bytes. */
export function parseForecastTables(sources: ForecastTableSources): ForecastTables {
  return {
    mortality: toTable("mortality", parseSheet(sources.mortality), MORTALITY_SPEC),
    economic: toTable("economic", parseSheet(sources.economic), ECONOMIC_SPEC),
    basePremiums: toTable("basePremiums", withPremiumPerUnit(parseSheet(sources.basePremiums)), BASE_PREMIUM_SPEC),
    demographics: toTable("demographics", parseSheet(sources.demographics), DEMOGRAPHIC_SPEC),
  };
}

/**
 * Reads mortality_data.csv, economic_data.csv, base_premiums.csv and
 * demographic_distribution.csv from a directory.
 */
export async function loadForecastTables(dir: string): Promise<ForecastTables> {
  const read = (name: TableName) => readFile(path.join(dir, TABLE_FILE_NAMES[name]), "utf8");
  const [mortality, economic, basePremiums, demographics] = await Promise.all([
    read("mortality"),
    read("economic"),
    read("basePremiums"),
    read("demographics"),
  ]);
  const tables = parseForecastTables({ mortality, economic, basePremiums, demographics });
  log.log(
    `loaded ${tables.mortality.rows.length} mortality, ${tables.economic.rows.length} economic, ` +
      `${tables.basePremiums.rows.length} base premium, ${tables.demographics.rows.length} demographic rows from ${dir}`
  );
  return tables;
}
