/**
 * Per-cell detail table for display/export: every filtered demographic cell with its
 * base rate and the historical mortality/economic context of each year.
 * Years without history fall back to the country's latest recorded year.
 */

import type { FilteredDataRow, ForecastTables } from "@/domain/forecast/forecast.types";
import type { EconomicRecord, ForecastFilters, MortalityRecord } from "@/domain/premium/premium.schema";
import { hasColumn, withRows, type ColumnOf, type Table } from "@/domain/table/table";
import { indexFirstBy } from "@/engine/keys";
import { BASE_PREMIUM_REQUIRED_COLUMNS } from "@/engine/premium/calculatePremiums";
import { ECONOMIC_REQUIRED_COLUMNS } from "@/engine/projection/economics";
import { MORTALITY_REQUIRED_COLUMNS, mortalityCellKey } from "@/engine/projection/mortality";
import { parseFilters, requireTable, rowsForCountry, validateYearRange, yearsBetween } from "@/engine/validate";
import { applyFilters } from "./filters";
import { DEMOGRAPHIC_REQUIRED_COLUMNS } from "./forecastAveragePremium";
import { actualPremium, innerJoinCells, resolveJoinKeys } from "./join";

export type FilteredDataArgs = {
  startYear: number;
  endYear: number;
  country: string;
  filters?: ForecastFilters | null;
  /** Label stamped on each row; defaults to "base". */
  scenario?: string;
};

const CORE_COLUMNS: ReadonlyArray<ColumnOf<FilteredDataRow>> = [
  "year",
  "scenario",
  "country",
  "gender",
  "age",
  "policyType",
  "policyCount",
  "premiumPerUnit",
  "basePremium",
  "mortalityRate",
  "lifeExpectancy",
  "inflationRate",
  "interestRate",
  "gdpGrowth",
];

function latestByYear<R extends { year: number }>(rows: ReadonlyArray<R>): R[] {
  const latest = rows.reduce((max, r) => (r.year > max ? r.year : max), -Infinity);
  return rows.filter((r) => r.year === latest);
}

export function buildFilteredDataTable(tables: ForecastTables, args: FilteredDataArgs): Table<FilteredDataRow> {
  validateYearRange(args.startYear, args.endYear);
  const filters = parseFilters(args.filters);
  const { country } = args;
  const scenario = args.scenario ?? "base";

  requireTable("demographics", tables.demographics, DEMOGRAPHIC_REQUIRED_COLUMNS);
  requireTable("basePremiums", tables.basePremiums, BASE_PREMIUM_REQUIRED_COLUMNS);
  requireTable("mortality", tables.mortality, MORTALITY_REQUIRED_COLUMNS);
  requireTable("economic", tables.economic, ECONOMIC_REQUIRED_COLUMNS);

  const demographics = applyFilters(
    withRows(tables.demographics, rowsForCountry("demographics", tables.demographics, country)),
    filters
  );
  const hasSumInsured = hasColumn(demographics, "sumInsured");
  const demographicRows =
    filters.sumInsured != null && hasSumInsured
      ? demographics.rows.filter((r) => r.sumInsured === filters.sumInsured)
      : demographics.rows;

  const basePremiums = withRows(tables.basePremiums, rowsForCountry("basePremiums", tables.basePremiums, country));
  const keys = resolveJoinKeys(basePremiums, demographics);
  const cells = innerJoinCells(basePremiums.rows, demographicRows, keys);

  const mortalityRows = rowsForCountry("mortality", tables.mortality, country);
  const latestMortality = latestByYear(mortalityRows);
  const economicRows = tables.economic.rows.filter((r) => r.country === country);
  const latestEconomic: EconomicRecord | undefined = latestByYear(economicRows)[0];

  const cellsCarrySmoking = hasColumn(demographics, "smokingStatus") || hasColumn(basePremiums, "smokingStatus");
  const matchSmoking = cellsCarrySmoking && hasColumn(tables.mortality, "smokingStatus");

  const rows: FilteredDataRow[] = [];
  for (const year of yearsBetween(args.startYear, args.endYear)) {
    const economic = economicRows.find((r) => r.year === year) ?? latestEconomic;
    if (!economic) continue;

    const yearMortality: MortalityRecord[] = mortalityRows.filter((r) => r.year === year);
    const mortalityByCell = indexFirstBy(yearMortality.length > 0 ? yearMortality : latestMortality, (r) =>
      mortalityCellKey(r, matchSmoking)
    );

    for (const { left: base, right: demographic } of cells) {
      const smokingStatus = demographic.smokingStatus ?? base.smokingStatus;
      const mortality = mortalityByCell.get(
        mortalityCellKey({ gender: demographic.gender, age: demographic.age, smokingStatus }, matchSmoking)
      );
      if (!mortality) continue;

      const row: FilteredDataRow = {
        year,
        scenario,
        country,
        gender: demographic.gender,
        age: demographic.age,
        policyType: demographic.policyType,
        policyCount: demographic.policyCount,
        premiumPerUnit: base.premiumPerUnit,
        basePremium: actualPremium(base.premiumPerUnit, demographic.sumInsured),
        mortalityRate: mortality.mortalityRate,
        lifeExpectancy: mortality.lifeExpectancy,
        inflationRate: economic.inflationRate,
        interestRate: economic.interestRate,
        gdpGrowth: economic.gdpGrowth,
      };
      const group = demographic.group ?? base.group;
      if (group !== undefined) row.group = group;
      if (smokingStatus !== undefined) row.smokingStatus = smokingStatus;
      if (demographic.sumInsured !== undefined) row.sumInsured = demographic.sumInsured;
      rows.push(row);
    }
  }

  const columns: ColumnOf<FilteredDataRow>[] = [...CORE_COLUMNS];
  if (hasColumn(demographics, "group") || hasColumn(basePremiums, "group")) columns.push("group");
  if (cellsCarrySmoking) columns.push("smokingStatus");
  if (hasSumInsured) columns.push("sumInsured");
  return { columns, rows };
}
