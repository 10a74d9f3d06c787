/**
 * Premium calculator: adjusts each base-premium cell for one target year.
 * premium = premiumPerUnit × cumulativeInflation × mortality × (1 + longevity) × (1 + interest) × (1 + gdp)
 */

import type { ForecastTables, PremiumRecord } from "@/domain/forecast/forecast.types";
import type { BasePremiumRecord, EconomicRecord, MortalityRecord } from "@/domain/premium/premium.schema";
import { hasColumn, type ColumnOf, type Table } from "@/domain/table/table";
import { ForecastError } from "@/engine/errors";
import { resolveEconomicBaseline } from "@/engine/projection/economics";
import { indexMortalityBaseline, mortalityCellKey, resolveMortalityBaseline } from "@/engine/projection/mortality";
import { indexFirstBy } from "@/engine/keys";
import { requireTable, round, rowsForCountry } from "@/engine/validate";
import {
  cumulativeInflationFactor,
  gdpAdjustment,
  interestAdjustment,
  longevityAdjustment,
  mortalityMultiplier,
} from "./adjustments";

export const BASE_PREMIUM_REQUIRED_COLUMNS: ReadonlyArray<ColumnOf<BasePremiumRecord>> = [
  "country",
  "gender",
  "age",
  "policyType",
  "premiumPerUnit",
];

const PREMIUM_CORE_COLUMNS: ReadonlyArray<ColumnOf<PremiumRecord>> = [
  "year",
  "country",
  "gender",
  "age",
  "policyType",
  "premiumPerUnit",
  "mortalityRate",
  "lifeExpectancy",
  "inflationRate",
  "interestRate",
  "gdpGrowth",
];

/** Columns a premium table carries: group and smokingStatus only when the base-premium table does. */
export function premiumColumns(basePremiums: Table<BasePremiumRecord>): ColumnOf<PremiumRecord>[] {
  const columns = [...PREMIUM_CORE_COLUMNS];
  if (hasColumn(basePremiums, "group")) columns.push("group");
  if (hasColumn(basePremiums, "smokingStatus")) columns.push("smokingStatus");
  return columns;
}

export type CalculatePremiumsArgs = {
  year: number;
  mortalityProjection: Table<MortalityRecord>;
  economicProjection: ReadonlyArray<EconomicRecord>;
  /** Used for cumulative inflation; defaults to economicProjection. */
  economicHistory?: ReadonlyArray<EconomicRecord>;
  country: string;
};

function projectionRowsForYear(projection: Table<MortalityRecord>, year: number): MortalityRecord[] {
  if (projection.rows.length === 0 || !hasColumn(projection, "year")) {
    throw new ForecastError("InvalidMortalityProjection", "Mortality projection is empty or has no year column", {
      year,
    });
  }
  const rows = projection.rows.filter((r) => r.year === year);
  if (rows.length === 0) {
    throw new ForecastError("InvalidMortalityProjection", `Mortality projection has no rows for ${year}`, { year });
  }
  const malformed = rows.find(
    (r) => !Number.isFinite(r.mortalityRate) || r.mortalityRate < 0 || !Number.isFinite(r.lifeExpectancy) || r.lifeExpectancy < 0
  );
  if (malformed) {
    throw new ForecastError(
      "InvalidMortalityProjection",
      `Mortality projection for ${year} has invalid values (age ${malformed.age}, ${malformed.gender})`,
      { year }
    );
  }
  return rows;
}

/**
 * Returns one PremiumRecord per base-premium cell of the country that has a
 * projected mortality match for the year; unmatched cells are skipped.
 * Throws MissingEconomicData / InvalidMortalityProjection for the year.
 */
export function calculatePremiums(
  tables: Pick<ForecastTables, "mortality" | "economic" | "basePremiums">,
  args: CalculatePremiumsArgs
): PremiumRecord[] {
  const { year, country } = args;
  const yearMortality = projectionRowsForYear(args.mortalityProjection, year);

  const yearEconomic = args.economicProjection.find((r) => r.year === year);
  if (!yearEconomic) {
    throw new ForecastError("MissingEconomicData", `No economic data available for ${year}`, { year, country });
  }

  requireTable("basePremiums", tables.basePremiums, BASE_PREMIUM_REQUIRED_COLUMNS);
  const baseCells = rowsForCountry("basePremiums", tables.basePremiums, country);
  const baseHasSmoking = hasColumn(tables.basePremiums, "smokingStatus");
  const baseHasGroup = hasColumn(tables.basePremiums, "group");

  const matchProjectedSmoking = baseHasSmoking && hasColumn(args.mortalityProjection, "smokingStatus");
  const projectedByCell = indexFirstBy(yearMortality, (r) => mortalityCellKey(r, matchProjectedSmoking));

  const mortalityBaseline = resolveMortalityBaseline(tables.mortality, country);
  const baselineByCell = indexMortalityBaseline(mortalityBaseline, baseHasSmoking);
  const matchBaselineSmoking = baseHasSmoking && mortalityBaseline.hasSmokingStatus;

  const economicBaseline = resolveEconomicBaseline(tables.economic, country);
  const inflationFactor = cumulativeInflationFactor(
    year,
    economicBaseline.year,
    args.economicHistory ?? args.economicProjection
  );
  const interestMultiplier = 1 + interestAdjustment(yearEconomic.interestRate, economicBaseline.interestRate);
  const gdpMultiplier = 1 + gdpAdjustment(yearEconomic.gdpGrowth, economicBaseline.gdpGrowth);

  const premiums: PremiumRecord[] = [];
  for (const cell of baseCells) {
    const projected = projectedByCell.get(mortalityCellKey(cell, matchProjectedSmoking));
    if (!projected) continue;

    let premium = cell.premiumPerUnit * inflationFactor;

    const base = baselineByCell.get(mortalityCellKey(cell, matchBaselineSmoking));
    if (base) {
      premium *= mortalityMultiplier(projected.mortalityRate, base.mortalityRate);
      premium *= 1 + longevityAdjustment(cell.policyType, projected.lifeExpectancy - base.lifeExpectancy);
    }

    premium *= interestMultiplier;
    premium *= gdpMultiplier;

    const record: PremiumRecord = {
      year,
      country,
      gender: cell.gender,
      age: cell.age,
      policyType: cell.policyType,
      premiumPerUnit: round(premium, 2),
      mortalityRate: projected.mortalityRate,
      lifeExpectancy: projected.lifeExpectancy,
      inflationRate: yearEconomic.inflationRate,
      interestRate: yearEconomic.interestRate,
      gdpGrowth: yearEconomic.gdpGrowth,
    };
    if (baseHasGroup && cell.group !== undefined) record.group = cell.group;
    if (baseHasSmoking && cell.smokingStatus !== undefined) record.smokingStatus = cell.smokingStatus;
    premiums.push(record);
  }

  return premiums;
}
