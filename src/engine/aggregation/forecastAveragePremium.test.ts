import { describe, it } from "node:test";
import assert from "node:assert";
import { FORECAST_COLUMNS, type PremiumRecord } from "@/domain/forecast/forecast.types";
import type { DemographicRecord, EconomicRecord } from "@/domain/premium/premium.schema";
import { tableOf } from "@/domain/table/table";
import { FIXTURE_COUNTRY, buildForecastTables, tieredDemographicRows } from "@/dev/fixtures";
import { forecastRowViolations } from "@/dev/invariants";
import { isForecastError } from "@/engine/errors";
import { aggregateJoinedCells, forecastAveragePremium, type PricedCell } from "./forecastAveragePremium";

process.env.PREMIUM_FORECAST_LOG = "silent";

const economic2025: EconomicRecord = {
  year: 2025,
  country: FIXTURE_COUNTRY,
  inflationRate: 5.2,
  interestRate: 6.4,
  gdpGrowth: 4.1,
};

function priced(
  premiumPerUnit: number,
  policyCount: number,
  extra: { lifeExpectancy?: number; mortalityRate?: number; sumInsured?: number } = {}
): PricedCell {
  const left: PremiumRecord = {
    year: 2025,
    country: FIXTURE_COUNTRY,
    gender: "Male",
    age: 30,
    policyType: "Term Life",
    premiumPerUnit,
    mortalityRate: extra.mortalityRate ?? 1,
    lifeExpectancy: extra.lifeExpectancy ?? 45,
    inflationRate: economic2025.inflationRate,
    interestRate: economic2025.interestRate,
    gdpGrowth: economic2025.gdpGrowth,
  };
  const right: DemographicRecord = {
    country: FIXTURE_COUNTRY,
    gender: "Male",
    age: 30,
    policyType: "Term Life",
    policyCount,
  };
  if (extra.sumInsured !== undefined) right.sumInsured = extra.sumInsured;
  return { left, right };
}

const args = { startYear: 2025, endYear: 2027, scenario: "base", country: FIXTURE_COUNTRY };

describe("aggregateJoinedCells", () => {
  it("weights premiums by policy count and averages life expectancy per cell", () => {
    const row = aggregateJoinedCells(
      [priced(10, 10, { lifeExpectancy: 40, mortalityRate: 1 }), priced(20, 30, { lifeExpectancy: 50, mortalityRate: 2 })],
      { year: 2025, scenario: "base", economic: economic2025, includeSumInsured: false }
    );
    // actual premiums 100 and 200: (10 × 100 + 30 × 200) / 40
    assert.deepStrictEqual(row, {
      year: 2025,
      scenario: "base",
      averagePremium: 175,
      averagePremiumPerUnit: 17.5,
      totalPolicies: 40,
      inflationRate: 5.2,
      interestRate: 6.4,
      gdpGrowth: 4.1,
      averageLifeExpectancy: 45,
      averageMortalityRate: 1.5,
    });
  });

  it("prices by sum insured and defaults missing tiers to 1,000,000", () => {
    const row = aggregateJoinedCells([priced(50, 2, { sumInsured: 2_500_000 }), priced(50, 2)], {
      year: 2025,
      scenario: "base",
      economic: economic2025,
      includeSumInsured: true,
    });
    assert(row);
    // (1250 × 2 + 500 × 2) / 4
    assert.strictEqual(row.averagePremium, 875);
    assert.strictEqual(row.averageSumInsured, 1_750_000);
  });

  it("returns null when no policies remain", () => {
    const context = { year: 2025, scenario: "base", economic: economic2025, includeSumInsured: false };
    assert.strictEqual(aggregateJoinedCells([], context), null);
    assert.strictEqual(aggregateJoinedCells([priced(10, 0), priced(20, 0)], context), null);
  });
});

describe("forecastAveragePremium", () => {
  it("emits one row per year for the whole population", () => {
    const result = forecastAveragePremium(buildForecastTables(), args);
    assert.deepStrictEqual(result.columns, [...FORECAST_COLUMNS]);
    assert.deepStrictEqual(
      result.rows.map((r) => [r.year, r.scenario, r.totalPolicies]),
      [
        [2025, "base", 4000],
        [2026, "base", 4000],
        [2027, "base", 4000],
      ]
    );
    for (const row of result.rows) {
      assert.deepStrictEqual(forecastRowViolations(row), []);
    }
  });

  it("life expectancy and mortality are unweighted means over joined cells", () => {
    const result = forecastAveragePremium(buildForecastTables(), args);
    const row2026 = result.rows.find((r) => r.year === 2026);
    assert(row2026);
    // cells: Male Term (1.1643, 45.03), Female Term (0.7762, 50.03), Male Whole (1.1643, 45.03)
    assert.strictEqual(row2026.averageMortalityRate, 1.0349);
    assert.strictEqual(row2026.averageLifeExpectancy, 46.7);
  });

  it("identical inputs give identical output", () => {
    const tables = buildForecastTables();
    assert.deepStrictEqual(forecastAveragePremium(tables, args), forecastAveragePremium(tables, args));
    assert.deepStrictEqual(
      forecastAveragePremium(tables, args, { seed: 7 }),
      forecastAveragePremium(tables, args, { seed: 7 })
    );
  });

  it("filters restrict the population on both sides of the join", () => {
    const result = forecastAveragePremium(buildForecastTables(), { ...args, filters: { gender: "Female" } });
    assert.strictEqual(result.rows.length, 3);
    for (const row of result.rows) {
      assert.strictEqual(row.totalPolicies, 3000);
      assert.strictEqual(row.averagePremium, Math.round(row.averagePremiumPerUnit * 1000) / 100);
    }
  });

  it("drops years whose population has zero policies", () => {
    const result = forecastAveragePremium(buildForecastTables(), { ...args, filters: { policyType: "Whole Life" } });
    assert.deepStrictEqual(result.rows, []);
    assert.deepStrictEqual(result.columns, [...FORECAST_COLUMNS]);
  });

  it("ignores a group filter when neither table has a group column", () => {
    const tables = buildForecastTables();
    assert.deepStrictEqual(
      forecastAveragePremium(tables, { ...args, filters: { group: "Family" } }).rows,
      forecastAveragePremium(tables, args).rows
    );
  });

  it("filters sum insured after the join and reports the average tier", () => {
    const tables = buildForecastTables({ demographics: tableOf(tieredDemographicRows) });

    const all = forecastAveragePremium(tables, args);
    assert.ok(all.columns.includes("averageSumInsured"));
    const first = all.rows[0];
    assert(first);
    assert.strictEqual(first.totalPolicies, 1000);
    // (1,000,000 × 100 + 2,500,000 × 300 + 1,000,000 × 600) / 1000
    assert.strictEqual(first.averageSumInsured, 1_450_000);

    const tier = forecastAveragePremium(tables, { ...args, filters: { sumInsured: 2_500_000 } });
    for (const row of tier.rows) {
      assert.strictEqual(row.totalPolicies, 300);
      assert.strictEqual(row.averageSumInsured, 2_500_000);
      assert.strictEqual(row.averagePremium, Math.round(row.averagePremiumPerUnit * 2500) / 100);
    }
  });

  it("wraps failures with the call context", () => {
    const tables = buildForecastTables();
    assert.throws(
      () => forecastAveragePremium(tables, { ...args, scenario: "utopia" }),
      (err) =>
        isForecastError(err, "UnknownScenario") &&
        err.context.country === FIXTURE_COUNTRY &&
        err.context.startYear === 2025 &&
        err.context.endYear === 2027
    );
    assert.throws(
      () => forecastAveragePremium(tables, { ...args, country: "Atlantis" }),
      (err) => isForecastError(err, "NoDataForCountry") && err.context.country === "Atlantis"
    );
    assert.throws(
      () => forecastAveragePremium(tables, { ...args, filters: { ageMin: 60, ageMax: 20 } }),
      (err) => isForecastError(err, "InvalidInput")
    );
    assert.throws(
      () => forecastAveragePremium(tables, { ...args, startYear: 2030 }),
      (err) => isForecastError(err, "InvalidYearRange")
    );
  });

  it("rejects years far from any plausible history instead of emitting non-finite rows", () => {
    assert.throws(
      () => forecastAveragePremium(buildForecastTables(), { ...args, startYear: -1700, endYear: -1698 }),
      (err) => isForecastError(err, "InvalidYearRange") && err.context.startYear === -1700
    );
  });

  it("rejects snake_case filter keys instead of widening the population", () => {
    const snakeCase = { gender: "Female" as const, age_max: 20 };
    assert.throws(
      () => forecastAveragePremium(buildForecastTables(), { ...args, filters: snakeCase }),
      (err) => isForecastError(err, "InvalidInput") && err.message.includes("age_max")
    );
  });
});
