import { describe, it } from "node:test";
import assert from "node:assert";
import type { PremiumRecord } from "@/domain/forecast/forecast.types";
import type { BasePremiumRecord, EconomicRecord, MortalityRecord } from "@/domain/premium/premium.schema";
import { tableOf } from "@/domain/table/table";
import { FIXTURE_COUNTRY, buildForecastTables, smokingMortalityTable } from "@/dev/fixtures";
import { isForecastError } from "@/engine/errors";
import { MORTALITY_REQUIRED_COLUMNS } from "@/engine/projection/mortality";
import { calculatePremiums, premiumColumns } from "./calculatePremiums";

process.env.PREMIUM_FORECAST_LOG = "silent";

const tables = buildForecastTables();

const projection2025 = tableOf<MortalityRecord>([
  { year: 2025, country: FIXTURE_COUNTRY, gender: "Male", age: 30, mortalityRate: 1.182, lifeExpectancy: 45.02 },
  { year: 2025, country: FIXTURE_COUNTRY, gender: "Female", age: 30, mortalityRate: 0.8, lifeExpectancy: 50.0 },
]);

const flatEconomy2025: EconomicRecord[] = [
  { year: 2025, country: FIXTURE_COUNTRY, inflationRate: 5.0, interestRate: 6.5, gdpGrowth: 6.5 },
];

function premiumFor(rows: ReadonlyArray<PremiumRecord>, gender: string, policyType: string): PremiumRecord {
  const found = rows.find((r) => r.gender === gender && r.policyType === policyType);
  assert(found, `no premium for ${gender} ${policyType}`);
  return found;
}

describe("calculatePremiums", () => {
  it("applies inflation, mortality and longevity adjustments per cell", () => {
    const premiums = calculatePremiums(tables, {
      year: 2025,
      mortalityProjection: projection2025,
      economicProjection: flatEconomy2025,
      country: FIXTURE_COUNTRY,
    });
    assert.strictEqual(premiums.length, 3);

    // 100 × 1.05 × (1 − 0.015 × 0.3) × (1 − 0.005 × 0.02)
    const maleTerm = premiumFor(premiums, "Male", "Term Life");
    assert.strictEqual(maleTerm.premiumPerUnit, 104.52);
    assert.strictEqual(maleTerm.mortalityRate, 1.182);
    assert.strictEqual(maleTerm.inflationRate, 5.0);

    // 150 × 1.05 × 0.9955 × (1 + 0.003 × 0.02)
    assert.strictEqual(premiumFor(premiums, "Male", "Whole Life").premiumPerUnit, 156.8);
    // mortality unchanged: inflation only
    assert.strictEqual(premiumFor(premiums, "Female", "Term Life").premiumPerUnit, 84);
  });

  it("compounds inflation from history and applies interest and gdp sensitivities", () => {
    const projection = tableOf<MortalityRecord>([
      { year: 2025, country: FIXTURE_COUNTRY, gender: "Male", age: 30, mortalityRate: 1.2, lifeExpectancy: 45.0 },
    ]);
    const premiums = calculatePremiums(tables, {
      year: 2025,
      mortalityProjection: projection,
      economicProjection: [{ year: 2025, country: FIXTURE_COUNTRY, inflationRate: 6.0, interestRate: 7.5, gdpGrowth: 4.5 }],
      economicHistory: [
        { year: 2024, country: FIXTURE_COUNTRY, inflationRate: 5.0, interestRate: 6.5, gdpGrowth: 6.5 },
        { year: 2025, country: FIXTURE_COUNTRY, inflationRate: 6.0, interestRate: 7.5, gdpGrowth: 4.5 },
      ],
      country: FIXTURE_COUNTRY,
    });
    // 100 × 1.05 × 1.06 × (1 − 0.12 × 0.01) × (1 + 0.05 × 0.02)
    assert.strictEqual(premiumFor(premiums, "Male", "Term Life").premiumPerUnit, 111.28);
    // no projected Female cell for the year: skipped
    assert.strictEqual(premiums.length, 2);
  });

  it("matches smoker-specific mortality only when both tables carry smokingStatus", () => {
    const basePremiums = tableOf<BasePremiumRecord>([
      { country: FIXTURE_COUNTRY, gender: "Male", age: 30, policyType: "Term Life", smokingStatus: "Smoker", premiumPerUnit: 200 },
      { country: FIXTURE_COUNTRY, gender: "Male", age: 30, policyType: "Term Life", smokingStatus: "Non-Smoker", premiumPerUnit: 100 },
    ]);
    const mortality = smokingMortalityTable();
    const projection = tableOf<MortalityRecord>(
      mortality.rows.map((r) => ({ ...r, year: 2025 })),
      [...MORTALITY_REQUIRED_COLUMNS, "smokingStatus"]
    );
    const premiums = calculatePremiums(
      { ...tables, mortality, basePremiums },
      { year: 2025, mortalityProjection: projection, economicProjection: flatEconomy2025, country: FIXTURE_COUNTRY }
    );
    assert.deepStrictEqual(
      premiums.map((p) => [p.smokingStatus, p.mortalityRate, p.premiumPerUnit]),
      [
        ["Smoker", 2.4, 210],
        ["Non-Smoker", 1.0, 105],
      ]
    );
    assert.deepStrictEqual(premiumColumns(basePremiums).slice(-1), ["smokingStatus"]);
  });

  it("throws MissingEconomicData when the year has no economic record", () => {
    assert.throws(
      () =>
        calculatePremiums(tables, {
          year: 2025,
          mortalityProjection: projection2025,
          economicProjection: [],
          country: FIXTURE_COUNTRY,
        }),
      (err) => isForecastError(err, "MissingEconomicData") && err.context.year === 2025
    );
  });

  it("throws InvalidMortalityProjection for empty, missing-year or negative projections", () => {
    const args = { year: 2025, economicProjection: flatEconomy2025, country: FIXTURE_COUNTRY };
    const negative = tableOf<MortalityRecord>([
      { year: 2025, country: FIXTURE_COUNTRY, gender: "Male", age: 30, mortalityRate: -0.1, lifeExpectancy: 45 },
    ]);
    for (const mortalityProjection of [
      tableOf<MortalityRecord>([], MORTALITY_REQUIRED_COLUMNS),
      tableOf(projection2025.rows.map((r) => ({ ...r, year: 2030 }))),
      negative,
    ]) {
      assert.throws(
        () => calculatePremiums(tables, { ...args, mortalityProjection }),
        (err) => isForecastError(err, "InvalidMortalityProjection")
      );
    }
  });

  it("throws NoDataForCountry when the base premium table lacks the country", () => {
    assert.throws(
      () =>
        calculatePremiums(tables, {
          year: 2025,
          mortalityProjection: tableOf(projection2025.rows.map((r) => ({ ...r, country: "Atlantis" }))),
          economicProjection: flatEconomy2025.map((r) => ({ ...r, country: "Atlantis" })),
          country: "Atlantis",
        }),
      (err) => isForecastError(err, "NoDataForCountry") && err.context.table === "basePremiums"
    );
  });
});
