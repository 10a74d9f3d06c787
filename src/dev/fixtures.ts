/**
 * Dev-only fixtures for engine tests.
 * Small deterministic tables: one country with two historical years, plus a second
 * country so per-country selection is exercised.
 */

import type { ForecastTables } from "@/domain/forecast/forecast.types";
import type {
  BasePremiumRecord,
  DemographicRecord,
  EconomicRecord,
  MortalityRecord,
} from "@/domain/premium/premium.schema";
import { tableOf, type Table } from "@/domain/table/table";
import type { RandomSource } from "@/lib/random";

export const FIXTURE_COUNTRY = "India";
/** Latest historical year in the fixture tables; projections anchor here. */
export const FIXTURE_BASE_YEAR = 2024;

export const mortalityRows: MortalityRecord[] = [
  { year: 2023, country: "India", gender: "Male", age: 30, mortalityRate: 1.3, lifeExpectancy: 44.5 },
  { year: 2023, country: "India", gender: "Female", age: 30, mortalityRate: 0.9, lifeExpectancy: 49.5 },
  { year: 2024, country: "India", gender: "Male", age: 30, mortalityRate: 1.2, lifeExpectancy: 45.0 },
  { year: 2024, country: "India", gender: "Female", age: 30, mortalityRate: 0.8, lifeExpectancy: 50.0 },
  { year: 2024, country: "Brazil", gender: "Male", age: 30, mortalityRate: 1.5, lifeExpectancy: 40.0 },
];

export const economicRows: EconomicRecord[] = [
  { year: 2023, country: "India", inflationRate: 5.5, interestRate: 6.8, gdpGrowth: 6.0 },
  { year: 2024, country: "India", inflationRate: 5.0, interestRate: 6.5, gdpGrowth: 6.5 },
  { year: 2024, country: "Brazil", inflationRate: 4.0, interestRate: 10.0, gdpGrowth: 2.0 },
];

export const basePremiumRows: BasePremiumRecord[] = [
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", premiumPerUnit: 100 },
  { country: "India", gender: "Female", age: 30, policyType: "Term Life", premiumPerUnit: 80 },
  { country: "India", gender: "Male", age: 30, policyType: "Whole Life", premiumPerUnit: 150 },
  { country: "Brazil", gender: "Male", age: 30, policyType: "Term Life", premiumPerUnit: 120 },
];

/** 4000 India policies; the Whole Life cell is present but empty. */
export const demographicRows: DemographicRecord[] = [
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", policyCount: 1000 },
  { country: "India", gender: "Female", age: 30, policyType: "Term Life", policyCount: 3000 },
  { country: "India", gender: "Male", age: 30, policyType: "Whole Life", policyCount: 0 },
  { country: "Brazil", gender: "Male", age: 30, policyType: "Term Life", policyCount: 500 },
];

/** Same India population split into two sum-insured tiers for the Male Term Life cell. */
export const tieredDemographicRows: DemographicRecord[] = [
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", sumInsured: 1_000_000, policyCount: 100 },
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", sumInsured: 2_500_000, policyCount: 300 },
  { country: "India", gender: "Female", age: 30, policyType: "Term Life", sumInsured: 1_000_000, policyCount: 600 },
];

export function buildForecastTables(overrides: Partial<ForecastTables> = {}): ForecastTables {
  return {
    mortality: overrides.mortality ?? tableOf(mortalityRows),
    economic: overrides.economic ?? tableOf(economicRows),
    basePremiums: overrides.basePremiums ?? tableOf(basePremiumRows),
    demographics: overrides.demographics ?? tableOf(demographicRows),
  };
}

/** Mortality table carrying a smokingStatus column (latest year only). */
export function smokingMortalityTable(): Table<MortalityRecord> {
  return tableOf<MortalityRecord>([
    { year: 2024, country: "India", gender: "Male", age: 30, smokingStatus: "Smoker", mortalityRate: 2.4, lifeExpectancy: 40.0 },
    { year: 2024, country: "India", gender: "Male", age: 30, smokingStatus: "Non-Smoker", mortalityRate: 1.0, lifeExpectancy: 46.0 },
  ]);
}

/** Noise-free generator: every normal draw returns its mean. */
export const noNoise: RandomSource = {
  next: () => 0.5,
  normal: (mean) => mean,
};
