import type {
  BasePremiumRecord,
  DemographicRecord,
  EconomicRecord,
  Gender,
  MortalityRecord,
  PolicyGroup,
  PolicyType,
  SmokingStatus,
} from "@/domain/premium/premium.schema";
import type { ColumnOf, Table } from "@/domain/table/table";

/** The four engine inputs, loaded once and never mutated. */
export type ForecastTables = {
  mortality: Table<MortalityRecord>;
  economic: Table<EconomicRecord>;
  basePremiums: Table<BasePremiumRecord>;
  demographics: Table<DemographicRecord>;
};

/** Adjusted premium for one base-premium cell in one year, with its matched context. */
export type PremiumRecord = {
  year: number;
  country: string;
  group?: PolicyGroup;
  gender: Gender;
  age: number;
  policyType: PolicyType;
  smokingStatus?: SmokingStatus;
  /** Per 100,000 of sum insured, rounded to 2 dp. */
  premiumPerUnit: number;
  mortalityRate: number;
  lifeExpectancy: number;
  inflationRate: number;
  interestRate: number;
  gdpGrowth: number;
};

/** One output row per forecast year (per scenario when comparing). */
export type ForecastRow = {
  year: number;
  scenario: string;
  averagePremium: number;
  averagePremiumPerUnit: number;
  totalPolicies: number;
  inflationRate: number;
  interestRate: number;
  gdpGrowth: number;
  /** Unweighted mean over joined cells (premiums are policy-weighted). */
  averageLifeExpectancy: number;
  /** Unweighted mean over joined cells (premiums are policy-weighted). */
  averageMortalityRate: number;
  averageSumInsured?: number;
};

export const FORECAST_COLUMNS: ReadonlyArray<ColumnOf<ForecastRow>> = [
  "year",
  "scenario",
  "averagePremium",
  "averagePremiumPerUnit",
  "totalPolicies",
  "inflationRate",
  "interestRate",
  "gdpGrowth",
  "averageLifeExpectancy",
  "averageMortalityRate",
];

export type ForecastTable = Table<ForecastRow>;

/** Overview metrics derived from a single forecast series. */
export type ForecastSummary = {
  startYear: number;
  endYear: number;
  startPremium: number;
  endPremium: number;
  changePct: number;
  averageInflation: number;
  totalPolicies: number;
};

/** Per-cell detail row (demographics × base premiums × historical context). */
export type FilteredDataRow = {
  year: number;
  scenario: string;
  country: string;
  group?: PolicyGroup;
  gender: Gender;
  age: number;
  policyType: PolicyType;
  smokingStatus?: SmokingStatus;
  sumInsured?: number;
  policyCount: number;
  premiumPerUnit: number;
  basePremium: number;
  mortalityRate: number;
  lifeExpectancy: number;
  inflationRate: number;
  interestRate: number;
  gdpGrowth: number;
};
