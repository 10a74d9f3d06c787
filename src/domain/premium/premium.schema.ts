import { z } from "zod";
import { YEAR_BOUNDS } from "@/config/forecastDefaults";

/**
 * Enums (closed sets shared by every input table)
 */
export const GenderSchema = z.enum(["Male", "Female", "Other"]);
export type Gender = z.infer<typeof GenderSchema>;

export const PolicyTypeSchema = z.enum(["Term Life", "Whole Life"]);
export type PolicyType = z.infer<typeof PolicyTypeSchema>;

export const PolicyGroupSchema = z.enum(["Individual", "Family", "Corporate"]);
export type PolicyGroup = z.infer<typeof PolicyGroupSchema>;

export const SmokingStatusSchema = z.enum(["Smoker", "Non-Smoker"]);
export type SmokingStatus = z.infer<typeof SmokingStatusSchema>;

const YearSchema = z.coerce.number().int().min(YEAR_BOUNDS.min).max(YEAR_BOUNDS.max);
const AgeSchema = z.coerce.number().int().min(0).max(130);
const CountrySchema = z.coerce.string().trim().min(1);

/**
 * Historical mortality by cell. mortalityRate is per 1000 lives.
 */
export const MortalityRecordSchema = z.object({
  year: YearSchema,
  country: CountrySchema,
  gender: GenderSchema,
  age: AgeSchema,
  smokingStatus: SmokingStatusSchema.optional(),
  mortalityRate: z.coerce.number().positive(),
  lifeExpectancy: z.coerce.number().min(0),
});
export type MortalityRecord = z.infer<typeof MortalityRecordSchema>;

/** Annual macro indicators, all in percent. */
export const EconomicRecordSchema = z.object({
  year: YearSchema,
  country: CountrySchema,
  inflationRate: z.coerce.number().finite(),
  interestRate: z.coerce.number().finite(),
  gdpGrowth: z.coerce.number().finite(),
});
export type EconomicRecord = z.infer<typeof EconomicRecordSchema>;

/**
 * Static rate table: premium per 100,000 of sum insured, one row per cell.
 */
export const BasePremiumRecordSchema = z.object({
  country: CountrySchema,
  group: PolicyGroupSchema.optional(),
  gender: GenderSchema,
  age: AgeSchema,
  policyType: PolicyTypeSchema,
  smokingStatus: SmokingStatusSchema.optional(),
  premiumPerUnit: z.coerce.number().min(0),
});
export type BasePremiumRecord = z.infer<typeof BasePremiumRecordSchema>;

/**
 * Population weight for a fully-specified cell.
 * sumInsured is a discrete coverage tier (e.g. 1,000,000 / 2,500,000), not a continuous amount.
 */
export const DemographicRecordSchema = z.object({
  country: CountrySchema,
  group: PolicyGroupSchema.optional(),
  gender: GenderSchema,
  age: AgeSchema,
  policyType: PolicyTypeSchema,
  smokingStatus: SmokingStatusSchema.optional(),
  sumInsured: z.coerce.number().positive().optional(),
  policyCount: z.coerce.number().int().min(0),
});
export type DemographicRecord = z.infer<typeof DemographicRecordSchema>;

/**
 * Attribute filters accepted by the aggregator. null/undefined = no restriction.
 * Unknown keys (e.g. snake_case "age_max") are rejected rather than ignored.
 */
export const ForecastFiltersSchema = z
  .object({
    gender: GenderSchema.nullish(),
    policyType: PolicyTypeSchema.nullish(),
    group: PolicyGroupSchema.nullish(),
    smokingStatus: SmokingStatusSchema.nullish(),
    sumInsured: z.number().positive().nullish(),
    ageMin: z.number().int().min(0).nullish(),
    ageMax: z.number().int().min(0).nullish(),
  })
  .strict()
  .refine((f) => f.ageMin == null || f.ageMax == null || f.ageMin <= f.ageMax, {
    message: "ageMin must not exceed ageMax",
    path: ["ageMin"],
  });
export type ForecastFilters = z.infer<typeof ForecastFiltersSchema>;
