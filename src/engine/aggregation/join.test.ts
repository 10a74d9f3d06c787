import { describe, it } from "node:test";
import assert from "node:assert";
import type { BasePremiumRecord, DemographicRecord, PolicyGroup } from "@/domain/premium/premium.schema";
import { tableOf } from "@/domain/table/table";
import { applyFilters } from "./filters";
import { actualPremium, innerJoinCells, resolveJoinKeys } from "./join";

const smokerRates: BasePremiumRecord[] = [
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", smokingStatus: "Smoker", premiumPerUnit: 200 },
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", smokingStatus: "Non-Smoker", premiumPerUnit: 100 },
];

const population: DemographicRecord[] = [
  { country: "India", gender: "Male", age: 30, policyType: "Term Life", policyCount: 10 },
  { country: "India", gender: "Male", age: 40, policyType: "Term Life", policyCount: 5 },
];

describe("actualPremium", () => {
  it("scales the per-unit rate by sum insured in units of 100,000", () => {
    assert.strictEqual(actualPremium(50, 2_500_000), 1250);
    assert.strictEqual(actualPremium(80, 1_000_000), 800);
  });

  it("assumes ten units when sum insured is unknown", () => {
    assert.strictEqual(actualPremium(84, undefined), 840);
  });
});

describe("resolveJoinKeys", () => {
  it("joins on an optional column only when both tables carry it", () => {
    const rates = tableOf(smokerRates);
    const people = tableOf(population);
    assert.deepStrictEqual(resolveJoinKeys(rates, people), { group: false, smokingStatus: false });

    const smokingPeople = tableOf(population.map((p) => ({ ...p, smokingStatus: "Smoker" as const })));
    assert.deepStrictEqual(resolveJoinKeys(rates, smokingPeople), { group: false, smokingStatus: true });
  });
});

describe("innerJoinCells", () => {
  it("matches every rate row when the demographic side has no smokingStatus", () => {
    const cells = innerJoinCells(smokerRates, population, { group: false, smokingStatus: false });
    assert.deepStrictEqual(
      cells.map((c) => [c.left.premiumPerUnit, c.right.policyCount]),
      [
        [200, 10],
        [100, 10],
      ]
    );
  });

  it("keys on smokingStatus when both sides carry it", () => {
    const smokers = population.map((p) => ({ ...p, smokingStatus: "Smoker" as const }));
    const cells = innerJoinCells(smokerRates, smokers, { group: false, smokingStatus: true });
    assert.deepStrictEqual(
      cells.map((c) => c.left.premiumPerUnit),
      [200]
    );
  });
});

describe("applyFilters", () => {
  const grouped = (group: PolicyGroup, age: number): DemographicRecord => ({
    country: "India",
    group,
    gender: "Female",
    age,
    policyType: "Whole Life",
    policyCount: 1,
  });

  it("applies attribute and age filters", () => {
    const table = tableOf([grouped("Family", 25), grouped("Corporate", 35), grouped("Family", 45)]);
    const filtered = applyFilters(table, { group: "Family", ageMin: 30, ageMax: 50 });
    assert.deepStrictEqual(
      filtered.rows.map((r) => r.age),
      [45]
    );
    assert.deepStrictEqual(filtered.columns, table.columns);
  });

  it("ignores group and smokingStatus filters on tables without the column", () => {
    const table = tableOf(population);
    const filtered = applyFilters(table, { group: "Family", smokingStatus: "Smoker" });
    assert.strictEqual(filtered.rows.length, 2);
  });

  it("gender and policyType always apply", () => {
    const table = tableOf(population);
    assert.strictEqual(applyFilters(table, { gender: "Female" }).rows.length, 0);
    assert.strictEqual(applyFilters(table, { policyType: "Term Life", ageMax: 30 }).rows.length, 1);
  });
});
