/**
 * Scenario registry: three fixed macro/mortality profiles. The set is closed.
 */

import { ForecastError } from "@/engine/errors";

export type ScenarioName = "base" | "optimistic" | "pessimistic";

export type Scenario = Readonly<{
  name: ScenarioName;
  label: string;
  /** Long-run inflation target (percent). */
  inflationBase: number;
  /** Long-run interest-rate target (percent). */
  interestBase: number;
  /** Annual mortality improvement (percent reduction per year). */
  mortalityImprovementPct: number;
  description: string;
}>;

const SCENARIOS: Readonly<Record<ScenarioName, Scenario>> = Object.freeze({
  base: Object.freeze({
    name: "base",
    label: "Base Case",
    inflationBase: 5.0,
    interestBase: 6.5,
    mortalityImprovementPct: 1.5,
    description: "Moderate inflation, stable interest rates, normal mortality improvements",
  }),
  optimistic: Object.freeze({
    name: "optimistic",
    label: "Optimistic",
    inflationBase: 4.0,
    interestBase: 7.5,
    mortalityImprovementPct: 2.0,
    description: "Low inflation, higher interest rates, faster mortality improvements",
  }),
  pessimistic: Object.freeze({
    name: "pessimistic",
    label: "Pessimistic",
    inflationBase: 6.0,
    interestBase: 5.5,
    mortalityImprovementPct: 1.0,
    description: "High inflation, lower interest rates, slower mortality improvements",
  }),
});

const SCENARIO_ORDER: ReadonlyArray<ScenarioName> = ["base", "optimistic", "pessimistic"];

export function isScenarioName(name: unknown): name is ScenarioName {
  const names: ReadonlyArray<string> = SCENARIO_ORDER;
  return typeof name === "string" && names.includes(name);
}

/** Registered names in display order. */
export function listScenarios(): ScenarioName[] {
  return [...SCENARIO_ORDER];
}

/**
 * Returns the frozen parameters for a scenario name.
 * Throws UnknownScenario for anything outside the registry.
 */
export function getScenario(name: string): Scenario {
  if (!isScenarioName(name)) {
    throw new ForecastError(
      "UnknownScenario",
      `Scenario "${name}" is not registered. Available: ${SCENARIO_ORDER.join(", ")}`,
      { scenario: name }
    );
  }
  return SCENARIOS[name];
}
