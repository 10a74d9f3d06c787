import type { ForecastRow, ForecastSummary } from "@/domain/forecast/forecast.types";
import { round } from "@/engine/validate";

/**
 * Overview metrics for one scenario's series: first vs last year premium, total change, mean inflation.
 * Rows are taken in year order. Returns null for an empty series.
 */
export function summarizeForecast(rows: ReadonlyArray<ForecastRow>): ForecastSummary | null {
  const sorted = [...rows].sort((a, b) => a.year - b.year);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  if (!first || !last) return null;

  const changePct = first.averagePremium > 0 ? ((last.averagePremium - first.averagePremium) / first.averagePremium) * 100 : 0;
  const averageInflation = sorted.reduce((s, r) => s + r.inflationRate, 0) / sorted.length;

  return {
    startYear: first.year,
    endYear: last.year,
    startPremium: first.averagePremium,
    endPremium: last.averagePremium,
    changePct: round(changePct, 2),
    averageInflation: round(averageInflation, 2),
    totalPolicies: first.totalPolicies,
  };
}

/** Summaries keyed by scenario for a stacked comparison table. */
export function summarizeByScenario(rows: ReadonlyArray<ForecastRow>): Record<string, ForecastSummary> {
  const byScenario = new Map<string, ForecastRow[]>();
  for (const row of rows) {
    const bucket = byScenario.get(row.scenario);
    if (bucket) bucket.push(row);
    else byScenario.set(row.scenario, [row]);
  }
  const out: Record<string, ForecastSummary> = {};
  for (const [scenario, series] of byScenario) {
    const summary = summarizeForecast(series);
    if (summary) out[scenario] = summary;
  }
  return out;
}
