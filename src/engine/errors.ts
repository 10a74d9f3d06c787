/**
 * Named failures raised by the forecast engine. Every error carries the inputs
 * (country, year, scenario, filters) that produced it.
 */

export type ForecastErrorCode =
  | "EmptyDataset"
  | "NoDataForCountry"
  | "MissingEconomicData"
  | "InvalidMortalityProjection"
  | "UnknownScenario"
  | "MissingColumns"
  | "InvalidYearRange"
  | "InvalidInput";

export type ForecastErrorContext = {
  table?: string;
  country?: string;
  year?: number;
  scenario?: string;
  startYear?: number;
  endYear?: number;
  filters?: unknown;
  columns?: string[];
};

const PREFIX = "[premiumForecast]";

export class ForecastError extends Error {
  constructor(
    public readonly code: ForecastErrorCode,
    message: string,
    public readonly context: ForecastErrorContext = {}
  ) {
    super(`${PREFIX} ${code}: ${message}`);
    this.name = "ForecastError";
  }
}

export function isForecastError(err: unknown, code?: ForecastErrorCode): err is ForecastError {
  return err instanceof ForecastError && (code === undefined || err.code === code);
}

/** Returns a copy of the error with extra context merged in (e.g. the scenario that was running). */
export function withContext(err: ForecastError, context: ForecastErrorContext): ForecastError {
  const merged = new ForecastError(err.code, stripPrefix(err), { ...err.context, ...context });
  merged.stack = err.stack;
  return merged;
}

function stripPrefix(err: ForecastError): string {
  const head = `${PREFIX} ${err.code}: `;
  return err.message.startsWith(head) ? err.message.slice(head.length) : err.message;
}

/**
 * One-line, user-facing description: "No forecast available for India 2025–2030 (scenario base): ...".
 */
export function describeForecastError(err: unknown): string {
  if (!(err instanceof ForecastError)) {
    const msg = err instanceof Error ? err.message : String(err);
    return `No forecast available: ${msg}`;
  }
  const { country, startYear, endYear, year, scenario, filters } = err.context;
  const parts: string[] = [];
  if (country) parts.push(country);
  if (startYear !== undefined && endYear !== undefined) parts.push(`${startYear}–${endYear}`);
  else if (year !== undefined) parts.push(String(year));
  if (scenario) parts.push(`(scenario ${scenario})`);
  const where = parts.length > 0 ? ` for ${parts.join(" ")}` : "";
  const filterText = hasActiveFilters(filters) ? ` [filters: ${JSON.stringify(filters)}]` : "";
  return `No forecast available${where}: ${stripPrefix(err)}${filterText}`;
}

function hasActiveFilters(filters: unknown): boolean {
  if (filters == null || typeof filters !== "object") return false;
  return Object.values(filters).some((v) => v !== null && v !== undefined);
}
