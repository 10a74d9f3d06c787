/**
 * Debug flags for development. Defaults must be false for production.
 */

/** When true, the aggregator logs per-year join sizes. */
export const DEBUG_FORECAST = false;

/** When true, economic projections log the baseline they converge from. */
export const DEBUG_PROJECTION = false;
