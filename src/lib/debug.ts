export const isDev = () => process.env.NODE_ENV !== "production";

/** PREMIUM_FORECAST_LOG=silent mutes everything (tests set it). */
const isSilenced = () => process.env.PREMIUM_FORECAST_LOG === "silent";

const enabled = () => isDev() && !isSilenced();

export const dlog = (...args: unknown[]) => {
  if (enabled()) console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (enabled()) console.warn(...args);
};

/** Errors are reported in production too; only the silent switch mutes them. */
export const derr = (...args: unknown[]) => {
  if (!isSilenced()) console.error(...args);
};

export type ScopedLogger = {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/** Prefixes every line with `[scope]`, e.g. `[forecast/compare] scenario failed`. */
export function scopedLogger(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    log: (...args) => dlog(prefix, ...args),
    warn: (...args) => dwarn(prefix, ...args),
    error: (...args) => derr(prefix, ...args),
  };
}
