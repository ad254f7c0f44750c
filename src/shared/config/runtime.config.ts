import {
  defaultScraperConfig,
  scraperCaps,
  type ScraperConfig,
  validateScraperConfig
} from "../../application/scrape-place/scraper.config";

export const runtimeCaps = {
  navigationTimeoutMs: { min: 1000, max: 120000 }
} as const;

export type RuntimeConfig = {
  scraperConfig: ScraperConfig;
  navigationTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const scraperConfig = validateScraperConfig({
    ...defaultScraperConfig,
    maxStagnantPasses:
      parseOptionalIntInRange(env, "SCRAPE_MAX_STAGNANT_PASSES", scraperCaps.maxStagnantPasses) ??
      defaultScraperConfig.maxStagnantPasses,
    maxBackoffRetries:
      parseOptionalIntInRange(env, "SCRAPE_MAX_BACKOFF_RETRIES", scraperCaps.maxBackoffRetries) ??
      defaultScraperConfig.maxBackoffRetries,
    backoffBaseMs:
      parseOptionalIntInRange(env, "SCRAPE_BACKOFF_BASE_MS", scraperCaps.backoffBaseMs) ??
      defaultScraperConfig.backoffBaseMs,
    backoffMaxMs:
      parseOptionalIntInRange(env, "SCRAPE_BACKOFF_MAX_MS", scraperCaps.backoffMaxMs) ??
      defaultScraperConfig.backoffMaxMs,
    passTimeoutMs:
      parseOptionalIntInRange(env, "SCRAPE_PASS_TIMEOUT_MS", { min: 100, max: scraperCaps.passTimeoutMs.max }) ??
      defaultScraperConfig.passTimeoutMs,
    placeTimeoutMs:
      parseOptionalIntInRange(env, "SCRAPE_PLACE_TIMEOUT_MS", { min: 1000, max: scraperCaps.placeTimeoutMs.max }) ??
      defaultScraperConfig.placeTimeoutMs,
    placeDelayMs:
      parseOptionalIntInRange(env, "SCRAPE_PLACE_DELAY_MS", scraperCaps.placeDelayMs) ??
      defaultScraperConfig.placeDelayMs
  });

  const navigationTimeoutMs =
    parseOptionalIntInRange(env, "NAVIGATION_TIMEOUT_MS", runtimeCaps.navigationTimeoutMs) ?? 60000;

  return { scraperConfig, navigationTimeoutMs };
};
