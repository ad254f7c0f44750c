export type ScraperConfig = {
  maxStagnantPasses: number;
  maxBackoffRetries: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  backoffJitterRatio: number;
  passTimeoutMs: number;
  placeTimeoutMs: number;
  placeDelayMs: number;
};

export type ScraperConfigInput = Partial<ScraperConfig>;

export const defaultScraperConfig: ScraperConfig = {
  maxStagnantPasses: 3,
  maxBackoffRetries: 5,
  backoffBaseMs: 1000,
  backoffMaxMs: 30000,
  backoffJitterRatio: 0.2,
  passTimeoutMs: 4000,
  placeTimeoutMs: 600000,
  placeDelayMs: 2000
};

export const scraperCaps = {
  maxStagnantPasses: { min: 1, max: 50 },
  maxBackoffRetries: { min: 0, max: 20 },
  backoffBaseMs: { min: 1, max: 60000 },
  backoffMaxMs: { min: 1, max: 300000 },
  passTimeoutMs: { min: 1, max: 60000 },
  placeTimeoutMs: { min: 1, max: 3600000 },
  placeDelayMs: { min: 0, max: 60000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateScraperConfig = (config: ScraperConfig): ScraperConfig => {
  const caps = scraperCaps;
  assertIntegerInRange("maxStagnantPasses", config.maxStagnantPasses, caps.maxStagnantPasses.min, caps.maxStagnantPasses.max);
  assertIntegerInRange("maxBackoffRetries", config.maxBackoffRetries, caps.maxBackoffRetries.min, caps.maxBackoffRetries.max);
  assertIntegerInRange("backoffBaseMs", config.backoffBaseMs, caps.backoffBaseMs.min, caps.backoffBaseMs.max);
  assertIntegerInRange("backoffMaxMs", config.backoffMaxMs, caps.backoffMaxMs.min, caps.backoffMaxMs.max);
  assertIntegerInRange("passTimeoutMs", config.passTimeoutMs, caps.passTimeoutMs.min, caps.passTimeoutMs.max);
  assertIntegerInRange("placeTimeoutMs", config.placeTimeoutMs, caps.placeTimeoutMs.min, caps.placeTimeoutMs.max);
  assertIntegerInRange("placeDelayMs", config.placeDelayMs, caps.placeDelayMs.min, caps.placeDelayMs.max);
  if (config.backoffBaseMs > config.backoffMaxMs) {
    throw new Error(`backoffBaseMs=${config.backoffBaseMs} must not exceed backoffMaxMs=${config.backoffMaxMs}`);
  }
  if (!Number.isFinite(config.backoffJitterRatio) || config.backoffJitterRatio < 0 || config.backoffJitterRatio > 1) {
    throw new Error(`backoffJitterRatio=${String(config.backoffJitterRatio)} is out of allowed range [0..1]`);
  }
  return config;
};

export const resolveScraperConfig = (input: ScraperConfigInput = {}): ScraperConfig =>
  validateScraperConfig({
    ...defaultScraperConfig,
    ...input
  });
