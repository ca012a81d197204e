import { z } from 'zod';
import { SettleTiming } from '../utils/wait';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const envSchema = z.object({
  PORT: positiveInt.default(4000),
  HEADLESS: booleanFromEnv.default('true'),
  LOCALE: z.string().min(2).default('en-US'),
  MAPS_URL: z.string().url().default('https://www.google.com/maps'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  NAVIGATION_TIMEOUT_MS: positiveInt.default(60_000),
  SESSION_TIMEOUT_MS: positiveInt.default(6 * 60 * 60 * 1000),
  SEARCH_TIMEOUT_MS: nonNegativeInt.default(5_000),
  SCROLL_TIMEOUT_MS: nonNegativeInt.default(3_000),
  DETAIL_TIMEOUT_MS: nonNegativeInt.default(5_000),
  POLL_INTERVAL_MS: positiveInt.default(250),
  FALLBACK_DELAY_MS: nonNegativeInt.default(3_000),
  MAX_SCROLL_ITERATIONS: positiveInt.default(200),
});

export interface TimingConfig {
  search: SettleTiming;
  scroll: SettleTiming;
  detail: SettleTiming;
}

export interface AppConfig {
  port: number;
  headless: boolean;
  locale: string;
  mapsUrl: string;
  outputDir: string;
  navigationTimeoutMs: number;
  sessionTimeoutMs: number;
  maxScrollIterations: number;
  timing: TimingConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Blank values fall back to defaults
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  const timing = (timeoutMs: number): SettleTiming => ({
    timeoutMs,
    pollIntervalMs: values.POLL_INTERVAL_MS,
    fallbackDelayMs: values.FALLBACK_DELAY_MS,
  });

  return {
    port: values.PORT,
    headless: values.HEADLESS,
    locale: values.LOCALE,
    mapsUrl: values.MAPS_URL,
    outputDir: values.OUTPUT_DIR,
    navigationTimeoutMs: values.NAVIGATION_TIMEOUT_MS,
    sessionTimeoutMs: values.SESSION_TIMEOUT_MS,
    maxScrollIterations: values.MAX_SCROLL_ITERATIONS,
    timing: {
      search: timing(values.SEARCH_TIMEOUT_MS),
      scroll: timing(values.SCROLL_TIMEOUT_MS),
      detail: timing(values.DETAIL_TIMEOUT_MS),
    },
  };
}
