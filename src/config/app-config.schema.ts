import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

const booleanSchema = z
  .union([z.boolean(), z.string()])
  .transform((value: string | boolean): boolean => {
    if (typeof value === 'boolean') {
      return value;
    }

    const normalizedValue: string = value.trim().toLowerCase();

    return normalizedValue === 'true' || normalizedValue === '1' || normalizedValue === 'yes';
  });

const FALLBACK_APP_VERSION = '0.0.0';

const resolvePackageVersion = (): string => {
  try {
    const packageJsonPath: string = resolve(process.cwd(), 'package.json');
    const packageJsonRaw: string = readFileSync(packageJsonPath, 'utf8');
    const packageJsonParsed: unknown = JSON.parse(packageJsonRaw);

    if (
      typeof packageJsonParsed === 'object' &&
      packageJsonParsed !== null &&
      'version' in packageJsonParsed
    ) {
      const versionValue: unknown = packageJsonParsed.version;

      if (typeof versionValue === 'string' && versionValue.trim().length > 0) {
        return versionValue.trim();
      }
    }
  } catch {
    // Missing or unreadable package.json outside the project root.
    return FALLBACK_APP_VERSION;
  }

  return FALLBACK_APP_VERSION;
};

const DEFAULT_APP_VERSION: string = resolvePackageVersion();
const DEFAULT_PORT = 3000;
const DEFAULT_PRICE_PROVIDER_TIMEOUT_MS = 8000;
const DEFAULT_PRICE_PROVIDER_RETRY_ATTEMPTS = 2;
const DEFAULT_PRICES_CACHE_LIFETIME_SEC = 3600;
const DEFAULT_DAY_CHART_HISTORY_CACHE_LIFETIME_SEC = 3600;
const DEFAULT_PRICES_PAGE_SIZE = 250;
const DEFAULT_PRICES_MAX_PAGES = 50;
const MAX_PRICES_PAGE_SIZE = 250;
const DEFAULT_RATE_LIMIT_PRICE_PROVIDER_MIN_TIME_MS = 1500;
const DEFAULT_RATE_LIMIT_PRICE_PROVIDER_MAX_CONCURRENT = 1;
const DEFAULT_RATE_LIMIT_PRICE_HISTORY_MIN_TIME_MS = 1500;
const DEFAULT_RATE_LIMIT_PRICE_HISTORY_MAX_CONCURRENT = 2;

const optionalNonEmptyStringSchema = z
  .string()
  .trim()
  .optional()
  .transform((value: string | undefined): string | undefined => {
    if (typeof value !== 'string') {
      return undefined;
    }

    return value.length > 0 ? value : undefined;
  });

export const envSchema = z.object({
  APP_VERSION: z.string().trim().min(1).default(DEFAULT_APP_VERSION),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PRICE_PROVIDER_API_BASE_URL: z.url().default('https://api.coingecko.com/api/v3'),
  PRICE_PROVIDER_API_KEY: optionalNonEmptyStringSchema,
  PRICE_PROVIDER_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_PRICE_PROVIDER_TIMEOUT_MS),
  PRICE_PROVIDER_RETRY_ATTEMPTS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_PRICE_PROVIDER_RETRY_ATTEMPTS),
  PRICE_PROVIDER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(0),
  PRICES_CACHE_LIFETIME_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_PRICES_CACHE_LIFETIME_SEC),
  DAY_CHART_HISTORY_CACHE_LIFETIME_SEC: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_DAY_CHART_HISTORY_CACHE_LIFETIME_SEC),
  PRICES_PAGE_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .max(MAX_PRICES_PAGE_SIZE)
    .default(DEFAULT_PRICES_PAGE_SIZE),
  PRICES_MAX_PAGES: z.coerce.number().int().positive().default(DEFAULT_PRICES_MAX_PAGES),
  METRICS_ENABLED: booleanSchema.default(true),
  RATE_LIMIT_PRICE_PROVIDER_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_PRICE_PROVIDER_MIN_TIME_MS),
  RATE_LIMIT_PRICE_PROVIDER_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_PRICE_PROVIDER_MAX_CONCURRENT),
  RATE_LIMIT_PRICE_HISTORY_MIN_TIME_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_RATE_LIMIT_PRICE_HISTORY_MIN_TIME_MS),
  RATE_LIMIT_PRICE_HISTORY_MAX_CONCURRENT: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_RATE_LIMIT_PRICE_HISTORY_MAX_CONCURRENT),
});

export type ParsedEnv = z.infer<typeof envSchema>;
