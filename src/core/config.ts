import { z } from 'zod';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { LOG_LEVELS } from './logger.js';

/**
 * Engine configuration, read once from the environment at startup.
 * Invalid values fail fast with the zod issue list.
 */

const BUNDLED_PLAUSIBILITY = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'config', 'plausibility.json');
const DEFAULT_LEDGER = join(homedir(), '.finkpi', 'ledger.db');

const optionalString = z
  .string()
  .optional()
  .transform(v => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3005),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SEC_USER_AGENT: z.string().default('finkpi contact@example.com'),
  SEC_REQUESTS_PER_SECOND: z.coerce.number().positive().default(10),
  FINNHUB_API_KEY: optionalString,
  SEARCH_API_URL: optionalString.pipe(z.string().url().optional()),
  SEARCH_API_KEY: optionalString,
  ADAPTER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ADAPTER_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(250),
  REQUEST_DEADLINE_MS: z.coerce.number().int().positive().default(15000),
  FACT_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  LIVE_FACT_TTL_SECONDS: z.coerce.number().int().positive().default(5 * 60),
  HEALTH_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(3),
  HEALTH_COOLDOWN_MS: z.coerce.number().int().min(0).default(60000),
  LEDGER_PATH: z.string().default(DEFAULT_LEDGER),
  PLAUSIBILITY_PATH: z.string().default(BUNDLED_PLAUSIBILITY),
});

export interface EngineConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  secUserAgent: string;
  secRequestsPerSecond: number;
  finnhubApiKey?: string;
  searchApiUrl?: string;
  searchApiKey?: string;
  adapterTimeoutMs: number;
  adapterMaxRetries: number;
  retryBaseDelayMs: number;
  requestDeadlineMs: number;
  factTtlMs: number;
  liveFactTtlMs: number;
  healthFailureThreshold: number;
  healthCooldownMs: number;
  /** null disables the ledger */
  ledgerPath: string | null;
  plausibilityPath: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  return Object.freeze({
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    secUserAgent: e.SEC_USER_AGENT,
    secRequestsPerSecond: e.SEC_REQUESTS_PER_SECOND,
    finnhubApiKey: e.FINNHUB_API_KEY,
    searchApiUrl: e.SEARCH_API_URL,
    searchApiKey: e.SEARCH_API_KEY,
    adapterTimeoutMs: e.ADAPTER_TIMEOUT_MS,
    adapterMaxRetries: e.ADAPTER_MAX_RETRIES,
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    requestDeadlineMs: e.REQUEST_DEADLINE_MS,
    factTtlMs: e.FACT_TTL_SECONDS * 1000,
    liveFactTtlMs: e.LIVE_FACT_TTL_SECONDS * 1000,
    healthFailureThreshold: e.HEALTH_FAILURE_THRESHOLD,
    healthCooldownMs: e.HEALTH_COOLDOWN_MS,
    ledgerPath: e.LEDGER_PATH === 'off' ? null : e.LEDGER_PATH,
    plausibilityPath: e.PLAUSIBILITY_PATH,
  });
}
