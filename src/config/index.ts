// src/config/index.ts
/**
 * .env-first configuration loader validated with zod.
 * - Precedence: process environment, then .env (skipped under tests), then defaults.
 * - Cached after the first successful load; resetConfig() clears the cache for tests
 *   that mutate process.env.
 */

import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { componentLogger } from '../modules/logger';

const logger = componentLogger('config');

export type Chain = 'eth' | 'bsc';

export interface Config {
  LOG_LEVEL: string;
  CHAIN: Chain;
  UNISWAP_PROVIDER: string;
  METRICS_PREFIX: string;
  SIM_CALLER_COUNT: number;
}

const schema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .optional()
    .default('info'),
  CHAIN: z
    .string()
    .optional()
    .transform((v) => (v ?? 'eth').trim().toLowerCase())
    .pipe(z.enum(['eth', 'bsc'])),
  UNISWAP_PROVIDER: z
    .string()
    .optional()
    .transform((v) => (v ?? 'uniswapv2').trim().toLowerCase())
    .refine((v) => v.length > 0, 'UNISWAP_PROVIDER must not be empty'),
  METRICS_PREFIX: z
    .string()
    .optional()
    .default('swap_router_')
    .refine((v) => /^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(v), 'METRICS_PREFIX must be a valid metric name prefix'),
  SIM_CALLER_COUNT: z.coerce.number().int().min(1).max(64).optional().default(3),
});

function isTestRun(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.MOCHA === 'true' ||
    process.argv.some((arg) => arg.includes('mocha'))
  );
}

function blankToUndefined(raw: string | undefined): string | undefined {
  return raw === undefined || raw.trim() === '' ? undefined : raw;
}

let cached: Config | null = null;

export function resetConfig(): void {
  cached = null;
}

export function loadConfig(): Config {
  if (cached) return cached;

  // Tests drive configuration through process.env directly
  if (!isTestRun() && fs.existsSync('.env')) {
    dotenv.config({ override: false });
  }

  const parsed = schema.safeParse({
    LOG_LEVEL: blankToUndefined(process.env.LOG_LEVEL),
    CHAIN: blankToUndefined(process.env.CHAIN),
    UNISWAP_PROVIDER: blankToUndefined(process.env.UNISWAP_PROVIDER),
    METRICS_PREFIX: blankToUndefined(process.env.METRICS_PREFIX),
    SIM_CALLER_COUNT: blankToUndefined(process.env.SIM_CALLER_COUNT),
  });

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      logger.error({ key: issue.path.join('.') }, `[CONFIG] Validation error: ${issue.message}`);
    }
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Configuration validation failed: ${keys}`);
  }

  cached = { ...parsed.data };
  return cached;
}

/**
 * Summary safe for logs.
 */
export function getConfigSummary() {
  const c = loadConfig();
  return {
    chain: c.CHAIN,
    uniswapProvider: c.UNISWAP_PROVIDER,
    metricsPrefix: c.METRICS_PREFIX,
    simCallerCount: c.SIM_CALLER_COUNT,
    logLevel: c.LOG_LEVEL,
  };
}
