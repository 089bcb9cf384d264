/**
 * Configuration loading and management
 *
 * Loads env from ~/.sneaker-arb/.env (then CWD .env) and settings from
 * ~/.sneaker-arb/config.json, merged over defaults and validated with zod.
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors';
import { parseMoney } from './money';
import type { Cents } from './money';
import { DEFAULT_FEE_SCHEDULES, mergeFeeSchedules } from '../arbitrage/fees';
import type { FeeSchedule } from '../arbitrage/types';
import type { SourceConfig } from '../sources/types';

type Env = Record<string, string | undefined>;

export function loadEnvFiles(env: Env = process.env): void {
  // ~/.sneaker-arb/.env first, CWD .env as fallback (won't override existing vars)
  dotenvConfig({ path: join(resolveStateDir(env), '.env') });
  dotenvConfig();
}

function resolveUserPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith('~')) {
    return resolve(trimmed.replace(/^~(?=$|[\\/])/, homedir()));
  }
  return resolve(trimmed);
}

export function resolveStateDir(env: Env = process.env): string {
  const override = env.SNEAKER_ARB_STATE_DIR?.trim();
  if (override) return resolveUserPath(override);
  return join(homedir(), '.sneaker-arb');
}

export function resolveConfigPath(env: Env = process.env): string {
  const override = env.SNEAKER_ARB_CONFIG?.trim();
  if (override) return resolveUserPath(override);
  return join(resolveStateDir(env), 'config.json');
}

// =============================================================================
// Schema
// =============================================================================

const moneySchema = z
  .union([z.number(), z.string()])
  .transform((value, ctx): Cents => {
    const cents = parseMoney(value);
    if (cents === null || cents < 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid amount: ${String(value)}` });
      return z.NEVER;
    }
    return cents;
  });

const booleanSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0', 'yes', 'no']).transform((value) => ['true', '1', 'yes'].includes(value)),
]);

const feeScheduleSchema = z.object({
  // Fees are computed in whole basis points
  ratePct: z.number().min(0).max(100).multipleOf(0.01),
  flatFee: moneySchema.default(0),
});

const idSchema = z.string().regex(/^[a-z0-9][a-z0-9_-]*$/i, 'ids are letters, digits, "-" and "_"');

const sourceSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('http'),
    id: idSchema,
    name: z.string().min(1),
    searchUrl: z.string().url(),
    styleCodeUrl: z.string().url().optional(),
    apiKeyEnv: z.string().min(1).optional(),
    apiKeyHeader: z.string().min(1).optional(),
    timeoutMs: z.number().int().positive().optional(),
  }),
  z.object({
    kind: z.literal('file'),
    id: idSchema,
    name: z.string().min(1),
    path: z.string().min(1).transform(resolveUserPath),
  }),
  z.object({
    kind: z.literal('demo'),
    id: idSchema,
    name: z.string().min(1),
  }),
]);

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  arbitrage: z.object({
    minNetProfit: moneySchema.default(0),
    minGrossSpread: moneySchema.default(0),
    assumeNoFee: booleanSchema.default(false),
    includeUsed: booleanSchema.default(false),
    sourceTimeoutMs: z.number().int().nonnegative().default(20_000),
  }).default({}),
  fees: z.record(feeScheduleSchema).default({}),
  sources: z.array(sourceSchema).superRefine((sources, ctx) => {
    const seen = new Set<string>();
    sources.forEach((source, index) => {
      const id = source.id.toLowerCase();
      if (seen.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate source id "${source.id}"`, path: [index, 'id'] });
      }
      seen.add(id);
    });
  }).default([]),
});

export interface Config {
  logLevel: string;
  arbitrage: {
    minNetProfit: Cents;
    minGrossSpread: Cents;
    assumeNoFee: boolean;
    includeUsed: boolean;
    sourceTimeoutMs: number;
  };
  /** Effective fee table: defaults overlaid with configured entries */
  fees: Record<string, FeeSchedule>;
  sources: SourceConfig[];
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Substitute environment variables in config values.
 * Supports ${VAR_NAME} syntax.
 */
function substituteEnvVars(obj: unknown, env: Env): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? '');
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. Protects against prototype pollution.
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const DANGEROUS_KEYS = new Set(['__proto__', 'constructor', 'prototype']);
  const result: Record<string, unknown> = { ...target };
  for (const [key, sourceValue] of Object.entries(source)) {
    if (DANGEROUS_KEYS.has(key)) continue;
    const targetValue = target[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

/** Env overrides, shaped like the config file */
function envOverrides(env: Env): Record<string, unknown> {
  const arbitrage: Record<string, unknown> = {};
  if (env.MIN_NET_PROFIT) arbitrage.minNetProfit = env.MIN_NET_PROFIT;
  if (env.MIN_GROSS_SPREAD) arbitrage.minGrossSpread = env.MIN_GROSS_SPREAD;
  if (env.ASSUME_NO_FEE) arbitrage.assumeNoFee = env.ASSUME_NO_FEE.toLowerCase();

  const overrides: Record<string, unknown> = {};
  if (env.LOG_LEVEL) overrides.logLevel = env.LOG_LEVEL;
  if (Object.keys(arbitrage).length > 0) overrides.arbitrage = arbitrage;
  return overrides;
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse config file ${configPath}`, [errorMessage(err)]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Parse an already-merged config object.
 */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  const data = result.data;
  return {
    logLevel: data.logLevel,
    arbitrage: data.arbitrage,
    fees: mergeFeeSchedules(DEFAULT_FEE_SCHEDULES, data.fees),
    sources: data.sources,
  };
}

/**
 * Load configuration from file and environment.
 * File values override defaults; env overrides file.
 */
export function loadConfig(customPath?: string, env: Env = process.env): Config {
  const configPath = customPath ? resolveUserPath(customPath) : resolveConfigPath(env);
  const fileConfig = substituteEnvVars(readConfigFile(configPath), env);
  const merged = deepMerge(isPlainObject(fileConfig) ? fileConfig : {}, envOverrides(env));
  return parseConfig(merged);
}
