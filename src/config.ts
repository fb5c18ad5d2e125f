import { DEFAULT_DB_FILE } from './store/sqliteStore.js';

export interface RawOptions {
  db?: string;
  generator?: string;
  batchSize?: string;
  poolTarget?: string;
  lowWaterMark?: string;
  region?: string;
  language?: string;
}

export interface AppConfig {
  databasePath: string;
  generatorPath: string | undefined;
  batchSize: number;
  poolTarget: number;
  lowWaterMark: number;
  region: number;
  language: string;
}

type Env = Record<string, string | undefined>;

export function resolveConfig(raw: RawOptions, env: Env = process.env): AppConfig {
  const batchSize = parsePositiveInteger(raw.batchSize ?? env.PARAM_BATCH_SIZE, 2, 'batch-size');
  const poolTarget = parsePositiveInteger(raw.poolTarget ?? env.PARAM_POOL_TARGET, 100, 'pool-target');
  const lowWaterMark = parseNonNegativeInteger(raw.lowWaterMark ?? env.PARAM_LOW_WATER_MARK, 20, 'low-water-mark');
  if (lowWaterMark > poolTarget) {
    throw new Error('Option --low-water-mark must not exceed --pool-target.');
  }

  return {
    databasePath: nonEmpty(raw.db) ?? nonEmpty(env.PARAM_POOL_DB) ?? DEFAULT_DB_FILE,
    generatorPath: nonEmpty(raw.generator) ?? nonEmpty(env.PARAM_GENERATOR_PATH),
    batchSize,
    poolTarget,
    lowWaterMark,
    region: parsePositiveInteger(raw.region ?? env.CAMP_REGION, 608, 'region'),
    language: nonEmpty(raw.language) ?? nonEmpty(env.CAMP_LANGUAGE) ?? 'en',
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}
