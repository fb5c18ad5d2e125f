#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { ResponseCache } from './cache/responseCache.js';
import { CampApiClient } from './clients/campApi.js';
import { resolveConfig, type AppConfig, type RawOptions } from './config.js';
import { resolveExecutable } from './generator/executable.js';
import { GeneratorProcess } from './generator/generatorProcess.js';
import { CredentialPool } from './pool/credentialPool.js';
import { SqliteStore } from './store/sqliteStore.js';
import type { HttpMethod } from './types/index.js';

dotenv.config();

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

const program = new Command();
program
  .name('camp-param-pool')
  .description('Call the camp API with pooled generator credentials and a persistent response cache.');

const poolCommand = program.command('pool').description('Inspect and replenish the credential pool.');

configureCommonOptions(poolCommand.command('status').description('Show how many credentials are usable.')).action(
  async (rawOptions: RawOptions) => {
    await handlePoolStatus(rawOptions);
  },
);

configureCommonOptions(poolCommand.command('warm').description('Fill the pool up to its target size.')).action(
  async (rawOptions: RawOptions) => {
    await handlePoolWarm(rawOptions);
  },
);

configureCommonOptions(program.command('param').description('Allocate one credential and print the request headers.')).action(
  async (rawOptions: RawOptions) => {
    await handleParam(rawOptions);
  },
);

interface RequestCommandOptions extends RawOptions {
  method: string;
  data?: string;
  cache: boolean;
}

configureCommonOptions(
  program
    .command('request')
    .description('Send one request to the camp API and print the JSON response.')
    .argument('<endpoint>', 'Endpoint path, e.g. /api/herowiki/getallherobriefinfo'),
)
  .option('-m, --method <method>', 'HTTP method.', 'POST')
  .option('-d, --data <json>', 'JSON payload to send.')
  .option('--no-cache', 'Bypass the response cache.')
  .action(async (endpoint: string, rawOptions: RequestCommandOptions) => {
    await handleRequest(endpoint, rawOptions);
  });

const cacheCommand = program.command('cache').description('Maintain the response cache.');

configureCommonOptions(cacheCommand.command('prune').description('Delete expired cache entries.')).action(
  async (rawOptions: RawOptions) => {
    await handleCachePrune(rawOptions);
  },
);

await program.parseAsync();

function configureCommonOptions(command: Command): Command {
  return command
    .option('--db <path>', 'SQLite file holding the cache and the pool (env PARAM_POOL_DB).')
    .option('--generator <path>', 'Credential generator executable (env PARAM_GENERATOR_PATH).')
    .option('--batch-size <number>', 'Cluster size requested per generator call (default 2).')
    .option('--pool-target <number>', 'Fresh credentials to keep in the pool (default 100).')
    .option('--low-water-mark <number>', 'Refill in the background below this many (default 20).')
    .option('--region <number>', 'Camp region header (default 608).')
    .option('--language <code>', 'Camp language header (default en).');
}

async function handlePoolStatus(rawOptions: RawOptions) {
  const config = resolveConfig(rawOptions);
  const store = new SqliteStore({ filename: config.databasePath });
  try {
    const stats = await store.poolStats();
    console.log(`Pool at ${config.databasePath}:`);
    console.log(`  total:        ${stats.total}`);
    console.log(`  available:    ${stats.available} (target ${config.poolTarget}, refill below ${config.lowWaterMark})`);
    console.log(`  cooling down: ${stats.coolingDown}`);
    console.log(`  reusable:     ${stats.reusable}`);
  } finally {
    store.close();
  }
}

async function handlePoolWarm(rawOptions: RawOptions) {
  const config = resolveConfig(rawOptions);
  const store = new SqliteStore({ filename: config.databasePath });
  try {
    const pool = await createPool(config, store);
    try {
      await pool.warmUp();
      console.log(`Pool holds ${await store.countAvailable()} fresh credentials.`);
    } finally {
      await pool.close();
    }
  } finally {
    store.close();
  }
}

async function handleParam(rawOptions: RawOptions) {
  const config = resolveConfig(rawOptions);
  const store = new SqliteStore({ filename: config.databasePath });
  try {
    const client = await createClient(config, store);
    try {
      console.log(JSON.stringify(await client.credentialHeaders(), null, 2));
    } finally {
      await client.close();
    }
  } finally {
    store.close();
  }
}

async function handleRequest(endpoint: string, rawOptions: RequestCommandOptions) {
  const config = resolveConfig(rawOptions);
  const method = parseMethod(rawOptions.method);
  const payload = parsePayload(rawOptions.data);
  const store = new SqliteStore({ filename: config.databasePath });
  try {
    const client = await createClient(config, store);
    try {
      const response = await client.request(method, endpoint, payload, { useCache: rawOptions.cache });
      console.log(JSON.stringify(response, null, 2));
    } finally {
      await client.close();
    }
  } finally {
    store.close();
  }
}

async function handleCachePrune(rawOptions: RawOptions) {
  const config = resolveConfig(rawOptions);
  const store = new SqliteStore({ filename: config.databasePath });
  try {
    const removed = await store.pruneCache();
    console.log(`Removed ${removed} expired cache entries.`);
  } finally {
    store.close();
  }
}

async function createPool(config: AppConfig, store: SqliteStore): Promise<CredentialPool> {
  const executablePath = await resolveExecutable(config.generatorPath);
  const generator = new GeneratorProcess({
    executablePath,
    batchSize: config.batchSize,
    logger: createLogger('generator'),
  });
  return new CredentialPool(store, generator, {
    batchSize: config.batchSize,
    poolTarget: config.poolTarget,
    lowWaterMark: config.lowWaterMark,
    logger: createLogger('pool'),
  });
}

async function createClient(config: AppConfig, store: SqliteStore): Promise<CampApiClient> {
  return new CampApiClient({
    credentials: await createPool(config, store),
    cache: new ResponseCache(store),
    region: config.region,
    language: config.language,
    logger: createLogger('camp-api'),
  });
}

function createLogger(scope: string) {
  return (message: string) => console.error(`[${scope}] ${message}`);
}

function parseMethod(value: string): HttpMethod {
  const upper = value.trim().toUpperCase();
  const method = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!method) {
    throw new Error(`Option --method must be one of ${HTTP_METHODS.join(', ')}.`);
  }
  return method;
}

function parsePayload(data: string | undefined): unknown {
  if (data === undefined) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(data);
    return parsed;
  } catch (error) {
    throw new Error('Option --data must be valid JSON.', { cause: error });
  }
}
