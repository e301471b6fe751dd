import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import { getAddress } from 'viem';
import { logger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';

// Load environment variables from .env.local for development
dotenvConfig({ path: '.env.local' });
dotenvConfig(); // Fallback to .env

/**
 * Zod schema for validating EVM addresses
 */
const addressSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{40}$/, 'Invalid EVM address')
  .transform((value) => getAddress(value));

/**
 * Sui object and package ids: 0x followed by up to 64 hex digits
 */
const suiIdSchema = z
  .string()
  .regex(/^0x[a-fA-F0-9]{1,64}$/, 'Invalid Sui object id')
  .transform((value) => value.toLowerCase());

const blockNumberSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer')
  .transform((value) => BigInt(value));

const intervalSchema = (fallback: number) =>
  z.coerce.number().int().min(0).default(fallback);

/**
 * Configuration schema with Zod validation
 */
const configSchema = z.object({
  // Block-range (EVM) chain
  evm: z.object({
    name: z.string().min(1).default('monad'),
    rpcUrl: z.string().url(),
    sharesContract: addressSchema,
    startBlock: blockNumberSchema,
    batchBlocks: z.coerce.number().int().min(1).max(10000).default(100),
  }),

  // Cursor (Sui) chain, only present when SUI_RPC is set
  sui: z
    .object({
      name: z.string().min(1).default('sui'),
      rpcUrl: z.string().url(),
      packageId: suiIdSchema,
      sharesObjectId: suiIdSchema,
      startCursor: z.string().min(1).optional(),
      pageLimit: z.coerce.number().int().min(1).max(1000).default(100),
    })
    .optional(),

  // Chain used when a verification request omits chain_type
  defaultChain: z.string().min(1).optional(),

  sync: z.object({
    idleIntervalMs: intervalSchema(60_000),
    retryIntervalMs: intervalSchema(10_000),
    pacingIntervalMs: intervalSchema(1_000),
    rpcTimeoutMs: z.coerce.number().int().min(100).default(15_000),
    workerRestartDelayMs: intervalSchema(10_000),
  }),

  // API Configuration
  api: z.object({
    port: z.coerce.number().int().min(1).max(65535).default(8088),
    host: z.string().default('0.0.0.0'),
  }),

  // Database Configuration
  database: z.object({
    path: z.string().min(1).default('./data/gatekeeper.db'),
  }),

  // Logging Configuration
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  }),
});

export type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/**
 * Parse and validate configuration from environment variables.
 *
 * Throws ConfigError listing every invalid or missing setting.
 */
export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    evm: {
      name: env.EVM_CHAIN_NAME,
      rpcUrl: env.CHAIN_RPC ?? '',
      sharesContract: env.SHARES_CONTRACT_ADDRESS ?? '',
      startBlock: env.START_BLOCK ?? '',
      batchBlocks: env.EVM_BATCH_BLOCKS,
    },
    sui: env.SUI_RPC
      ? {
          name: env.SUI_CHAIN_NAME,
          rpcUrl: env.SUI_RPC,
          packageId: env.SUI_CONTRACT ?? '',
          sharesObjectId: env.SUI_SHARES_TRADING_OBJECT_ID ?? '',
          startCursor: env.SUI_START_CURSOR,
          pageLimit: env.SUI_PAGE_LIMIT,
        }
      : undefined,
    defaultChain: env.DEFAULT_CHAIN_TYPE,
    sync: {
      idleIntervalMs: env.SYNC_IDLE_INTERVAL_MS,
      retryIntervalMs: env.SYNC_RETRY_INTERVAL_MS,
      pacingIntervalMs: env.SYNC_PACING_INTERVAL_MS,
      rpcTimeoutMs: env.RPC_TIMEOUT_MS,
      workerRestartDelayMs: env.WORKER_RESTART_DELAY_MS,
    },
    api: {
      port: env.API_PORT,
      host: env.API_HOST,
    },
    database: {
      path: env.DATABASE_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
    },
  };

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map(
      (issue) => `  - ${issue.path.join('.')}: ${issue.message}`
    );
    logger.fatal({ errors: result.error.issues }, 'Configuration validation failed');
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return result.data;
}

/**
 * Chain name used when a request does not say which chain it is about
 */
export function defaultChainOf(config: Config): string {
  return config.defaultChain ?? config.evm.name;
}
