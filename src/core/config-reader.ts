/**
 * Chain configuration from the environment
 *
 * COLLECTIONS_CHAIN_ID           chain id used for EIP-712 domains (default 1337)
 * COLLECTIONS_GENESIS_TIMESTAMP  initial block time in unix seconds (default: now)
 * COLLECTIONS_LOG_LEVEL          debug | info | warn | error
 */

import type { ChainConfig } from '../models/interfaces.js';
import { DEFAULTS } from '../utils/constants.js';
import { configureLogger, isLogLevel } from '../utils/logger.js';
import { Chain } from './chain.js';
import { CollectionError, CollectionErrorCode } from './errors.js';

export type Environment = Record<string, string | undefined>;

function readInteger(env: Environment, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new CollectionError(CollectionErrorCode.INVALID_CONFIG, 'readChainConfig', `${name} must be a non-negative integer`);
  }
  return value;
}

/**
 * Read the chain configuration and apply the log level
 * @throws CollectionError INVALID_CONFIG on malformed values
 */
export function readChainConfig(env: Environment = process.env): Required<ChainConfig> {
  const logLevel = env.COLLECTIONS_LOG_LEVEL;
  if (logLevel !== undefined && logLevel !== '') {
    if (!isLogLevel(logLevel)) {
      throw new CollectionError(
        CollectionErrorCode.INVALID_CONFIG,
        'readChainConfig',
        `COLLECTIONS_LOG_LEVEL must be one of debug, info, warn, error`
      );
    }
    configureLogger({ level: logLevel });
  }

  return {
    chainId: readInteger(env, 'COLLECTIONS_CHAIN_ID') ?? DEFAULTS.CHAIN_ID,
    timestamp: readInteger(env, 'COLLECTIONS_GENESIS_TIMESTAMP') ?? Math.floor(Date.now() / 1000),
  };
}

/**
 * New chain configured from the environment
 */
export function createChainFromEnv(env: Environment = process.env): Chain {
  return new Chain(readChainConfig(env));
}
