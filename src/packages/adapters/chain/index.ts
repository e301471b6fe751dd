/**
 * Chain adapters
 *
 * @module packages/adapters/chain
 */

import type { Logger } from 'pino';
import type { Config } from '../../../config.js';
import type { IChainAdapter } from '../../core/ports/IChainAdapter.js';
import { BlockRangeChainAdapter } from './BlockRangeChainAdapter.js';
import { CursorChainAdapter } from './CursorChainAdapter.js';
import { SuiClientTradeSource } from './SuiTradeSource.js';
import { ConfigError } from '../../../utils/errors.js';

export { BlockRangeChainAdapter, DEFAULT_BATCH_BLOCKS } from './BlockRangeChainAdapter.js';
export { CursorChainAdapter, DEFAULT_PAGE_LIMIT } from './CursorChainAdapter.js';
export { SuiClientTradeSource } from './SuiTradeSource.js';
export type { SuiTradeSource, TradeEventPage, RawTradeEvent } from './SuiTradeSource.js';
export { verifyPersonalSignature } from './evm-signature.js';
export { verifySuiPersonalMessage } from './sui-signature.js';

/**
 * Build one adapter per configured chain, keyed by chain name
 */
export function createChainAdapters(config: Config, logger: Logger): Map<string, IChainAdapter> {
  const adapters = new Map<string, IChainAdapter>();

  adapters.set(
    config.evm.name,
    new BlockRangeChainAdapter(
      {
        name: config.evm.name,
        rpcUrl: config.evm.rpcUrl,
        contractAddress: config.evm.sharesContract,
        startBlock: config.evm.startBlock,
        batchBlocks: config.evm.batchBlocks,
        rpcTimeoutMs: config.sync.rpcTimeoutMs,
      },
      { logger }
    )
  );

  if (config.sui) {
    if (adapters.has(config.sui.name)) {
      throw new ConfigError(`Duplicate chain name: ${config.sui.name}`);
    }
    const source = new SuiClientTradeSource({
      rpcUrl: config.sui.rpcUrl,
      packageId: config.sui.packageId,
      sharesObjectId: config.sui.sharesObjectId,
      rpcTimeoutMs: config.sync.rpcTimeoutMs,
    });
    adapters.set(
      config.sui.name,
      new CursorChainAdapter(
        {
          name: config.sui.name,
          startCursor: config.sui.startCursor,
          pageLimit: config.sui.pageLimit,
        },
        { source, logger }
      )
    );
  }

  return adapters;
}
