/**
 * Block-Range Chain Adapter
 *
 * Reads Trade events from an EVM shares contract in bounded block windows
 * via viem. The checkpoint position is the last block of the previous
 * window; the next window starts at that same block, so the boundary
 * block is read twice and the ledger's applied-event keys absorb the
 * repeat.
 *
 * @module packages/adapters/chain/BlockRangeChainAdapter
 */

import {
  createPublicClient,
  http,
  isAddress,
  type Address,
  type Log,
  type PublicClient,
} from 'viem';
import type { Logger } from 'pino';
import type { IChainAdapter } from '../../core/ports/IChainAdapter.js';
import type {
  ChainType,
  Checkpoint,
  FetchResult,
  TradeEvent,
  VerificationResult,
} from '../../../types/index.js';
import { normalizeAddress } from '../../../utils/address.js';
import { ChainQueryError, errorMessage } from '../../../utils/errors.js';
import { SHARES_ABI, TRADE_EVENT } from './trade-abi.js';
import { verifyPersonalSignature } from './evm-signature.js';

/**
 * Default number of blocks past the checkpoint fetched per batch
 */
export const DEFAULT_BATCH_BLOCKS = 100;

export interface BlockRangeAdapterConfig {
  name: ChainType;
  rpcUrl: string;
  contractAddress: Address;
  startBlock: bigint;
  batchBlocks?: number;
  /** Per-request timeout; the sync engine does its own retrying */
  rpcTimeoutMs?: number;
}

interface TradeLogArgs {
  trader?: Address;
  subject?: Address;
  isBuy?: boolean;
  shareAmount?: bigint;
}

type TradeLog = Pick<Log, 'blockNumber' | 'transactionHash' | 'logIndex'> & {
  args: TradeLogArgs;
};

export class BlockRangeChainAdapter implements IChainAdapter {
  readonly family = 'block-range' as const;
  readonly name: ChainType;

  private readonly client: PublicClient;
  private readonly contractAddress: Address;
  private readonly startBlock: bigint;
  private readonly batchBlocks: bigint;
  private readonly log: Logger;

  constructor(config: BlockRangeAdapterConfig, deps: { logger: Logger; client?: PublicClient }) {
    this.name = config.name;
    this.contractAddress = config.contractAddress;
    this.startBlock = config.startBlock;
    this.batchBlocks = BigInt(config.batchBlocks ?? DEFAULT_BATCH_BLOCKS);
    this.log = deps.logger.child({ component: 'BlockRangeChainAdapter', chain: config.name });

    this.client =
      deps.client ??
      createPublicClient({
        transport: http(config.rpcUrl, { timeout: config.rpcTimeoutMs, retryCount: 0 }),
        // The head must be re-read on every poll
        cacheTime: 0,
      });

    this.log.info(
      { contract: this.contractAddress, startBlock: this.startBlock.toString() },
      'Block-range chain adapter initialized'
    );
  }

  initialCheckpoint(): Checkpoint {
    return { position: this.startBlock, cursorToken: null };
  }

  async checkConnectivity(): Promise<void> {
    try {
      const head = await this.client.getBlockNumber();
      this.log.info({ head: head.toString() }, 'RPC reachable');
    } catch (error) {
      throw new ChainQueryError(`RPC unreachable: ${errorMessage(error)}`, this.name);
    }
  }

  async fetchBatch(checkpoint: Checkpoint, signal?: AbortSignal): Promise<FetchResult> {
    signal?.throwIfAborted();
    const head = await this.client.getBlockNumber();

    if (checkpoint.position >= head) {
      return { kind: 'caught-up', head: head.toString() };
    }

    const fromBlock = checkpoint.position;
    const windowEnd = fromBlock + this.batchBlocks;
    const toBlock = windowEnd < head ? windowEnd : head;

    this.log.debug(
      { fromBlock: fromBlock.toString(), toBlock: toBlock.toString() },
      'Fetching Trade logs'
    );

    signal?.throwIfAborted();
    const logs = await this.client.getLogs({
      address: this.contractAddress,
      event: TRADE_EVENT,
      fromBlock,
      toBlock,
    });

    const events: TradeEvent[] = [];
    let skipped = 0;
    for (const log of logs) {
      const event = this.decode(log);
      if (event) {
        events.push(event);
      } else {
        skipped++;
      }
    }

    return {
      kind: 'batch',
      events,
      skipped,
      next: { position: toBlock, cursorToken: null },
      window: { from: fromBlock.toString(), to: toBlock.toString() },
    };
  }

  verifySignature(challenge: string, signature: string): VerificationResult {
    return verifyPersonalSignature(challenge, signature);
  }

  async getShareBalance(subject: string, user: string): Promise<bigint> {
    const subjectAddress = normalizeAddress(subject);
    const userAddress = normalizeAddress(user);

    if (!isAddress(subjectAddress)) {
      throw new ChainQueryError(`Invalid subject address: ${subject}`, this.name);
    }
    if (!isAddress(userAddress)) {
      throw new ChainQueryError(`Invalid user address: ${user}`, this.name);
    }

    try {
      return await this.client.readContract({
        address: this.contractAddress,
        abi: SHARES_ABI,
        functionName: 'sharesBalance',
        args: [subjectAddress, userAddress],
      });
    } catch (error) {
      throw new ChainQueryError(`Failed to call sharesBalance: ${errorMessage(error)}`, this.name);
    }
  }

  private decode(log: TradeLog): TradeEvent | null {
    const { trader, subject, isBuy, shareAmount } = log.args;

    if (
      log.transactionHash === null ||
      log.logIndex === null ||
      trader === undefined ||
      subject === undefined ||
      isBuy === undefined ||
      shareAmount === undefined
    ) {
      this.log.warn(
        { txHash: log.transactionHash, logIndex: log.logIndex },
        'Skipping undecodable Trade log'
      );
      return null;
    }

    return {
      chain: this.name,
      eventKey: `${log.transactionHash}:${log.logIndex}`,
      trader: normalizeAddress(trader),
      subject: normalizeAddress(subject),
      isBuy,
      amount: shareAmount,
      source: {
        txId: log.transactionHash,
        sequence: log.logIndex.toString(),
        blockNumber: log.blockNumber ?? undefined,
      },
    };
  }
}
