/**
 * Sui trade source
 *
 * The narrow slice of the Sui JSON-RPC API the cursor adapter needs,
 * and its SuiClient implementation.
 *
 * @module packages/adapters/chain/SuiTradeSource
 */

import { bcs } from '@mysten/sui/bcs';
import { SuiClient, SuiHTTPTransport } from '@mysten/sui/client';
import { Transaction } from '@mysten/sui/transactions';
import { normalizeSuiAddress } from '@mysten/sui/utils';
import { ChainQueryError } from '../../../utils/errors.js';
import type { EventCursor } from './event-cursor.js';

export interface RawTradeEvent {
  id: EventCursor;
  parsedJson: unknown;
}

export interface TradeEventPage {
  data: RawTradeEvent[];
  nextCursor: EventCursor | null;
  hasNextPage: boolean;
}

export interface SuiTradeSource {
  /** Events strictly after `cursor`, oldest first */
  queryTradeEvents(
    cursor: EventCursor | null,
    limit: number,
    signal?: AbortSignal
  ): Promise<TradeEventPage>;

  getSharesBalance(subject: string, user: string): Promise<bigint>;

  getLatestCheckpoint(): Promise<string>;
}

export interface SuiClientTradeSourceConfig {
  rpcUrl: string;
  packageId: string;
  sharesObjectId: string;
  rpcTimeoutMs?: number;
}

export class SuiClientTradeSource implements SuiTradeSource {
  private readonly client: SuiClient;
  private readonly eventType: string;
  private readonly balanceTarget: `${string}::${string}::${string}`;
  private readonly sharesObjectId: string;

  constructor(config: SuiClientTradeSourceConfig, client?: SuiClient) {
    const timeoutMs = config.rpcTimeoutMs;
    this.client =
      client ??
      new SuiClient({
        transport: new SuiHTTPTransport({
          url: config.rpcUrl,
          fetch: (input, init) =>
            fetch(input, { ...init, signal: withTimeout(init?.signal, timeoutMs) }),
        }),
      });
    this.eventType = `${config.packageId}::shares_trading::Trade`;
    this.balanceTarget = `${config.packageId}::shares_trading::get_shares_balance`;
    this.sharesObjectId = config.sharesObjectId;
  }

  async queryTradeEvents(
    cursor: EventCursor | null,
    limit: number,
    signal?: AbortSignal
  ): Promise<TradeEventPage> {
    const page = await this.client.queryEvents({
      query: { MoveEventType: this.eventType },
      cursor,
      limit,
      order: 'ascending',
      signal,
    });

    return {
      data: page.data.map((event) => ({ id: event.id, parsedJson: event.parsedJson })),
      nextCursor: page.nextCursor ?? null,
      hasNextPage: page.hasNextPage,
    };
  }

  async getSharesBalance(subject: string, user: string): Promise<bigint> {
    const tx = new Transaction();
    tx.moveCall({
      target: this.balanceTarget,
      arguments: [
        tx.object(this.sharesObjectId),
        tx.pure.address(subject),
        tx.pure.address(user),
      ],
    });

    const result = await this.client.devInspectTransactionBlock({
      sender: normalizeSuiAddress('0x0'),
      transactionBlock: tx,
    });

    if (result.error) {
      throw new ChainQueryError(`get_shares_balance failed: ${result.error}`);
    }

    const returned = result.results?.[0]?.returnValues?.[0];
    if (!returned) {
      throw new ChainQueryError('get_shares_balance returned no value');
    }

    const [bytes] = returned;
    return BigInt(bcs.u64().parse(Uint8Array.from(bytes)));
  }

  async getLatestCheckpoint(): Promise<string> {
    return this.client.getLatestCheckpointSequenceNumber();
  }
}

/**
 * Caller signal and per-request timeout, whichever fires first
 */
function withTimeout(
  signal: AbortSignal | null | undefined,
  timeoutMs: number | undefined
): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (signal) signals.push(signal);
  if (timeoutMs !== undefined) signals.push(AbortSignal.timeout(timeoutMs));
  return signals.length > 0 ? AbortSignal.any(signals) : undefined;
}
