/**
 * Cursor Chain Adapter
 *
 * Reads Trade events from a Sui Move package page by page. The cursor
 * token (JSON `{txDigest, eventSeq}`) is the authoritative resume point;
 * the checkpoint position only carries a numeric surrogate of it.
 *
 * @module packages/adapters/chain/CursorChainAdapter
 */

import { z } from 'zod';
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
import {
  cursorSurrogate,
  parseCursorToken,
  serializeCursor,
  type EventCursor,
} from './event-cursor.js';
import type { RawTradeEvent, SuiTradeSource } from './SuiTradeSource.js';
import { verifySuiPersonalMessage } from './sui-signature.js';

export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Fields of the Move `Trade` event used by the ledger
 */
const tradePayloadSchema = z.object({
  trader: z.string().min(1),
  subject: z.string().min(1),
  is_buy: z.boolean(),
  amount: z.union([
    z.string().regex(/^\d+$/),
    z.number().int().nonnegative(),
  ]).transform((value) => BigInt(value)),
});

export interface CursorAdapterConfig {
  name: ChainType;
  startCursor?: string;
  pageLimit?: number;
}

export class CursorChainAdapter implements IChainAdapter {
  readonly family = 'cursor' as const;
  readonly name: ChainType;

  private readonly source: SuiTradeSource;
  private readonly startCursor: string | null;
  private readonly pageLimit: number;
  private readonly log: Logger;

  constructor(config: CursorAdapterConfig, deps: { source: SuiTradeSource; logger: Logger }) {
    this.name = config.name;
    this.source = deps.source;
    this.startCursor = config.startCursor ?? null;
    this.pageLimit = config.pageLimit ?? DEFAULT_PAGE_LIMIT;
    this.log = deps.logger.child({ component: 'CursorChainAdapter', chain: config.name });
  }

  initialCheckpoint(): Checkpoint {
    const parsed = parseCursorToken(this.startCursor);
    if (parsed.kind === 'none') {
      return { position: 0n, cursorToken: null };
    }
    return { position: cursorSurrogate(parsed.cursor), cursorToken: this.startCursor };
  }

  async checkConnectivity(): Promise<void> {
    try {
      const checkpoint = await this.source.getLatestCheckpoint();
      this.log.info({ checkpoint }, 'RPC reachable');
    } catch (error) {
      throw new ChainQueryError(`RPC unreachable: ${errorMessage(error)}`, this.name);
    }
  }

  async fetchBatch(checkpoint: Checkpoint, signal?: AbortSignal): Promise<FetchResult> {
    signal?.throwIfAborted();

    const parsed = parseCursorToken(checkpoint.cursorToken);
    if (parsed.kind === 'placeholder') {
      this.log.warn(
        { token: parsed.raw, fallback: parsed.cursor },
        'Unrecognized cursor token; resuming from placeholder cursor'
      );
    }
    const cursor = parsed.kind === 'none' ? null : parsed.cursor;

    const page = await this.source.queryTradeEvents(cursor, this.pageLimit, signal);

    const next = page.nextCursor ?? cursor;
    if ((page.data.length === 0 && !page.hasNextPage) || next === null) {
      return { kind: 'caught-up', head: cursor ? serializeCursor(cursor) : 'start' };
    }

    const events: TradeEvent[] = [];
    let skipped = 0;
    for (const raw of page.data) {
      const event = this.decode(raw);
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
      next: { position: cursorSurrogate(next), cursorToken: serializeCursor(next) },
      window: { from: cursor ? serializeCursor(cursor) : 'start', to: serializeCursor(next) },
    };
  }

  verifySignature(challenge: string, signature: string): VerificationResult {
    return verifySuiPersonalMessage(challenge, signature);
  }

  async getShareBalance(subject: string, user: string): Promise<bigint> {
    try {
      return await this.source.getSharesBalance(
        normalizeAddress(subject, this.family),
        normalizeAddress(user, this.family)
      );
    } catch (error) {
      if (error instanceof ChainQueryError) throw error;
      throw new ChainQueryError(`Failed to read shares balance: ${errorMessage(error)}`, this.name);
    }
  }

  private decode(raw: RawTradeEvent): TradeEvent | null {
    const payload = tradePayloadSchema.safeParse(raw.parsedJson);
    if (!payload.success) {
      this.log.warn(
        { event: raw.id, issues: payload.error.issues },
        'Skipping undecodable Trade event'
      );
      return null;
    }

    const id: EventCursor = raw.id;
    return {
      chain: this.name,
      eventKey: `${id.txDigest}:${id.eventSeq}`,
      trader: normalizeAddress(payload.data.trader, this.family),
      subject: normalizeAddress(payload.data.subject, this.family),
      isBuy: payload.data.is_buy,
      amount: payload.data.amount,
      source: { txId: id.txDigest, sequence: id.eventSeq },
    };
  }
}
