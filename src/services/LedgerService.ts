/**
 * Ledger Service
 *
 * Folds Trade events into per-(trader, subject, chain) share balances and
 * derives gate/ungate transitions from balance changes.
 *
 * Each trade is applied in a single store transaction guarded by its
 * event key, so replaying a window after a crash or a failed checkpoint
 * write leaves balances unchanged.
 */

import type { Logger } from 'pino';
import type { ILedgerStore, LedgerTransaction } from '../packages/core/ports/ILedgerStore.js';
import type {
  AccessTransition,
  ChainType,
  LedgerApplyResult,
  LedgerTrade,
  ShareHolding,
  TradeEvent,
} from '../types/index.js';
import { normalizeAddress } from '../utils/address.js';
import { ValidationError } from '../utils/errors.js';

export class LedgerService {
  private readonly log: Logger;

  constructor(
    private readonly store: ILedgerStore,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'LedgerService' });
  }

  /**
   * Apply a decoded Trade event
   */
  apply(event: TradeEvent): LedgerApplyResult {
    const trade: LedgerTrade = {
      trader: event.trader,
      subject: event.subject,
      chain: event.chain,
      amount: event.amount,
      eventKey: event.eventKey,
    };
    return event.isBuy ? this.applyBuy(trade) : this.applySell(trade);
  }

  /**
   * Add `amount` to the balance, creating the entry if needed.
   *
   * A buy by a gated holder whose balance is now positive yields an
   * `ungate` transition. The gated flag itself is left set.
   */
  applyBuy(trade: LedgerTrade): LedgerApplyResult {
    const normalized = this.normalize(trade);

    return this.applyOnce(normalized, (tx) => {
      const { trader, subject, chain, amount } = normalized;
      const balance = (tx.getBalance(trader, subject, chain) ?? 0n) + amount;
      tx.setBalance(trader, subject, chain, balance);

      const mapping = tx.getIdentityMapping(trader, chain);
      const transition: AccessTransition | null =
        mapping?.gated && balance > 0n
          ? { kind: 'ungate', trader, subject, chain, identity: mapping.externalIdentity }
          : null;

      return { status: 'applied', balance, transition };
    });
  }

  /**
   * Subtract `amount` from the balance.
   *
   * Reaching exactly zero with an identity mapping present sets the gated
   * flag and yields a `gate` transition. Overselling clamps at zero.
   */
  applySell(trade: LedgerTrade): LedgerApplyResult {
    const normalized = this.normalize(trade);

    return this.applyOnce(normalized, (tx) => {
      const { trader, subject, chain, amount } = normalized;
      const current = tx.getBalance(trader, subject, chain);

      if (current === null) {
        this.log.warn(
          { trader, subject, chain, amount: amount.toString(), eventKey: normalized.eventKey },
          'Sell for a trader with no ledger entry; ignoring'
        );
        return { status: 'missing-entry' };
      }

      let balance = current - amount;
      if (balance < 0n) {
        this.log.warn(
          {
            trader,
            subject,
            chain,
            balance: current.toString(),
            amount: amount.toString(),
          },
          'Sell exceeds recorded balance; clamping to zero'
        );
        balance = 0n;
      }
      tx.setBalance(trader, subject, chain, balance);

      if (balance !== 0n) {
        return { status: 'applied', balance, transition: null };
      }

      const mapping = tx.getIdentityMapping(trader, chain);
      if (!mapping) {
        return { status: 'applied', balance, transition: null };
      }

      tx.setGated(trader, chain, true);
      return {
        status: 'applied',
        balance,
        transition: { kind: 'gate', trader, subject, chain, identity: mapping.externalIdentity },
      };
    });
  }

  getBalance(trader: string, subject: string, chain: ChainType): bigint {
    return this.store.getBalance(normalizeAddress(trader), normalizeAddress(subject), chain);
  }

  getHoldings(trader: string, chain: ChainType): ShareHolding[] {
    return this.store.getHoldings(normalizeAddress(trader), chain);
  }

  private applyOnce(
    trade: LedgerTrade,
    mutate: (tx: LedgerTransaction) => LedgerApplyResult
  ): LedgerApplyResult {
    return this.store.transaction((tx) => {
      if (tx.hasAppliedEvent(trade.chain, trade.eventKey)) {
        this.log.debug({ chain: trade.chain, eventKey: trade.eventKey }, 'Event already applied');
        return { status: 'duplicate' };
      }

      const result = mutate(tx);
      tx.recordAppliedEvent(trade.chain, trade.eventKey);
      return result;
    });
  }

  private normalize(trade: LedgerTrade): LedgerTrade {
    if (trade.amount < 0n) {
      throw new ValidationError(`Negative share amount in ${trade.eventKey}`, 'amount');
    }
    return {
      ...trade,
      trader: normalizeAddress(trade.trader),
      subject: normalizeAddress(trade.subject),
    };
  }
}
