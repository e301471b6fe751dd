/**
 * Ledger Store Interface
 *
 * Balances, applied-event keys and the gated flag live behind one
 * transactional unit of work so a trade is applied all-or-nothing.
 *
 * @module packages/core/ports/ILedgerStore
 */

import type { ChainType, IdentityMapping, ShareHolding } from '../../../types/index.js';

/**
 * Operations available inside `ILedgerStore.transaction`
 */
export interface LedgerTransaction {
  hasAppliedEvent(chain: ChainType, eventKey: string): boolean;
  recordAppliedEvent(chain: ChainType, eventKey: string): void;
  /** `null` when no entry exists yet */
  getBalance(trader: string, subject: string, chain: ChainType): bigint | null;
  setBalance(trader: string, subject: string, chain: ChainType, amount: bigint): void;
  getIdentityMapping(address: string, chain: ChainType): IdentityMapping | null;
  setGated(address: string, chain: ChainType, gated: boolean): void;
}

export interface ILedgerStore {
  /**
   * Run `work` atomically. Anything it throws rolls the whole unit back.
   */
  transaction<T>(work: (tx: LedgerTransaction) => T): T;

  /** Stored balance, 0 when no entry exists */
  getBalance(trader: string, subject: string, chain: ChainType): bigint;

  /** Every subject `trader` has an entry for on `chain` */
  getHoldings(trader: string, chain: ChainType): ShareHolding[];
}
