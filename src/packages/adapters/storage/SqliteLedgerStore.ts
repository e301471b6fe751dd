/**
 * SQLite Ledger Store
 *
 * Share balances are TEXT columns holding decimal integers; arithmetic
 * happens in bigint on the service side.
 *
 * @module packages/adapters/storage/SqliteLedgerStore
 */

import type Database from 'better-sqlite3';
import type { ILedgerStore, LedgerTransaction } from '../../core/ports/ILedgerStore.js';
import type { ChainType, IdentityMapping, ShareHolding } from '../../../types/index.js';
import { toIdentityMapping, type MappingRow } from './rows.js';

interface BalanceRow {
  share_amount: string;
}

interface HoldingRow {
  subject: string;
  share_amount: string;
}

export class SqliteLedgerStore implements ILedgerStore {
  private readonly unitOfWork: LedgerTransaction;
  private readonly selectBalance: Database.Statement<[string, string, string], BalanceRow>;
  private readonly selectHoldings: Database.Statement<[string, string], HoldingRow>;

  constructor(private readonly db: Database.Database) {
    const selectEvent = db.prepare<[string, string], { found: number }>(
      'SELECT 1 AS found FROM applied_events WHERE chain_type = ? AND event_key = ?'
    );
    const insertEvent = db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO applied_events (chain_type, event_key) VALUES (?, ?)'
    );
    const upsertBalance = db.prepare<[string, string, string, string]>(`
      INSERT INTO trades (trader, subject, chain_type, share_amount)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(trader, subject, chain_type) DO UPDATE SET
        share_amount = excluded.share_amount,
        updated_at = datetime('now')
    `);
    const selectMapping = db.prepare<[string, string], MappingRow>(
      'SELECT address, chain_type, external_identity, gated FROM user_mappings WHERE address = ? AND chain_type = ?'
    );
    const updateGated = db.prepare<[number, string, string]>(
      "UPDATE user_mappings SET gated = ?, updated_at = datetime('now') WHERE address = ? AND chain_type = ?"
    );

    this.selectBalance = db.prepare<[string, string, string], BalanceRow>(
      'SELECT share_amount FROM trades WHERE trader = ? AND subject = ? AND chain_type = ?'
    );
    this.selectHoldings = db.prepare<[string, string], HoldingRow>(
      'SELECT subject, share_amount FROM trades WHERE trader = ? AND chain_type = ? ORDER BY subject'
    );

    this.unitOfWork = {
      hasAppliedEvent: (chain, eventKey) => selectEvent.get(chain, eventKey) !== undefined,
      recordAppliedEvent: (chain, eventKey) => {
        insertEvent.run(chain, eventKey);
      },
      getBalance: (trader, subject, chain) => this.readBalance(trader, subject, chain),
      setBalance: (trader, subject, chain, amount) => {
        upsertBalance.run(trader, subject, chain, amount.toString());
      },
      getIdentityMapping: (address, chain): IdentityMapping | null => {
        const row = selectMapping.get(address, chain);
        return row ? toIdentityMapping(row) : null;
      },
      setGated: (address, chain, gated) => {
        updateGated.run(gated ? 1 : 0, address, chain);
      },
    };
  }

  transaction<T>(work: (tx: LedgerTransaction) => T): T {
    return this.db.transaction(() => work(this.unitOfWork))();
  }

  getBalance(trader: string, subject: string, chain: ChainType): bigint {
    return this.readBalance(trader, subject, chain) ?? 0n;
  }

  getHoldings(trader: string, chain: ChainType): ShareHolding[] {
    return this.selectHoldings.all(trader, chain).map((row) => ({
      subject: row.subject,
      amount: BigInt(row.share_amount),
    }));
  }

  private readBalance(trader: string, subject: string, chain: ChainType): bigint | null {
    const row = this.selectBalance.get(trader, subject, chain);
    return row ? BigInt(row.share_amount) : null;
  }
}
