/**
 * SQLite Identity Store
 *
 * @module packages/adapters/storage/SqliteIdentityStore
 */

import type Database from 'better-sqlite3';
import type { IIdentityStore } from '../../core/ports/IIdentityStore.js';
import type { ChainType, IdentityMapping } from '../../../types/index.js';
import { DatabaseError } from '../../../utils/errors.js';
import { toIdentityMapping, type MappingRow } from './rows.js';

export class SqliteIdentityStore implements IIdentityStore {
  private readonly upsertStmt: Database.Statement<[string, string, string]>;
  private readonly selectStmt: Database.Statement<[string, string], MappingRow>;

  constructor(db: Database.Database) {
    this.upsertStmt = db.prepare<[string, string, string]>(`
      INSERT INTO user_mappings (address, chain_type, external_identity)
      VALUES (?, ?, ?)
      ON CONFLICT(address, chain_type) DO UPDATE SET
        external_identity = excluded.external_identity,
        updated_at = datetime('now')
    `);
    this.selectStmt = db.prepare<[string, string], MappingRow>(
      'SELECT address, chain_type, external_identity, gated FROM user_mappings WHERE address = ? AND chain_type = ?'
    );
  }

  upsert(address: string, chain: ChainType, externalIdentity: string): IdentityMapping {
    this.upsertStmt.run(address, chain, externalIdentity);
    const mapping = this.find(address, chain);
    if (!mapping) {
      throw new DatabaseError(`Identity mapping missing after upsert: ${address} on ${chain}`);
    }
    return mapping;
  }

  find(address: string, chain: ChainType): IdentityMapping | null {
    const row = this.selectStmt.get(address, chain);
    return row ? toIdentityMapping(row) : null;
  }
}
