/**
 * SQLite Checkpoint Store
 *
 * @module packages/adapters/storage/SqliteCheckpointStore
 */

import type Database from 'better-sqlite3';
import type { ICheckpointStore } from '../../core/ports/ICheckpointStore.js';
import type { ChainType, Checkpoint } from '../../../types/index.js';

interface SyncStatusRow {
  last_position: bigint;
  cursor_metadata: string | null;
}

export class SqliteCheckpointStore implements ICheckpointStore {
  private readonly selectStmt: Database.Statement<[string], SyncStatusRow>;
  private readonly upsertStmt: Database.Statement<[string, bigint, string | null]>;

  constructor(db: Database.Database) {
    this.selectStmt = db
      .prepare<[string], SyncStatusRow>(
        'SELECT last_position, cursor_metadata FROM sync_status WHERE chain_type = ?'
      )
      .safeIntegers(true);

    // MAX() keeps the position monotonic even if a caller regresses
    this.upsertStmt = db.prepare<[string, bigint, string | null]>(`
      INSERT INTO sync_status (chain_type, last_position, cursor_metadata, updated_at)
      VALUES (?, ?, ?, datetime('now'))
      ON CONFLICT(chain_type) DO UPDATE SET
        last_position = MAX(sync_status.last_position, excluded.last_position),
        cursor_metadata = excluded.cursor_metadata,
        updated_at = excluded.updated_at
    `);
  }

  load(chain: ChainType): Checkpoint | null {
    const row = this.selectStmt.get(chain);
    if (!row) return null;
    return { position: row.last_position, cursorToken: row.cursor_metadata };
  }

  save(chain: ChainType, checkpoint: Checkpoint): void {
    this.upsertStmt.run(chain, checkpoint.position, checkpoint.cursorToken);
  }
}
