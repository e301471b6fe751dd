/**
 * SQLite Community Registry
 *
 * @module packages/adapters/storage/SqliteCommunityRegistry
 */

import Database from 'better-sqlite3';
import type { ICommunityRegistry, PaginatedResult } from '../../core/ports/ICommunityRegistry.js';
import type { ChainType, Community, NewCommunity } from '../../../types/index.js';
import { ConflictError, DatabaseError } from '../../../utils/errors.js';
import { toCommunity, type CommunityRow } from './rows.js';

const COLUMNS =
  'agent_name, bio, invite_url, bot_token, chat_group_id, subject_address, chain_type, created_at';

export class SqliteCommunityRegistry implements ICommunityRegistry {
  private readonly insertStmt: Database.Statement<
    [string, string | null, string, string, string, string, string]
  >;
  private readonly byNameStmt: Database.Statement<[string], CommunityRow>;
  private readonly byChatStmt: Database.Statement<[string, string], CommunityRow>;
  private readonly bySubjectStmt: Database.Statement<[string, string], CommunityRow>;
  private readonly pageStmt: Database.Statement<[number, number], CommunityRow>;
  private readonly countStmt: Database.Statement<[], { total: number }>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<[string, string | null, string, string, string, string, string]>(`
      INSERT INTO communities
        (agent_name, bio, invite_url, bot_token, chat_group_id, subject_address, chain_type)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);
    this.byNameStmt = db.prepare<[string], CommunityRow>(
      `SELECT ${COLUMNS} FROM communities WHERE agent_name = ?`
    );
    this.byChatStmt = db.prepare<[string, string], CommunityRow>(
      `SELECT ${COLUMNS} FROM communities WHERE chat_group_id = ? AND chain_type = ? ORDER BY created_at, rowid LIMIT 1`
    );
    this.bySubjectStmt = db.prepare<[string, string], CommunityRow>(
      `SELECT ${COLUMNS} FROM communities WHERE subject_address = ? AND chain_type = ? ORDER BY created_at, rowid`
    );
    this.pageStmt = db.prepare<[number, number], CommunityRow>(
      `SELECT ${COLUMNS} FROM communities ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
    );
    this.countStmt = db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM communities');
  }

  register(community: NewCommunity): Community {
    try {
      this.insertStmt.run(
        community.agentName,
        community.bio,
        community.inviteUrl,
        community.botToken,
        community.chatGroupId,
        community.subjectAddress,
        community.chain
      );
    } catch (error) {
      if (error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT')) {
        throw new ConflictError(`Agent already registered: ${community.agentName}`);
      }
      throw error;
    }

    const stored = this.findByName(community.agentName);
    if (!stored) {
      throw new DatabaseError(`Community missing after insert: ${community.agentName}`);
    }
    return stored;
  }

  list(options: { page: number; pageSize: number }): PaginatedResult<Community> {
    const offset = (options.page - 1) * options.pageSize;
    const rows = this.pageStmt.all(options.pageSize, offset);
    const total = this.countStmt.get()?.total ?? 0;
    return { items: rows.map(toCommunity), total };
  }

  findByName(agentName: string): Community | null {
    const row = this.byNameStmt.get(agentName);
    return row ? toCommunity(row) : null;
  }

  findByChat(chatGroupId: string, chain: ChainType): Community | null {
    const row = this.byChatStmt.get(chatGroupId, chain);
    return row ? toCommunity(row) : null;
  }

  findBySubject(subject: string, chain: ChainType): Community[] {
    return this.bySubjectStmt.all(subject, chain).map(toCommunity);
  }
}
