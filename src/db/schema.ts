/**
 * SQLite schema for the share ledger, sync checkpoints and communities.
 *
 * Executed on every start; every statement is idempotent.
 */
export const SCHEMA_SQL = `
-- Enable WAL mode for better concurrent access
PRAGMA journal_mode = WAL;
PRAGMA foreign_keys = ON;

-- One resume point per chain. last_position never decreases.
CREATE TABLE IF NOT EXISTS sync_status (
  chain_type TEXT PRIMARY KEY,
  last_position INTEGER NOT NULL DEFAULT 0,
  cursor_metadata TEXT,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Running share balance per (trader, subject, chain), decimal string
CREATE TABLE IF NOT EXISTS trades (
  trader TEXT NOT NULL,
  subject TEXT NOT NULL,
  chain_type TEXT NOT NULL,
  share_amount TEXT NOT NULL DEFAULT '0',
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (trader, subject, chain_type)
);

CREATE INDEX IF NOT EXISTS idx_trades_trader_chain
  ON trades(trader, chain_type);

-- Verified address to chat-platform identity
CREATE TABLE IF NOT EXISTS user_mappings (
  address TEXT NOT NULL,
  chain_type TEXT NOT NULL,
  external_identity TEXT NOT NULL,
  gated INTEGER NOT NULL DEFAULT 0 CHECK (gated IN (0, 1)),
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (address, chain_type)
);

-- Events already folded into trades; makes replays no-ops
CREATE TABLE IF NOT EXISTS applied_events (
  chain_type TEXT NOT NULL,
  event_key TEXT NOT NULL,
  applied_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (chain_type, event_key)
);

-- Telegram groups gated by a subject's shares
CREATE TABLE IF NOT EXISTS communities (
  agent_name TEXT PRIMARY KEY,
  bio TEXT,
  invite_url TEXT NOT NULL,
  bot_token TEXT NOT NULL,
  chat_group_id TEXT NOT NULL,
  subject_address TEXT NOT NULL,
  chain_type TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE INDEX IF NOT EXISTS idx_communities_subject
  ON communities(subject_address, chain_type);

CREATE INDEX IF NOT EXISTS idx_communities_chat
  ON communities(chat_group_id, chain_type);
`;
