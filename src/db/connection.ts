/**
 * Database Connection Module
 *
 * Handles database lifecycle: initialization, connection management, and shutdown.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../utils/logger.js';
import { DatabaseError, errorMessage } from '../utils/errors.js';
import { SCHEMA_SQL } from './schema.js';

let db: Database.Database | null = null;

/**
 * Open a database at `path` (or `:memory:`) and apply the schema
 */
export function openDatabase(path: string): Database.Database {
  // For file-based SQLite, ensure data directory exists
  if (path !== ':memory:') {
    const dbDir = dirname(path);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
      logger.info({ path: dbDir }, 'Created database directory');
    }
  }

  let database: Database.Database;
  try {
    database = new Database(path);
    database.exec(SCHEMA_SQL);
  } catch (error) {
    throw new DatabaseError(`Failed to open database at ${path}: ${errorMessage(error)}`);
  }

  return database;
}

/**
 * Initialize the process-wide database connection
 */
export function initDatabase(path: string): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(path);
  logger.info({ path }, 'Database connection established');

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

// Re-export Database type for consumers
export type { Database };
