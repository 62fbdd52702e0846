import fs from 'fs';
import path from 'path';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import { DEFAULT_BUSY_TIMEOUT_MS } from '../lib/env-validation';
import { DatabaseError, IoError, toClipStashError } from '../lib/errors';
import { log } from '../lib/observability/logger';
import { migrate } from './migrations';
import * as schema from './schema';

export const IN_MEMORY_DATABASE = ':memory:';

export type ClipDb = BetterSQLite3Database<typeof schema>;

export interface OpenDatabaseOptions {
  path: string;
  busyTimeoutMs?: number;
}

/**
 * An open history database: the drizzle instance plus the raw connection
 * it wraps. Callers own the handle and must close it.
 */
export interface ClipDatabase {
  db: ClipDb;
  connection: Database.Database;
  schemaVersion: number;
  close(): void;
}

function ensureParentDirectory(filePath: string): void {
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (error) {
    throw new IoError(`Cannot create data directory ${dir}`, error);
  }
}

// Configure SQLite for several short-lived processes sharing one file
function applyPragmas(connection: Database.Database, busyTimeoutMs: number): void {
  connection.pragma('journal_mode = WAL');
  connection.pragma(`busy_timeout = ${Math.trunc(busyTimeoutMs)}`);
  connection.pragma('synchronous = NORMAL');
  connection.pragma('foreign_keys = ON');
}

/**
 * Open (creating if needed) the history database and migrate it to the
 * latest schema version
 */
export function openDatabase({
  path: filePath,
  busyTimeoutMs = DEFAULT_BUSY_TIMEOUT_MS,
}: OpenDatabaseOptions): ClipDatabase {
  if (filePath !== IN_MEMORY_DATABASE) {
    ensureParentDirectory(filePath);
  }

  let connection: Database.Database;
  try {
    connection = new Database(filePath);
  } catch (error) {
    throw new DatabaseError(`Cannot open ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
  }

  try {
    applyPragmas(connection, busyTimeoutMs);
    const schemaVersion = migrate(connection);

    log.debug('Opened history database', { path: filePath, schemaVersion });

    return {
      db: drizzle(connection, { schema }),
      connection,
      schemaVersion,
      close: () => {
        if (connection.open) {
          connection.close();
        }
      },
    };
  } catch (error) {
    connection.close();
    throw toClipStashError(error, (detail, cause) => new DatabaseError(detail, cause));
  }
}
