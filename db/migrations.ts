import type Database from 'better-sqlite3';

import { log } from '../lib/observability/logger';

export interface Migration {
  version: number;
  description: string;
  statements: string[];
}

/**
 * Ordered schema migrations, applied above PRAGMA user_version
 * Every statement must be safe to run again on an already migrated database
 */
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'clips table and full-text index',
    statements: [
      `CREATE TABLE IF NOT EXISTS clips (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        content      TEXT NOT NULL,
        content_type TEXT NOT NULL DEFAULT 'text',
        byte_size    INTEGER NOT NULL,
        created_at   TEXT NOT NULL,
        label        TEXT
      )`,
      'CREATE INDEX IF NOT EXISTS idx_clips_label ON clips(label)',
      'CREATE VIRTUAL TABLE IF NOT EXISTS clips_fts USING fts5(content, label)',
    ],
  },
  {
    version: 2,
    description: 'retire html content type and mask passwords in the search index',
    statements: [
      "UPDATE clips SET content_type = 'text' WHERE content_type = 'html'",
      'CREATE INDEX IF NOT EXISTS idx_clips_content_type ON clips(content_type)',
      // Index maintenance moved out of triggers into the store
      'DROP TRIGGER IF EXISTS clips_ai',
      'DROP TRIGGER IF EXISTS clips_ad',
      'DROP TRIGGER IF EXISTS clips_au',
      // Older indexes read tokens back from clips; the store needs one that owns its text
      'DROP TABLE IF EXISTS clips_fts',
      'CREATE VIRTUAL TABLE clips_fts USING fts5(content, label)',
      `INSERT INTO clips_fts (rowid, content, label)
        SELECT id, CASE WHEN content_type = 'password' THEN '' ELSE content END, label
        FROM clips`,
    ],
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version;

export function getSchemaVersion(connection: Database.Database): number {
  const version: unknown = connection.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Bring the database to LATEST_SCHEMA_VERSION
 * Each migration runs in its own transaction together with its version bump
 * @returns the schema version after migrating
 */
export function migrate(connection: Database.Database): number {
  const current = getSchemaVersion(connection);

  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue;

    const apply = connection.transaction(() => {
      for (const statement of migration.statements) {
        connection.exec(statement);
      }
      connection.pragma(`user_version = ${migration.version}`);
    });
    apply();

    log.info('Applied schema migration', {
      version: migration.version,
      description: migration.description,
    });
  }

  return getSchemaVersion(connection);
}
