import fs from 'fs';
import path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { openDatabase, type ClipDatabase } from '@/db';
import { LATEST_SCHEMA_VERSION } from '@/db/migrations';
import { ClipStore } from '@/lib/clipboard/store';
import { DatabaseError } from '@/lib/errors';

import { createTempDir, FIXED_NOW, sampleEntry } from '../test-utils';

describe('openDatabase', () => {
  let temp: ReturnType<typeof createTempDir>;
  let file: string;
  const handles: ClipDatabase[] = [];

  beforeEach(() => {
    temp = createTempDir();
    file = path.join(temp.dir, 'nested', 'history.db');
  });

  afterEach(() => {
    handles.splice(0).forEach((handle) => handle.close());
    temp.cleanup();
  });

  const open = (busyTimeoutMs?: number) => {
    const handle = openDatabase({ path: file, busyTimeoutMs });
    handles.push(handle);
    return handle;
  };

  it('should create missing parent directories and migrate', () => {
    const database = open();

    expect(fs.existsSync(file)).toBe(true);
    expect(database.schemaVersion).toBe(LATEST_SCHEMA_VERSION);
  });

  it('should apply the connection pragmas', () => {
    const { connection } = open(250);

    expect(connection.pragma('busy_timeout', { simple: true })).toBe(250);
    expect(connection.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(connection.pragma('synchronous', { simple: true })).toBe(1);
    expect(connection.pragma('foreign_keys', { simple: true })).toBe(1);
  });

  describe('with another process holding the write lock', () => {
    it('should fail with DatabaseError once the busy timeout passes', () => {
      const holder = open();
      const store = new ClipStore(open(50), () => FIXED_NOW);

      holder.connection.exec('BEGIN IMMEDIATE');
      try {
        expect(() => store.insert(sampleEntry('blocked'))).toThrow(DatabaseError);
      } finally {
        holder.connection.exec('ROLLBACK');
      }

      expect(store.count()).toBe(0);
    });

    it('should write normally after the lock is released', () => {
      const holder = open();
      const store = new ClipStore(open(50), () => FIXED_NOW);

      holder.connection.exec('BEGIN IMMEDIATE');
      holder.connection.exec('ROLLBACK');

      expect(store.insert(sampleEntry('after'))).toBe(1);
    });
  });
});
