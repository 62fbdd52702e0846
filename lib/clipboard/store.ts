/**
 * Clip storage engine
 *
 * Owns every read and write against the clips table and its FTS5 mirror.
 * There are no triggers: each mutating method writes the table and the
 * search index in the same transaction, so both change together or not at all.
 */

import { and, count, desc, eq, sql } from 'drizzle-orm';

import type { ClipDatabase, ClipDb } from '../../db';
import { clipsFtsTable, clipsTable } from '../../db/schema';
import { ClipStashError, DatabaseError, NotFoundError, toClipStashError } from '../errors';
import { log, startTimer } from '../observability/logger';
import { indexedContent } from './constants';
import { formatContentType } from './content-type';
import {
  buildClipConditions,
  buildSearchMatch,
  type ListClipsOptions,
  type SearchClipsOptions,
} from './queries';
import { toClipEntries, toClipEntry, type ClipEntry, type NewClipEntry } from './transform';

type ClipTransaction = Parameters<Parameters<ClipDb['transaction']>[0]>[0];

function notFound(id: number): NotFoundError {
  return new NotFoundError(`No entry with id ${id}`);
}

// Lookup misses and bad input are expected outcomes, not storage faults
function isExpected(error: unknown): error is ClipStashError {
  return (
    error instanceof ClipStashError &&
    (error.code === 'not_found' || error.code === 'invalid_input')
  );
}

export class ClipStore {
  constructor(
    private readonly database: ClipDatabase,
    private readonly clock: () => Date = () => new Date()
  ) {}

  private get db(): ClipDb {
    return this.database.db;
  }

  /**
   * Run a storage operation, timing it and turning any driver failure
   * into a DatabaseError
   */
  private guard<T>(operation: string, table: string, fn: () => T): T {
    const timer = startTimer();
    try {
      const result = fn();
      log.database(operation, table, timer.elapsed(), true);
      return result;
    } catch (error) {
      if (isExpected(error)) {
        log.database(operation, table, timer.elapsed(), true);
        throw error;
      }
      const wrapped = toClipStashError(error, (detail, cause) => new DatabaseError(detail, cause));
      log.database(operation, table, timer.elapsed(), false, wrapped);
      throw wrapped;
    }
  }

  private indexClip(tx: ClipTransaction, entry: ClipEntry): void {
    tx.insert(clipsFtsTable)
      .values({
        rowid: entry.id,
        content: indexedContent(entry.contentType, entry.content),
        label: entry.label,
      })
      .run();
  }

  private unindexClip(tx: ClipTransaction, id: number): void {
    tx.delete(clipsFtsTable).where(eq(clipsFtsTable.rowid, id)).run();
  }

  private insertWithin(tx: ClipTransaction, entry: NewClipEntry): number {
    const inserted = tx
      .insert(clipsTable)
      .values({
        content: entry.content,
        content_type: formatContentType(entry.contentType),
        byte_size: entry.byteSize,
        created_at: entry.createdAt,
        label: entry.label,
      })
      .returning({ id: clipsTable.id })
      .get();

    if (!inserted) {
      throw new DatabaseError('insert did not return an id');
    }

    this.indexClip(tx, { ...entry, id: inserted.id });
    return inserted.id;
  }

  private latestMatches(tx: ClipTransaction, content: string): boolean {
    const row = tx
      .select({ id: clipsTable.id })
      .from(clipsTable)
      .where(
        and(
          sql`${clipsTable.id} = (SELECT MAX(id) FROM ${clipsTable})`,
          eq(clipsTable.content, content)
        )
      )
      .get();
    return row !== undefined;
  }

  /**
   * Store a new clip and index it
   * @returns the id assigned by the database
   */
  insert(entry: NewClipEntry): number {
    return this.guard('INSERT', 'clips', () =>
      this.db.transaction((tx) => this.insertWithin(tx, entry))
    );
  }

  /**
   * Store a clip unless it equals the most recent one
   * The check and the insert hold the write lock together, so two
   * processes capturing the same text store it once.
   * @returns the new id, or undefined when the clip was skipped
   */
  insertUnlessDuplicate(entry: NewClipEntry): number | undefined {
    return this.guard('INSERT', 'clips', () =>
      this.db.transaction(
        (tx) => (this.latestMatches(tx, entry.content) ? undefined : this.insertWithin(tx, entry)),
        { behavior: 'immediate' }
      )
    );
  }

  getById(id: number): ClipEntry {
    return this.guard('SELECT', 'clips', () => {
      const row = this.db.select().from(clipsTable).where(eq(clipsTable.id, id)).get();
      if (!row) {
        throw notFound(id);
      }
      return toClipEntry(row);
    });
  }

  getMostRecent(): ClipEntry {
    return this.guard('SELECT', 'clips', () => {
      const row = this.db.select().from(clipsTable).orderBy(desc(clipsTable.id)).limit(1).get();
      if (!row) {
        throw new NotFoundError('No entries in history');
      }
      return toClipEntry(row);
    });
  }

  /**
   * Whether content equals the most recent clip, byte for byte
   */
  isDuplicate(content: string): boolean {
    return this.guard('SELECT', 'clips', () =>
      this.db.transaction((tx) => this.latestMatches(tx, content))
    );
  }

  /**
   * Set or clear a clip's label and reindex it
   */
  updateLabel(id: number, label: string | null): void {
    this.guard('UPDATE', 'clips', () =>
      this.db.transaction((tx) => {
        const row = tx
          .update(clipsTable)
          .set({ label })
          .where(eq(clipsTable.id, id))
          .returning()
          .get();

        if (!row) {
          throw notFound(id);
        }

        this.unindexClip(tx, id);
        this.indexClip(tx, toClipEntry(row));
      })
    );
  }

  delete(id: number): void {
    this.guard('DELETE', 'clips', () =>
      this.db.transaction((tx) => {
        const result = tx.delete(clipsTable).where(eq(clipsTable.id, id)).run();
        if (result.changes === 0) {
          throw notFound(id);
        }
        this.unindexClip(tx, id);
      })
    );
  }

  /**
   * Remove every clip and the whole search index
   * @returns how many clips were removed
   */
  clear(): number {
    return this.guard('DELETE', 'clips', () =>
      this.db.transaction((tx) => {
        tx.delete(clipsFtsTable).run();
        return tx.delete(clipsTable).run().changes;
      })
    );
  }

  count(): number {
    return this.guard('COUNT', 'clips', () => {
      const row = this.db.select({ value: count() }).from(clipsTable).get();
      return row?.value ?? 0;
    });
  }

  /**
   * Newest clips first, paginated; filters combine with AND
   */
  list({ limit, offset, ...filter }: ListClipsOptions): ClipEntry[] {
    return this.guard('SELECT', 'clips', () => {
      const rows = this.db
        .select()
        .from(clipsTable)
        .where(buildClipConditions(filter, this.clock()))
        .orderBy(desc(clipsTable.id))
        .limit(limit)
        .offset(offset)
        .all();
      return toClipEntries(rows);
    });
  }

  /**
   * Full-text search ranked by bm25, best match first
   * days and contentType narrow the matches
   */
  search({ query, limit, ...filter }: SearchClipsOptions): ClipEntry[] {
    return this.guard('SEARCH', 'clips_fts', () => {
      const match = buildSearchMatch(query);

      const rows = this.db
        .select()
        .from(clipsFtsTable)
        .innerJoin(clipsTable, eq(clipsTable.id, clipsFtsTable.rowid))
        .where(
          and(
            sql`${clipsFtsTable} MATCH ${match}`,
            buildClipConditions(filter, this.clock())
          )
        )
        .orderBy(sql`bm25(${clipsFtsTable})`, desc(clipsTable.id))
        .limit(limit)
        .all();

      return toClipEntries(rows.map((row) => row.clips));
    });
  }
}
