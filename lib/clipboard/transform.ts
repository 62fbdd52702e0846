/**
 * Shared clip transformation helpers
 * Centralizes DB row to entry mapping
 */

import type { InferSelectModel } from 'drizzle-orm';

import { clipsTable } from '../../db/schema';
import { DatabaseError, EmptyClipboardError } from '../errors';
import { calculateClipByteSize } from './constants';
import { isContentType, type ContentType } from './content-type';

export type ClipRow = InferSelectModel<typeof clipsTable>;

export interface ClipEntry {
  id: number;
  content: string;
  contentType: ContentType;
  byteSize: number;
  createdAt: string;
  label: string | null;
}

/** An entry before storage has assigned its id */
export type NewClipEntry = Omit<ClipEntry, 'id'>;

/**
 * Transform a database row to a clip entry
 * An unknown content_type means the file was written by something else:
 * report corruption instead of guessing a type
 */
export function toClipEntry(row: ClipRow): ClipEntry {
  if (!isContentType(row.content_type)) {
    throw new DatabaseError(
      `corrupt content_type "${row.content_type}" on entry ${row.id}`
    );
  }

  return {
    id: row.id,
    content: row.content,
    contentType: row.content_type,
    byteSize: row.byte_size,
    createdAt: row.created_at,
    label: row.label,
  };
}

/**
 * Transform multiple database rows to clip entries
 */
export function toClipEntries(rows: ClipRow[]): ClipEntry[] {
  return rows.map((row) => toClipEntry(row));
}

export interface CreateClipEntryInput {
  content: string;
  contentType: ContentType;
  label?: string | null;
  now?: Date;
}

/**
 * Build a new entry from captured clipboard text
 */
export function createClipEntry({
  content,
  contentType,
  label = null,
  now = new Date(),
}: CreateClipEntryInput): NewClipEntry {
  if (content === '') {
    throw new EmptyClipboardError();
  }

  return {
    content,
    contentType,
    byteSize: calculateClipByteSize(content),
    createdAt: now.toISOString(),
    label,
  };
}
