/**
 * Shared clip query builders
 * Centralized condition building for list and search
 */

import { and, eq, gte, type SQL } from 'drizzle-orm';
import { isValid, subHours } from 'date-fns';

import { clipsTable } from '../../db/schema';
import { InvalidInputError } from '../errors';
import type { ContentType } from './content-type';

export type ClipFilter = {
  label?: string;
  /** Keep clips captured within the last N days */
  days?: number;
  contentType?: ContentType;
};

export type ListClipsOptions = ClipFilter & {
  limit: number;
  offset: number;
};

export type SearchClipsOptions = Omit<ClipFilter, 'label'> & {
  query: string;
  limit: number;
};

/**
 * Earliest created_at kept by a days filter
 * Whole 24-hour days, independent of local DST shifts. created_at is
 * always an ISO-8601 UTC string, so string order is time order
 */
export function daysCutoff(days: number, now: Date = new Date()): string {
  const cutoff = subHours(now, days * 24);
  if (!isValid(cutoff)) {
    throw new InvalidInputError(`days is out of range (got ${days})`);
  }
  return cutoff.toISOString();
}

/**
 * Build WHERE conditions for clip queries
 * Every supplied filter narrows the result (AND); absent filters add nothing
 * @returns undefined when no filter applies
 */
export function buildClipConditions(
  { label, days, contentType }: ClipFilter,
  now: Date = new Date()
): SQL | undefined {
  const conditions: SQL[] = [];

  if (label !== undefined) {
    conditions.push(eq(clipsTable.label, label));
  }
  if (days !== undefined) {
    conditions.push(gte(clipsTable.created_at, daysCutoff(days, now)));
  }
  if (contentType !== undefined) {
    conditions.push(eq(clipsTable.content_type, contentType));
  }

  return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Turn free text into an FTS5 MATCH expression
 * Each whitespace-separated term becomes a quoted string literal with
 * embedded quotes doubled, so no input can reach FTS5 query syntax.
 * Terms are implicitly ANDed.
 */
export function buildSearchMatch(query: string): string {
  const terms = query.trim().split(/\s+/).filter((term) => term.length > 0);
  if (terms.length === 0) {
    throw new InvalidInputError('Empty search query');
  }
  return terms.map((term) => `"${term.replace(/"/g, '""')}"`).join(' ');
}
