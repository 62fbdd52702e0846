/**
 * Human-readable rendering of clips
 * Password content is masked here and only here; the store always
 * works on the real content
 */

import { format, isValid, parseISO } from 'date-fns';

import { PASSWORD_MASK, PREVIEW_MAX_CHARS } from '../clipboard/constants';
import type { ClipEntry } from '../clipboard/transform';

export interface ClipTableRow {
  id: string;
  preview: string;
  label: string;
  created: string;
}

const COLUMNS: ReadonlyArray<[keyof ClipTableRow, string]> = [
  ['id', 'ID'],
  ['preview', 'Preview'],
  ['label', 'Label'],
  ['created', 'Created'],
];

// Code point length, so an emoji counts as one character
function charLength(text: string): number {
  return Array.from(text).length;
}

function padEnd(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - charLength(text)));
}

/**
 * Single-line preview of at most maxChars characters
 * Newlines become spaces; overflow ends in an ellipsis
 */
export function truncatePreview(text: string, maxChars: number = PREVIEW_MAX_CHARS): string {
  const chars = Array.from(text.replace(/\r?\n/g, ' '));
  if (chars.length <= maxChars) {
    return chars.join('');
  }
  return `${chars.slice(0, maxChars - 1).join('')}…`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Local "yyyy-MM-dd HH:mm"; anything unparseable is shown as stored
 */
export function formatTimestamp(iso: string): string {
  const date = parseISO(iso);
  return isValid(date) ? format(date, 'yyyy-MM-dd HH:mm') : iso;
}

export function toClipRow(entry: ClipEntry): ClipTableRow {
  return {
    id: String(entry.id),
    preview: entry.contentType === 'password' ? PASSWORD_MASK : truncatePreview(entry.content),
    label: entry.label ?? '',
    created: formatTimestamp(entry.createdAt),
  };
}

export function renderTable(rows: ClipTableRow[]): string {
  const widths = COLUMNS.map(([key, title]) =>
    Math.max(charLength(title), ...rows.map((row) => charLength(row[key])))
  );

  const renderLine = (cells: string[]) =>
    cells.map((cell, i) => padEnd(cell, widths[i])).join(' | ').trimEnd();

  const lines = [
    renderLine(COLUMNS.map(([, title]) => title)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...rows.map((row) => renderLine(COLUMNS.map(([key]) => row[key]))),
  ];

  return lines.join('\n');
}

export function renderClips(entries: ClipEntry[]): string {
  return renderTable(entries.map(toClipRow));
}
