/**
 * Tests for clip transform utilities
 */

import { describe, expect, it } from 'vitest';

import { calculateClipByteSize, indexedContent } from '@/lib/clipboard/constants';
import { createClipEntry, toClipEntry, type ClipRow } from '@/lib/clipboard/transform';
import { DatabaseError, EmptyClipboardError } from '@/lib/errors';

const row = (overrides: Partial<ClipRow> = {}): ClipRow => ({
  id: 7,
  content: 'hello',
  content_type: 'text',
  byte_size: 5,
  created_at: '2026-01-01T00:00:00.000Z',
  label: null,
  ...overrides,
});

describe('toClipEntry', () => {
  it('should map columns to entry fields', () => {
    expect(toClipEntry(row({ label: 'greeting' }))).toEqual({
      id: 7,
      content: 'hello',
      contentType: 'text',
      byteSize: 5,
      createdAt: '2026-01-01T00:00:00.000Z',
      label: 'greeting',
    });
  });

  it('should accept password rows', () => {
    expect(toClipEntry(row({ content_type: 'password' })).contentType).toBe('password');
  });

  it('should raise DatabaseError for an unknown content type', () => {
    expect(() => toClipEntry(row({ content_type: 'html' }))).toThrow(DatabaseError);
    expect(() => toClipEntry(row({ content_type: 'html' }))).toThrow(
      'Database error: corrupt content_type "html" on entry 7'
    );
  });
});

describe('createClipEntry', () => {
  const now = new Date('2026-02-17T10:30:00.000Z');

  it('should derive byte size and timestamp', () => {
    expect(createClipEntry({ content: 'héllo', contentType: 'text', now })).toEqual({
      content: 'héllo',
      contentType: 'text',
      byteSize: 6,
      createdAt: '2026-02-17T10:30:00.000Z',
      label: null,
    });
  });

  it('should keep an explicit label', () => {
    expect(createClipEntry({ content: 'x', contentType: 'text', label: 'work', now }).label).toBe('work');
  });

  it('should reject empty content', () => {
    expect(() => createClipEntry({ content: '', contentType: 'text', now })).toThrow(EmptyClipboardError);
  });
});

describe('calculateClipByteSize', () => {
  it('should count UTF-8 bytes, not characters', () => {
    expect(calculateClipByteSize('abc')).toBe(3);
    expect(calculateClipByteSize('日本')).toBe(6);
    expect(calculateClipByteSize('😀')).toBe(4);
  });
});

describe('indexedContent', () => {
  it('should index text content as is', () => {
    expect(indexedContent('text', 'hello')).toBe('hello');
  });

  it('should index nothing for password content', () => {
    expect(indexedContent('password', 'hunter2')).toBe('');
  });
});
