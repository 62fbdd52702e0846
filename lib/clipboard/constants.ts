/**
 * Shared clipboard constants
 * Centralized to avoid drift between the store, the commands and the CLI
 */

import type { ContentType } from './content-type';

// Shown instead of password content in any human-readable output
export const PASSWORD_MASK = '********';

// Label given to password clips stored without an explicit label
export const DEFAULT_PASSWORD_LABEL = 'password';

export const DEFAULT_LIST_LIMIT = 20;
export const DEFAULT_SEARCH_LIMIT = 20;

// Characters of content shown in list and search previews
export const PREVIEW_MAX_CHARS = 60;

/**
 * Calculate the stored size of clip content
 * Always the UTF-8 byte length, whatever the string holds
 */
export function calculateClipByteSize(content: string): number {
  return Buffer.byteLength(content, 'utf-8');
}

/**
 * Content that goes into the full-text index for a row
 * Password content is never indexed; only its label stays searchable
 */
export function indexedContent(contentType: ContentType, content: string): string {
  return contentType === 'password' ? '' : content;
}
