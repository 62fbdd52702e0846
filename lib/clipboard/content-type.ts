import { InvalidInputError } from '../errors';

/**
 * Content types a clip can carry
 * Stored verbatim in clips.content_type
 */
export const CONTENT_TYPES = ['text', 'password'] as const;
export type ContentType = typeof CONTENT_TYPES[number];

export const DEFAULT_CONTENT_TYPE: ContentType = 'text';

export function isContentType(value: string): value is ContentType {
  return (CONTENT_TYPES as readonly string[]).includes(value);
}

/**
 * Parse a user-supplied or stored type tag
 * Exact match only: a mistyped flag must never store a password as text
 */
export function parseContentType(value: string): ContentType {
  if (!isContentType(value)) {
    throw new InvalidInputError(
      `Unknown content type "${value}" (expected one of: ${CONTENT_TYPES.join(', ')})`
    );
  }
  return value;
}

export function formatContentType(type: ContentType): string {
  switch (type) {
    case 'text':
      return 'text';
    case 'password':
      return 'password';
  }
}
