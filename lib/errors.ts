/**
 * Error taxonomy shared by every layer
 * Lower layers throw these unchanged; only foreign errors get wrapped
 */

export type ClipStashErrorCode =
  | 'clipboard_access'
  | 'empty_clipboard'
  | 'database'
  | 'not_found'
  | 'invalid_input'
  | 'io';

export interface ClipStashErrorOptions {
  code: ClipStashErrorCode;
  message: string;
  cause?: unknown;
}

export class ClipStashError extends Error {
  readonly code: ClipStashErrorCode;

  constructor(options: ClipStashErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ClipStashError';
    this.code = options.code;
  }
}

export class ClipboardAccessError extends ClipStashError {
  constructor(detail: string, cause?: unknown) {
    super({ code: 'clipboard_access', message: `Clipboard error: ${detail}`, cause });
    this.name = 'ClipboardAccessError';
  }
}

export class EmptyClipboardError extends ClipStashError {
  constructor() {
    super({ code: 'empty_clipboard', message: 'Clipboard is empty' });
    this.name = 'EmptyClipboardError';
  }
}

export class DatabaseError extends ClipStashError {
  constructor(detail: string, cause?: unknown) {
    super({ code: 'database', message: `Database error: ${detail}`, cause });
    this.name = 'DatabaseError';
  }
}

export class NotFoundError extends ClipStashError {
  constructor(detail: string) {
    super({ code: 'not_found', message: `Not found: ${detail}` });
    this.name = 'NotFoundError';
  }
}

export class InvalidInputError extends ClipStashError {
  constructor(detail: string) {
    super({ code: 'invalid_input', message: `Invalid input: ${detail}` });
    this.name = 'InvalidInputError';
  }
}

export class IoError extends ClipStashError {
  constructor(detail: string, cause?: unknown) {
    super({ code: 'io', message: `I/O error: ${detail}`, cause });
    this.name = 'IoError';
  }
}

export function normalizeUnknownError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/**
 * Pass ClipStashErrors through untouched and wrap anything else
 * with the given fallback constructor
 */
export function toClipStashError(
  error: unknown,
  wrap: (detail: string, cause: unknown) => ClipStashError
): ClipStashError {
  if (error instanceof ClipStashError) return error;
  return wrap(normalizeUnknownError(error), error);
}
