import clipboardy from 'clipboardy';

import { ClipboardAccessError, normalizeUnknownError } from '../errors';

/**
 * Read and write access to a text clipboard
 * Implementations report failures as ClipboardAccessError; an empty
 * clipboard is a normal read and is judged by the caller
 */
export interface ClipboardAccess {
  readText(): string;
  writeText(text: string): void;
}

/**
 * The operating system clipboard
 */
export const systemClipboard: ClipboardAccess = {
  readText() {
    try {
      return clipboardy.readSync();
    } catch (error) {
      throw new ClipboardAccessError(normalizeUnknownError(error), error);
    }
  },

  writeText(text: string) {
    try {
      clipboardy.writeSync(text);
    } catch (error) {
      throw new ClipboardAccessError(normalizeUnknownError(error), error);
    }
  },
};
