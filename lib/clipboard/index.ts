/**
 * Clipboard history core
 * Centralizes the entry model, query builders and the storage engine
 */

export {
  CONTENT_TYPES,
  DEFAULT_CONTENT_TYPE,
  isContentType,
  parseContentType,
  formatContentType,
  type ContentType,
} from './content-type';

export {
  PASSWORD_MASK,
  DEFAULT_PASSWORD_LABEL,
  DEFAULT_LIST_LIMIT,
  DEFAULT_SEARCH_LIMIT,
  PREVIEW_MAX_CHARS,
  calculateClipByteSize,
  indexedContent,
} from './constants';

export {
  buildClipConditions,
  buildSearchMatch,
  daysCutoff,
  type ClipFilter,
  type ListClipsOptions,
  type SearchClipsOptions,
} from './queries';

export {
  toClipEntry,
  toClipEntries,
  createClipEntry,
  type ClipRow,
  type ClipEntry,
  type NewClipEntry,
  type CreateClipEntryInput,
} from './transform';

export { ClipStore } from './store';

export { systemClipboard, type ClipboardAccess } from './system-clipboard';
