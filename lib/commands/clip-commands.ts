/**
 * Clip commands
 * Business rules between the user's intent and the store: duplicate
 * suppression, password auto-labeling and confirmation of destructive actions
 */

import { DEFAULT_PASSWORD_LABEL } from '../clipboard/constants';
import { DEFAULT_CONTENT_TYPE, parseContentType } from '../clipboard/content-type';
import type { ListClipsOptions, SearchClipsOptions } from '../clipboard/queries';
import type { ClipStore } from '../clipboard/store';
import type { ClipboardAccess } from '../clipboard/system-clipboard';
import { createClipEntry, type ClipEntry } from '../clipboard/transform';
import { EmptyClipboardError } from '../errors';
import { log } from '../observability/logger';

export type ConfirmFn = (question: string) => Promise<boolean>;

export interface CommandContext {
  store: ClipStore;
  clipboard: ClipboardAccess;
  confirm: ConfirmFn;
  now?: () => Date;
}

// ========================================
// store
// ========================================

export interface StoreClipInput {
  label?: string | null;
  /** Raw type tag as typed by the user; defaults to text */
  type?: string;
}

export type StoreClipOutcome =
  | { status: 'stored'; id: number; byteSize: number; label: string | null }
  | { status: 'skipped' };

export function storeClip(ctx: CommandContext, input: StoreClipInput = {}): StoreClipOutcome {
  // A bad type must fail before the clipboard or the store is touched
  const contentType = parseContentType(input.type ?? DEFAULT_CONTENT_TYPE);

  const content = ctx.clipboard.readText();
  if (content === '') {
    throw new EmptyClipboardError();
  }

  const label =
    input.label ?? (contentType === 'password' ? DEFAULT_PASSWORD_LABEL : null);

  const entry = createClipEntry({
    content,
    contentType,
    label,
    now: ctx.now?.(),
  });

  // Passwords bypass suppression: a re-captured secret may have changed since
  const id =
    contentType === 'password' ? ctx.store.insert(entry) : ctx.store.insertUnlessDuplicate(entry);
  if (id === undefined) {
    log.debug('Skipped duplicate clip');
    return { status: 'skipped' };
  }

  log.info('Stored clip', { id, contentType, byteSize: entry.byteSize });

  return { status: 'stored', id, byteSize: entry.byteSize, label: entry.label };
}

// ========================================
// get
// ========================================

export interface GetClipOutcome {
  id: number;
  byteSize: number;
}

/**
 * Copy a clip back to the clipboard, the most recent one when no id is given
 */
export function getClip(ctx: CommandContext, input: { id?: number } = {}): GetClipOutcome {
  const entry =
    input.id !== undefined ? ctx.store.getById(input.id) : ctx.store.getMostRecent();

  ctx.clipboard.writeText(entry.content);

  return { id: entry.id, byteSize: entry.byteSize };
}

// ========================================
// list / search
// ========================================

export function listClips(ctx: CommandContext, options: ListClipsOptions): ClipEntry[] {
  return ctx.store.list(options);
}

export function searchClips(ctx: CommandContext, options: SearchClipsOptions): ClipEntry[] {
  return ctx.store.search(options);
}

// ========================================
// label
// ========================================

/**
 * Set a clip's label; a missing or null label removes it
 */
export function labelClip(
  ctx: CommandContext,
  input: { id: number; label?: string | null }
): { id: number; label: string | null } {
  const label = input.label ?? null;
  ctx.store.updateLabel(input.id, label);
  return { id: input.id, label };
}

// ========================================
// delete / clear
// ========================================

export type DeleteClipOutcome = { status: 'deleted'; id: number } | { status: 'aborted' };

export async function deleteClip(
  ctx: CommandContext,
  input: { id: number; force?: boolean }
): Promise<DeleteClipOutcome> {
  if (!input.force && !(await ctx.confirm(`Delete entry #${input.id}? [y/N] `))) {
    return { status: 'aborted' };
  }

  ctx.store.delete(input.id);
  log.info('Deleted clip', { id: input.id });

  return { status: 'deleted', id: input.id };
}

export type ClearClipsOutcome = { status: 'cleared'; count: number } | { status: 'aborted' };

export async function clearClips(
  ctx: CommandContext,
  input: { force?: boolean } = {}
): Promise<ClearClipsOutcome> {
  if (!input.force && !(await ctx.confirm('Delete all clipboard history? [y/N] '))) {
    return { status: 'aborted' };
  }

  const count = ctx.store.clear();
  log.info('Cleared clip history', { count });

  return { status: 'cleared', count };
}
