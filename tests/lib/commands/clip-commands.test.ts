import { describe, expect, it, vi } from 'vitest';

import {
  clearClips,
  deleteClip,
  getClip,
  labelClip,
  listClips,
  searchClips,
  storeClip,
} from '@/lib/commands/clip-commands';
import {
  ClipboardAccessError,
  EmptyClipboardError,
  InvalidInputError,
  NotFoundError,
} from '@/lib/errors';

import { createCommandContext, FakeClipboard, FIXED_NOW } from '../../test-utils';

describe('storeClip', () => {
  it('should store the clipboard text', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('hello world') });

    const outcome = storeClip(ctx, { label: 'greeting' });

    expect(outcome).toEqual({ status: 'stored', id: 1, byteSize: 11, label: 'greeting' });
    expect(store.getById(1)).toEqual({
      id: 1,
      content: 'hello world',
      contentType: 'text',
      byteSize: 11,
      createdAt: FIXED_NOW.toISOString(),
      label: 'greeting',
    });
  });

  it('should skip text identical to the most recent entry', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('same') });

    expect(storeClip(ctx).status).toBe('stored');
    expect(storeClip(ctx)).toEqual({ status: 'skipped' });
    expect(store.count()).toBe(1);
  });

  it('should store text again once something else was stored in between', () => {
    const clipboard = new FakeClipboard('first');
    const { ctx, store } = createCommandContext({ clipboard });

    storeClip(ctx);
    clipboard.value = 'second';
    storeClip(ctx);
    clipboard.value = 'first';
    storeClip(ctx);

    expect(store.count()).toBe(3);
  });

  it('should never suppress a repeated password', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('hunter2') });

    storeClip(ctx, { type: 'password' });
    storeClip(ctx, { type: 'password' });

    expect(store.count()).toBe(2);
  });

  it('should label an unlabeled password "password"', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('hunter2') });

    const outcome = storeClip(ctx, { type: 'password' });

    expect(outcome).toEqual({ status: 'stored', id: 1, byteSize: 7, label: 'password' });
    expect(store.getById(1).contentType).toBe('password');
  });

  it('should keep an explicit password label', () => {
    const { ctx } = createCommandContext({ clipboard: new FakeClipboard('hunter2') });

    expect(storeClip(ctx, { type: 'password', label: 'wifi' })).toMatchObject({ label: 'wifi' });
  });

  it('should leave text unlabeled by default', () => {
    const { ctx } = createCommandContext({ clipboard: new FakeClipboard('plain') });

    expect(storeClip(ctx)).toMatchObject({ label: null });
  });

  it('should reject a malformed type before reading the clipboard', () => {
    const clipboard = new FakeClipboard('hello');
    const readSpy = vi.spyOn(clipboard, 'readText');
    const { ctx, store } = createCommandContext({ clipboard });

    expect(() => storeClip(ctx, { type: 'secret' })).toThrow(InvalidInputError);
    expect(readSpy).not.toHaveBeenCalled();
    expect(store.count()).toBe(0);
  });

  it('should fail on an empty clipboard', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('') });

    expect(() => storeClip(ctx)).toThrow(EmptyClipboardError);
    expect(store.count()).toBe(0);
  });

  it('should pass clipboard failures through unchanged', () => {
    const clipboard = new FakeClipboard();
    vi.spyOn(clipboard, 'readText').mockImplementation(() => {
      throw new ClipboardAccessError('no display');
    });
    const { ctx } = createCommandContext({ clipboard });

    expect(() => storeClip(ctx)).toThrow('Clipboard error: no display');
  });
});

describe('getClip', () => {
  it('should copy the most recent entry by default', () => {
    const clipboard = new FakeClipboard('first');
    const { ctx } = createCommandContext({ clipboard });
    storeClip(ctx);
    clipboard.value = 'second';
    storeClip(ctx);
    clipboard.value = 'something else';

    expect(getClip(ctx)).toEqual({ id: 2, byteSize: 6 });
    expect(clipboard.writes).toEqual(['second']);
  });

  it('should copy the requested entry', () => {
    const clipboard = new FakeClipboard('first');
    const { ctx } = createCommandContext({ clipboard });
    storeClip(ctx);
    clipboard.value = 'second';
    storeClip(ctx);

    expect(getClip(ctx, { id: 1 })).toEqual({ id: 1, byteSize: 5 });
    expect(clipboard.value).toBe('first');
  });

  it('should copy real password content', () => {
    const clipboard = new FakeClipboard('hunter2');
    const { ctx } = createCommandContext({ clipboard });
    storeClip(ctx, { type: 'password' });
    clipboard.value = '';

    getClip(ctx);

    expect(clipboard.value).toBe('hunter2');
  });

  it('should fail with NotFoundError on an empty history', () => {
    const { ctx, clipboard } = createCommandContext();

    expect(() => getClip(ctx)).toThrow(NotFoundError);
    expect(clipboard.writes).toEqual([]);
  });
});

describe('listClips / searchClips', () => {
  it('should return real content for every type', () => {
    const clipboard = new FakeClipboard('hunter2');
    const { ctx } = createCommandContext({ clipboard });
    storeClip(ctx, { type: 'password', label: 'wifi' });
    clipboard.value = 'wifi settings page';
    storeClip(ctx);

    expect(listClips(ctx, { limit: 10, offset: 0 }).map((e) => e.content)).toEqual([
      'wifi settings page',
      'hunter2',
    ]);
    expect(searchClips(ctx, { query: 'wifi', limit: 10 }).map((e) => e.id).sort()).toEqual([1, 2]);
  });
});

describe('labelClip', () => {
  it('should set, overwrite and clear a label', () => {
    const { ctx, store } = createCommandContext({ clipboard: new FakeClipboard('note') });
    storeClip(ctx);

    expect(labelClip(ctx, { id: 1, label: 'a' })).toEqual({ id: 1, label: 'a' });
    labelClip(ctx, { id: 1, label: 'b' });
    expect(store.getById(1).label).toBe('b');

    expect(labelClip(ctx, { id: 1 })).toEqual({ id: 1, label: null });
    expect(store.getById(1).label).toBeNull();
  });

  it('should fail with NotFoundError for an unknown id', () => {
    const { ctx } = createCommandContext();

    expect(() => labelClip(ctx, { id: 3, label: 'x' })).toThrow(NotFoundError);
  });
});

describe('deleteClip', () => {
  it('should ask for confirmation and keep the entry when declined', async () => {
    const { ctx, store, confirm } = createCommandContext({
      clipboard: new FakeClipboard('keep me'),
      confirmAnswer: false,
    });
    storeClip(ctx);

    await expect(deleteClip(ctx, { id: 1 })).resolves.toEqual({ status: 'aborted' });
    expect(confirm).toHaveBeenCalledWith('Delete entry #1? [y/N] ');
    expect(store.count()).toBe(1);
  });

  it('should delete once confirmed', async () => {
    const { ctx, store } = createCommandContext({
      clipboard: new FakeClipboard('bye'),
      confirmAnswer: true,
    });
    storeClip(ctx);

    await expect(deleteClip(ctx, { id: 1 })).resolves.toEqual({ status: 'deleted', id: 1 });
    expect(store.count()).toBe(0);
  });

  it('should skip the prompt when forced', async () => {
    const { ctx, confirm } = createCommandContext({ clipboard: new FakeClipboard('bye') });
    storeClip(ctx);

    await deleteClip(ctx, { id: 1, force: true });

    expect(confirm).not.toHaveBeenCalled();
  });

  it('should fail with NotFoundError for an unknown id', async () => {
    const { ctx } = createCommandContext();

    await expect(deleteClip(ctx, { id: 42, force: true })).rejects.toThrow(NotFoundError);
  });
});

describe('clearClips', () => {
  it('should report the exact number removed', async () => {
    const clipboard = new FakeClipboard('one');
    const { ctx, store } = createCommandContext({ clipboard });
    storeClip(ctx);
    clipboard.value = 'two';
    storeClip(ctx);

    await expect(clearClips(ctx, { force: true })).resolves.toEqual({ status: 'cleared', count: 2 });
    expect(store.count()).toBe(0);
  });

  it('should report 0 on an empty history', async () => {
    const { ctx } = createCommandContext();

    await expect(clearClips(ctx, { force: true })).resolves.toEqual({ status: 'cleared', count: 0 });
  });

  it('should keep history when the prompt is declined', async () => {
    const { ctx, store, confirm } = createCommandContext({ clipboard: new FakeClipboard('one') });
    storeClip(ctx);

    await expect(clearClips(ctx)).resolves.toEqual({ status: 'aborted' });
    expect(confirm).toHaveBeenCalledWith('Delete all clipboard history? [y/N] ');
    expect(store.count()).toBe(1);
  });
});
