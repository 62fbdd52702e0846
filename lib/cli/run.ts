/**
 * Command-line front end
 * Parses argv, runs one command against one store handle and reports
 * the outcome. Returns the process exit code instead of exiting, so
 * the whole flow can run inside tests.
 */

import type { ClipboardAccess, ClipStore } from '../clipboard';
import {
  clearClips,
  deleteClip,
  getClip,
  labelClip,
  listClips,
  searchClips,
  storeClip,
  formatSize,
  renderClips,
  type CommandContext,
  type ConfirmFn,
} from '../commands';
import { ClipStashError, normalizeUnknownError } from '../errors';
import { logError } from '../observability/logger';
import { parseCommandLine, USAGE, type CliCommand } from './args';

export interface CliOutput {
  out(line: string): void;
  err(line: string): void;
}

export interface StoreHandle {
  store: ClipStore;
  close(): void;
}

export interface CliDependencies {
  openStore(): StoreHandle;
  clipboard: ClipboardAccess;
  confirm: ConfirmFn;
  output: CliOutput;
  now?: () => Date;
}

async function execute(command: Exclude<CliCommand, { name: 'help' }>, ctx: CommandContext, output: CliOutput) {
  switch (command.name) {
    case 'store': {
      const outcome = storeClip(ctx, { label: command.label, type: command.type });
      if (outcome.status === 'skipped') {
        output.out('Skipped: content matches most recent entry.');
      } else if (outcome.label !== null) {
        output.out(`Stored as entry #${outcome.id} (${formatSize(outcome.byteSize)}, label: "${outcome.label}").`);
      } else {
        output.out(`Stored as entry #${outcome.id} (${formatSize(outcome.byteSize)}).`);
      }
      return;
    }

    case 'get': {
      const outcome = getClip(ctx, { id: command.id });
      output.out(`Copied entry #${outcome.id} to clipboard (${formatSize(outcome.byteSize)}).`);
      return;
    }

    case 'list': {
      const entries = listClips(ctx, {
        limit: command.limit,
        offset: command.offset,
        label: command.label,
        days: command.days,
        contentType: command.type,
      });
      output.out(entries.length === 0 ? 'No entries in clipboard history.' : renderClips(entries));
      return;
    }

    case 'search': {
      const entries = searchClips(ctx, {
        query: command.query,
        limit: command.limit,
        days: command.days,
        contentType: command.type,
      });
      output.out(entries.length === 0 ? `No results for "${command.query}".` : renderClips(entries));
      return;
    }

    case 'label': {
      const outcome = labelClip(ctx, { id: command.id, label: command.label });
      output.out(
        outcome.label !== null
          ? `Entry #${outcome.id} labeled "${outcome.label}".`
          : `Label removed from entry #${outcome.id}.`
      );
      return;
    }

    case 'delete': {
      const outcome = await deleteClip(ctx, { id: command.id, force: command.force });
      output.out(outcome.status === 'deleted' ? `Deleted entry #${outcome.id}.` : 'Aborted.');
      return;
    }

    case 'clear': {
      const outcome = await clearClips(ctx, { force: command.force });
      output.out(outcome.status === 'cleared' ? `Cleared ${outcome.count} entries.` : 'Aborted.');
      return;
    }
  }
}

export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  let handle: StoreHandle | undefined;

  try {
    const command = parseCommandLine(argv);
    if (command.name === 'help') {
      deps.output.out(USAGE);
      return 0;
    }

    handle = deps.openStore();
    await execute(
      command,
      { store: handle.store, clipboard: deps.clipboard, confirm: deps.confirm, now: deps.now },
      deps.output
    );
    return 0;
  } catch (error) {
    if (!(error instanceof ClipStashError)) {
      logError('Unexpected failure', error, { argv });
    }
    deps.output.err(`Error: ${normalizeUnknownError(error)}`);
    return 1;
  } finally {
    handle?.close();
  }
}
