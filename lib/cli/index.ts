import { openDatabase } from '../../db';
import { ClipStore, systemClipboard } from '../clipboard';
import { loadConfig } from '../env-validation';
import { confirmOnTerminal } from './prompt';
import { runCli, type StoreHandle } from './run';

export { parseCommandLine, USAGE, type CliCommand } from './args';
export { confirmOnTerminal, isConsent } from './prompt';
export { runCli, type CliDependencies, type CliOutput, type StoreHandle } from './run';

function openConfiguredStore(): StoreHandle {
  const config = loadConfig();
  const database = openDatabase({
    path: config.databasePath,
    busyTimeoutMs: config.busyTimeoutMs,
  });
  return { store: new ClipStore(database), close: database.close };
}

/**
 * Run the CLI against the real clipboard and the per-user database
 */
export function main(argv: string[]): Promise<number> {
  return runCli(argv, {
    openStore: openConfiguredStore,
    clipboard: systemClipboard,
    confirm: (question) => confirmOnTerminal(question),
    output: {
      out: (line) => console.log(line),
      err: (line) => console.error(line),
    },
  });
}
