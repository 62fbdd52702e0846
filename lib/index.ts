/**
 * Library entry point
 * The same store and commands the CLI runs, for embedding in other tools
 */

export { openDatabase, IN_MEMORY_DATABASE, type ClipDatabase, type OpenDatabaseOptions } from '../db';
export { LATEST_SCHEMA_VERSION, getSchemaVersion, migrate } from '../db/migrations';
export * from './clipboard';
export * from './commands';
export * from './errors';
export { loadConfig, resolveDataDir, resolveDatabasePath, validateEnv, type ClipStashConfig } from './env-validation';
export { main, parseCommandLine, runCli, USAGE, type CliCommand, type CliDependencies } from './cli';
