import { parseArgs } from 'util';

import { z } from 'zod';

import { DEFAULT_LIST_LIMIT, DEFAULT_SEARCH_LIMIT } from '../clipboard/constants';
import { parseContentType, type ContentType } from '../clipboard/content-type';
import { InvalidInputError, normalizeUnknownError } from '../errors';

export type CliCommand =
  | { name: 'store'; label?: string; type: ContentType }
  | { name: 'get'; id?: number }
  | {
      name: 'list';
      limit: number;
      offset: number;
      label?: string;
      days?: number;
      type?: ContentType;
    }
  | { name: 'search'; query: string; limit: number; days?: number; type?: ContentType }
  | { name: 'label'; id: number; label: string | null }
  | { name: 'delete'; id: number; force: boolean }
  | { name: 'clear'; force: boolean }
  | { name: 'help' };

export const USAGE = `Usage: clipstash <command> [options]

Commands:
  store [--label L] [--type text|password]   Save current clipboard to history
  get [ID]                                   Copy entry to clipboard (default: most recent)
  list [--limit N] [--offset N] [--label L] [--days D] [--type T]
                                             Show clipboard history as a table
  search QUERY [--limit N] [--days D] [--type T]
                                             Full-text search clipboard history
  label ID [LABEL]                           Set a label (omit LABEL to remove it)
  delete ID [--force]                        Delete a single entry
  clear [--force]                            Clear all clipboard history`;

const idSchema = z
  .string()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'is too large')
  .refine((value) => value > 0, 'must be a positive integer');

const countSchema = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(Number)
  .refine(Number.isSafeInteger, 'is too large');

function parseWith(schema: z.ZodType<number, z.ZodTypeDef, string>, name: string, value: string): number {
  const result = schema.safeParse(value);
  if (!result.success) {
    const reason = result.error.errors[0]?.message ?? 'is invalid';
    throw new InvalidInputError(`${name} ${reason} (got "${value}")`);
  }
  return result.data;
}

function optional<T>(value: string | undefined, parse: (raw: string) => T): T | undefined {
  return value === undefined ? undefined : parse(value);
}

const parseId = (value: string) => parseWith(idSchema, 'ID', value);
const parseCount = (name: string) => (value: string) => parseWith(countSchema, name, value);

function requirePositional(positionals: string[], index: number, name: string): string {
  const value = positionals[index];
  if (value === undefined) {
    throw new InvalidInputError(`missing ${name}`);
  }
  return value;
}

function rejectExtra(positionals: string[], max: number, command: string): void {
  if (positionals.length > max) {
    throw new InvalidInputError(`unexpected argument "${positionals[max]}" for ${command}`);
  }
}

function parseCommand(name: string, args: string[]): CliCommand {
  switch (name) {
    case 'store': {
      const { values, positionals } = parseArgs({
        args,
        options: {
          label: { type: 'string', short: 'l' },
          type: { type: 'string', short: 't' },
        },
        allowPositionals: true,
      });
      rejectExtra(positionals, 0, name);
      return {
        name,
        label: values.label,
        type: parseContentType(values.type ?? 'text'),
      };
    }

    case 'get': {
      const { positionals } = parseArgs({ args, options: {}, allowPositionals: true });
      rejectExtra(positionals, 1, name);
      return { name, id: optional(positionals[0], parseId) };
    }

    case 'list': {
      const { values, positionals } = parseArgs({
        args,
        options: {
          limit: { type: 'string', short: 'n' },
          offset: { type: 'string', short: 'o' },
          label: { type: 'string', short: 'l' },
          days: { type: 'string', short: 'd' },
          type: { type: 'string', short: 't' },
        },
        allowPositionals: true,
      });
      rejectExtra(positionals, 0, name);
      return {
        name,
        limit: optional(values.limit, parseCount('--limit')) ?? DEFAULT_LIST_LIMIT,
        offset: optional(values.offset, parseCount('--offset')) ?? 0,
        label: values.label,
        days: optional(values.days, parseCount('--days')),
        type: optional(values.type, parseContentType),
      };
    }

    case 'search': {
      const { values, positionals } = parseArgs({
        args,
        options: {
          limit: { type: 'string', short: 'n' },
          days: { type: 'string', short: 'd' },
          type: { type: 'string', short: 't' },
        },
        allowPositionals: true,
      });
      requirePositional(positionals, 0, 'QUERY');
      return {
        name,
        // Unquoted multi-word queries arrive as several positionals
        query: positionals.join(' '),
        limit: optional(values.limit, parseCount('--limit')) ?? DEFAULT_SEARCH_LIMIT,
        days: optional(values.days, parseCount('--days')),
        type: optional(values.type, parseContentType),
      };
    }

    case 'label': {
      const { positionals } = parseArgs({ args, options: {}, allowPositionals: true });
      rejectExtra(positionals, 2, name);
      return {
        name,
        id: parseId(requirePositional(positionals, 0, 'ID')),
        label: positionals[1] ?? null,
      };
    }

    case 'delete': {
      const { values, positionals } = parseArgs({
        args,
        options: { force: { type: 'boolean', short: 'f' } },
        allowPositionals: true,
      });
      rejectExtra(positionals, 1, name);
      return {
        name,
        id: parseId(requirePositional(positionals, 0, 'ID')),
        force: values.force ?? false,
      };
    }

    case 'clear': {
      const { values, positionals } = parseArgs({
        args,
        options: { force: { type: 'boolean', short: 'f' } },
        allowPositionals: true,
      });
      rejectExtra(positionals, 0, name);
      return { name, force: values.force ?? false };
    }

    case 'help':
    case '--help':
    case '-h':
      return { name: 'help' };

    default:
      throw new InvalidInputError(`unknown command "${name}"`);
  }
}

/**
 * Parse argv (without the node and script entries) into a command
 */
export function parseCommandLine(argv: string[]): CliCommand {
  const [name, ...args] = argv;
  if (name === undefined) {
    return { name: 'help' };
  }

  try {
    return parseCommand(name, args);
  } catch (error) {
    if (error instanceof InvalidInputError) throw error;
    // parseArgs reports unknown or malformed options as TypeErrors
    throw new InvalidInputError(normalizeUnknownError(error));
  }
}
