/**
 * Command-line argument parsing for the techdoc-rag CLI
 */

import {
  LogFormatSchema,
  RerankBackend,
  parseLogFormat,
  type LogFormat,
  type MetadataFilter,
  type MetadataValue,
} from '@techdoc-rag/lib';

// =============================================================================
// Types
// =============================================================================

export interface GlobalOptions {
  verbose: boolean;
  quiet: boolean;
  logFormat: LogFormat;
}

export type CliCommand =
  | { command: 'help' }
  | { command: 'create-db'; database: string }
  | { command: 'list-dbs' }
  | { command: 'delete-db'; database: string }
  | {
      command: 'ingest';
      database: string;
      paths: string[];
      metadata: Record<string, string>;
      documentId?: string;
    }
  | {
      command: 'search';
      database: string;
      query: string;
      topK?: number;
      filter: MetadataFilter;
      rerank?: RerankBackend;
      keywordBoost: boolean;
    }
  | { command: 'list-docs'; database: string }
  | { command: 'delete-doc'; database: string; documentId: string };

export type ParsedArgs = GlobalOptions & { cli: CliCommand };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// =============================================================================
// Values
// =============================================================================

/**
 * Split `key=value`; the value may itself contain `=`
 */
export function parseKeyValue(raw: string, flag: string): [string, string] {
  const index = raw.indexOf('=');
  if (index <= 0) {
    throw new CliUsageError(`${flag} expects key=value, got "${raw}"`);
  }
  return [raw.slice(0, index), raw.slice(index + 1)];
}

/**
 * Integer-looking filter values become numbers so `page=12` matches the
 * stored page number.
 */
export function parseFilterValue(value: string): MetadataValue {
  return /^-?\d+$/.test(value) ? Number.parseInt(value, 10) : value;
}

function parsePositiveInt(value: string, flag: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) < 1) {
    throw new CliUsageError(`${flag} expects a positive integer, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

// =============================================================================
// Parsing
// =============================================================================

const VALUE_FLAGS = new Set(['--meta', '--document-id', '--top-k', '--filter', '--log-format']);

interface RawArgs {
  positionals: string[];
  flags: Map<string, string[]>;
  switches: Set<string>;
}

/**
 * Separate positionals, repeatable value flags (`--flag v` or `--flag=v`)
 * and boolean switches.
 */
function tokenize(argv: readonly string[]): RawArgs {
  const raw: RawArgs = { positionals: [], flags: new Map(), switches: new Set() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    if (!arg.startsWith('-') || arg === '-') {
      raw.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq > 0 ? arg.slice(0, eq) : arg;
    if (!VALUE_FLAGS.has(name)) {
      if (eq > 0) {
        throw new CliUsageError(`${name} does not take a value`);
      }
      raw.switches.add(name === '-h' ? '--help' : name);
      continue;
    }

    let value: string | undefined;
    if (eq > 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined) {
      throw new CliUsageError(`${name} requires a value`);
    }
    const values = raw.flags.get(name) ?? [];
    values.push(value);
    raw.flags.set(name, values);
  }
  return raw;
}

const KNOWN_SWITCHES: Record<string, ReadonlySet<string>> = {
  ingest: new Set(),
  search: new Set(['--rerank', '--rerank-local', '--rerank-bge', '--keyword-boost']),
};

const GLOBAL_SWITCHES = new Set(['--verbose', '--quiet', '--help']);

function lastFlag(raw: RawArgs, name: string): string | undefined {
  return raw.flags.get(name)?.at(-1);
}

function expectPositionals(positionals: string[], count: number, usage: string): string[] {
  if (positionals.length !== count) {
    throw new CliUsageError(`Usage: ${usage}`);
  }
  return positionals;
}

function resolveRerank(switches: Set<string>): RerankBackend | undefined {
  const selected: RerankBackend[] = [];
  if (switches.has('--rerank')) selected.push(RerankBackend.COHERE);
  if (switches.has('--rerank-local')) selected.push(RerankBackend.LOCAL);
  if (switches.has('--rerank-bge')) selected.push(RerankBackend.BGE);
  if (selected.length > 1) {
    throw new CliUsageError('Choose one of --rerank, --rerank-local or --rerank-bge');
  }
  return selected[0];
}

function parseCommand(command: string, rest: string[], raw: RawArgs): CliCommand {
  switch (command) {
    case 'create-db': {
      const [database = ''] = expectPositionals(rest, 1, 'create-db <name>');
      return { command: 'create-db', database };
    }
    case 'list-dbs':
      expectPositionals(rest, 0, 'list-dbs');
      return { command: 'list-dbs' };
    case 'delete-db': {
      const [database = ''] = expectPositionals(rest, 1, 'delete-db <name>');
      return { command: 'delete-db', database };
    }
    case 'ingest': {
      const [database, ...paths] = rest;
      if (!database || paths.length === 0) {
        throw new CliUsageError('Usage: ingest <db> <path...> [--meta key=value]... [--document-id id]');
      }
      const documentId = lastFlag(raw, '--document-id');
      if (documentId !== undefined && paths.length > 1) {
        throw new CliUsageError('--document-id can only be used with a single file');
      }
      const metadata: Record<string, string> = {};
      for (const entry of raw.flags.get('--meta') ?? []) {
        const [key, value] = parseKeyValue(entry, '--meta');
        metadata[key] = value;
      }
      return {
        command: 'ingest',
        database,
        paths,
        metadata,
        ...(documentId !== undefined ? { documentId } : {}),
      };
    }
    case 'search': {
      const [database = '', query = ''] = expectPositionals(
        rest,
        2,
        'search <db> "<query>" [--top-k N] [--filter key=value]... [--rerank | --rerank-local | --rerank-bge] [--keyword-boost]'
      );
      const topK = lastFlag(raw, '--top-k');
      const filter: Record<string, MetadataValue> = {};
      for (const entry of raw.flags.get('--filter') ?? []) {
        const [key, value] = parseKeyValue(entry, '--filter');
        filter[key] = parseFilterValue(value);
      }
      const rerank = resolveRerank(raw.switches);
      return {
        command: 'search',
        database,
        query,
        filter,
        keywordBoost: raw.switches.has('--keyword-boost'),
        ...(topK !== undefined ? { topK: parsePositiveInt(topK, '--top-k') } : {}),
        ...(rerank ? { rerank } : {}),
      };
    }
    case 'list-docs': {
      const [database = ''] = expectPositionals(rest, 1, 'list-docs <db>');
      return { command: 'list-docs', database };
    }
    case 'delete-doc': {
      const [database = '', documentId = ''] = expectPositionals(rest, 2, 'delete-doc <db> <documentId>');
      return { command: 'delete-doc', database, documentId };
    }
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}

/**
 * @throws {CliUsageError} on unknown commands, flags or malformed values
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const raw = tokenize(argv);

  const formatValue = lastFlag(raw, '--log-format') ?? 'pretty';
  const logFormat = parseLogFormat(formatValue);
  if (!logFormat) {
    throw new CliUsageError(
      `--log-format must be one of ${LogFormatSchema.options.join(', ')}, got "${formatValue}"`
    );
  }
  const options: GlobalOptions = {
    verbose: raw.switches.has('--verbose'),
    quiet: raw.switches.has('--quiet'),
    logFormat,
  };

  const [command, ...rest] = raw.positionals;
  if (raw.switches.has('--help') || command === undefined || command === 'help') {
    return { ...options, cli: { command: 'help' } };
  }

  const allowed = KNOWN_SWITCHES[command] ?? new Set<string>();
  for (const name of raw.switches) {
    if (!GLOBAL_SWITCHES.has(name) && !allowed.has(name)) {
      throw new CliUsageError(`Unknown option ${name} for ${command}`);
    }
  }

  return { ...options, cli: parseCommand(command, rest, raw) };
}
