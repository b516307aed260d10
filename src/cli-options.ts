import * as path from 'path';
import { parseArgs } from 'util';
import type { LogLevel } from './types.js';
import { ValidationError } from './utils.js';

export const USAGE = `
🔧 Repair Order Ingest

Usage:
  repair-ingest [--data-dir <path>] [--verbose | --quiet]

Options:
  -d, --data-dir <path>  Directory of XML event documents (default: ../data)
  -v, --verbose          Log debug detail, including discarded reports
  -q, --quiet            Log errors only
  -h, --help             Show this message

Examples:
  repair-ingest
  repair-ingest --data-dir ./data --verbose
`;

export interface CliOptions {
  help: boolean;
  dataDir?: string;
  logLevel?: LogLevel;
}

const OPTIONS = {
  'data-dir': { type: 'string', short: 'd' },
  verbose: { type: 'boolean', short: 'v' },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(args: string[]) {
  return parseArgs({ args, options: OPTIONS, strict: true, allowPositionals: false });
}

export function parseCliArgs(args: string[], cwd: string = process.cwd()): CliOptions {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(args);
  } catch (error: unknown) {
    throw new ValidationError(error instanceof Error ? error.message : String(error), { args });
  }
  const { values } = parsed;

  if (values.verbose && values.quiet) {
    throw new ValidationError('--verbose and --quiet cannot be used together', { args });
  }

  const dataDir = values['data-dir'];
  if (dataDir !== undefined && dataDir.trim() === '') {
    throw new ValidationError('--data-dir needs a path', { args });
  }

  return {
    help: values.help ?? false,
    dataDir: dataDir === undefined ? undefined : path.resolve(cwd, dataDir),
    logLevel: values.verbose ? 'debug' : values.quiet ? 'error' : undefined,
  };
}
