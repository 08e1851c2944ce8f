import { parseArgs } from 'node:util';

import {
  expandOverrideKeys,
  resolveConfig,
  serverInfo,
  type Config,
} from './config/index.js';
import { ConfigError } from './errors/index.js';
import { convertBatch, summarizeBatch } from './services/batch.js';
import {
  convertFile,
  type ConversionResult,
} from './services/converter.js';
import { setLogLevel, type LogLevel } from './services/logger.js';
import { getErrorMessage } from './utils/error-utils.js';

export const EXIT_OK = 0;
export const EXIT_CONVERSION_FAILED = 1;
export const EXIT_USAGE = 2;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface CliValues {
  readonly positionals: readonly string[];
  readonly config: string | undefined;
  readonly set: readonly (readonly [string, unknown])[];
  readonly logLevel: LogLevel | undefined;
  readonly batch: boolean;
  readonly mcp: boolean;
  readonly verbose: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

type CliParseResult = CliParseSuccess | CliParseFailure;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

const usageLines = [
  'page2md: convert saved HTML pages to Markdown',
  '',
  'Usage:',
  '  page2md <input.html> [output.md] [options]',
  '  page2md --batch <a.html> <b.html>... [options]',
  '  page2md --mcp',
  '',
  'Options:',
  '  --config, -c <file>  JSON configuration file.',
  '  --set key=value      Override a configuration key (repeatable, JSON values).',
  '  --log-level <level>  error, warn, info or debug.',
  '  --batch              Convert every positional input.',
  '  --mcp                Run the MCP server on stdio.',
  '  --verbose, -v        Debug logging.',
  '  --help, -h           Show this help message.',
  '  --version            Show the version.',
  '',
] as const;

const optionSchema = {
  config: { type: 'string', short: 'c' },
  set: { type: 'string', multiple: true },
  'log-level': { type: 'string' },
  batch: { type: 'boolean', default: false },
  mcp: { type: 'boolean', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', default: false },
} as const;

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON when it parses, the raw string otherwise.
 */
export function parseSetValue(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

export function parseSetEntry(
  entry: string
): readonly [string, unknown] | null {
  const separator = entry.indexOf('=');
  if (separator <= 0) return null;
  const key = entry.slice(0, separator).trim();
  if (!key) return null;
  return [key, parseSetValue(entry.slice(separator + 1))];
}

function validatePositionals(
  positionals: readonly string[],
  batch: boolean
): string | null {
  if (batch) {
    return positionals.length === 0
      ? '--batch needs at least one input file'
      : null;
  }
  if (positionals.length === 0) return 'Missing input file';
  if (positionals.length > 2) {
    return `Too many arguments: ${positionals.slice(2).join(' ')}`;
  }
  return null;
}

function runParseArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    options: optionSchema,
    strict: true,
    allowPositionals: true,
  });
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let parsed: ReturnType<typeof runParseArgs>;
  try {
    parsed = runParseArgs(args);
  } catch (error: unknown) {
    return { ok: false, message: getErrorMessage(error) };
  }

  const { values, positionals } = parsed;

  const set: (readonly [string, unknown])[] = [];
  for (const entry of values.set ?? []) {
    const parsedEntry = parseSetEntry(entry);
    if (!parsedEntry) {
      return {
        ok: false,
        message: `Invalid --set value "${entry}" (expected key=value)`,
      };
    }
    set.push(parsedEntry);
  }

  const rawLevel = values['log-level'];
  const logLevel =
    rawLevel === undefined ? undefined : isLogLevel(rawLevel) ? rawLevel : null;
  if (logLevel === null) {
    return {
      ok: false,
      message: `Invalid --log-level "${rawLevel}" (expected ${LOG_LEVELS.join(', ')})`,
    };
  }

  const cliValues: CliValues = {
    positionals,
    config: values.config,
    set,
    logLevel,
    batch: values.batch === true,
    mcp: values.mcp === true,
    verbose: values.verbose === true,
    help: values.help === true,
    version: values.version === true,
  };

  if (!cliValues.help && !cliValues.version && !cliValues.mcp) {
    const problem = validatePositionals(positionals, cliValues.batch);
    if (problem) return { ok: false, message: problem };
  }

  return { ok: true, values: cliValues };
}

function buildOverrides(values: CliValues): Record<string, unknown> {
  const entries: (readonly [string, unknown])[] = [...values.set];
  if (values.logLevel) entries.push(['log_level', values.logLevel]);
  return expandOverrideKeys(entries);
}

function formatResult(result: ConversionResult): {
  stream: 'stdout' | 'stderr';
  text: string;
} {
  if (result.status === 'failure') {
    return {
      stream: 'stderr',
      text: `Failed: ${result.inputPath} [${result.error.stage}/${result.error.code}] ${result.error.message}\n`,
    };
  }
  const count = result.warnings.length;
  return {
    stream: 'stdout',
    text: `Converted ${result.inputPath} -> ${result.outputPath} (${count} warning${count === 1 ? '' : 's'})\n`,
  };
}

function report(io: CliIo, result: ConversionResult, verbose: boolean): void {
  const { stream, text } = formatResult(result);
  io[stream](text);
  if (!verbose) return;
  for (const warning of result.warnings) {
    io.stderr(`  warning [${warning.kind}] ${warning.message}\n`);
  }
}

async function runConversion(
  values: CliValues,
  config: Config,
  io: CliIo
): Promise<number> {
  if (values.batch) {
    const results = await convertBatch(values.positionals, { config });
    for (const result of results) report(io, result, values.verbose);
    const summary = summarizeBatch(results);
    io.stdout(
      `${summary.succeeded}/${summary.total} converted, ${summary.failed} failed\n`
    );
    return summary.failed > 0 ? EXIT_CONVERSION_FAILED : EXIT_OK;
  }

  const [inputPath = '', outputPath] = values.positionals;
  const result = await convertFile(
    inputPath,
    outputPath ? { config, outputPath } : { config }
  );
  report(io, result, values.verbose);
  return result.status === 'failure' ? EXIT_CONVERSION_FAILED : EXIT_OK;
}

/**
 * Runs the command line and returns the process exit code.
 */
export async function runCli(
  args: readonly string[],
  io: CliIo = processIo
): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    io.stderr(`Error: ${parsed.message}\n\n${renderCliUsage()}`);
    return EXIT_USAGE;
  }

  const { values } = parsed;
  if (values.help) {
    io.stdout(renderCliUsage());
    return EXIT_OK;
  }
  if (values.version) {
    io.stdout(`${serverInfo.version}\n`);
    return EXIT_OK;
  }
  if (values.mcp) {
    const { startStdioServer } = await import('./server.js');
    await startStdioServer();
    return EXIT_OK;
  }

  let config: Config;
  try {
    config = await resolveConfig({
      ...(values.config ? { file: values.config } : {}),
      overrides: buildOverrides(values),
    });
  } catch (error: unknown) {
    if (error instanceof ConfigError) {
      io.stderr(`Configuration error: ${error.message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  setLogLevel(values.verbose ? 'debug' : config.logLevel);
  return runConversion(values, config, io);
}
