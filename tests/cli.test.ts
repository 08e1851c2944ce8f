import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import {
  EXIT_CONVERSION_FAILED,
  EXIT_OK,
  EXIT_USAGE,
  parseCliArgs,
  parseSetEntry,
  parseSetValue,
  renderCliUsage,
  runCli,
  type CliIo,
} from '../src/cli.js';

function createIo(): CliIo & { out: string[]; err: string[] } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}

function assertParseError(args: readonly string[]): string {
  const result = parseCliArgs(args);
  if (result.ok) {
    throw new Error('Expected parse error but parsing succeeded');
  }
  return result.message;
}

describe('parseCliArgs', () => {
  test('parses an input and an output', () => {
    const result = parseCliArgs(['page.html', 'page.md']);
    if (!result.ok) throw new Error(result.message);

    expect(result.values).toEqual({
      positionals: ['page.html', 'page.md'],
      config: undefined,
      set: [],
      logLevel: undefined,
      batch: false,
      mcp: false,
      verbose: false,
      help: false,
      version: false,
    });
  });

  test('collects repeated --set entries and short aliases', () => {
    const result = parseCliArgs([
      '-c',
      'page2md.json',
      '--set',
      'wrap_width=80',
      '--set',
      'selection.min_score=10',
      '-v',
      'page.html',
    ]);
    if (!result.ok) throw new Error(result.message);

    expect(result.values.config).toBe('page2md.json');
    expect(result.values.verbose).toBe(true);
    expect(result.values.set).toEqual([
      ['wrap_width', 80],
      ['selection.min_score', 10],
    ]);
  });

  test('needs no input for --help, --version or --mcp', () => {
    expect(parseCliArgs(['--help']).ok).toBe(true);
    expect(parseCliArgs(['--version']).ok).toBe(true);
    expect(parseCliArgs(['--mcp']).ok).toBe(true);
  });

  test.each([
    [[], 'Missing input file'],
    [['a.html', 'b.md', 'c', 'd'], 'Too many arguments: c d'],
    [['--batch'], '--batch needs at least one input file'],
    [
      ['--set', 'broken', 'a.html'],
      'Invalid --set value "broken" (expected key=value)',
    ],
    [
      ['--log-level', 'loud', 'a.html'],
      'Invalid --log-level "loud" (expected error, warn, info, debug)',
    ],
  ])('%j → %s', (args, message) => {
    expect(assertParseError(args)).toBe(message);
  });

  test('rejects unknown options', () => {
    expect(assertParseError(['--nope', 'a.html'])).toMatch(/--nope/);
  });
});

describe('--set values', () => {
  test('parseSetValue reads JSON and falls back to the raw string', () => {
    expect(parseSetValue('80')).toBe(80);
    expect(parseSetValue('false')).toBe(false);
    expect(parseSetValue('["nav"]')).toEqual(['nav']);
    expect(parseSetValue('out/dir')).toBe('out/dir');
  });

  test('parseSetEntry splits at the first equals sign', () => {
    expect(parseSetEntry('content_selector=a[href="x"]')).toEqual([
      'content_selector',
      'a[href="x"]',
    ]);
    expect(parseSetEntry('=1')).toBeNull();
    expect(parseSetEntry('novalue')).toBeNull();
  });
});

describe('runCli', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(tmpdir(), 'page2md-cli-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function writePage(name: string, body: string): Promise<string> {
    const filePath = path.join(tempDir, name);
    await writeFile(filePath, `<html><body>${body}</body></html>`, 'utf8');
    return filePath;
  }

  test('prints usage for --help', async () => {
    const io = createIo();

    await expect(runCli(['--help'], io)).resolves.toBe(EXIT_OK);
    expect(io.out).toEqual([renderCliUsage()]);
  });

  test('prints the version', async () => {
    const io = createIo();

    await expect(runCli(['--version'], io)).resolves.toBe(EXIT_OK);
    expect(io.out).toEqual(['1.0.0\n']);
  });

  test('exits with a usage error and the help text', async () => {
    const io = createIo();

    await expect(runCli([], io)).resolves.toBe(EXIT_USAGE);
    expect(io.err).toEqual([
      `Error: Missing input file\n\n${renderCliUsage()}`,
    ]);
  });

  test('converts a file to the given output', async () => {
    const input = await writePage('page.html', '<h1>Hi</h1><p>World</p>');
    const output = path.join(tempDir, 'page.md');
    const io = createIo();

    await expect(runCli([input, output], io)).resolves.toBe(EXIT_OK);
    expect(io.out).toEqual([`Converted ${input} -> ${output} (0 warnings)\n`]);
    expect(await readFile(output, 'utf8')).toBe(
      '---\ntitle: Hi\n---\n\n# Hi\n\nWorld\n'
    );
  });

  test('lists warnings when verbose', async () => {
    const input = await writePage(
      'page.html',
      '<h1>Hi</h1><p>See <img src="gone.png" alt="Gone"></p>'
    );
    const output = path.join(tempDir, 'page.md');
    const io = createIo();

    await expect(runCli(['--verbose', input, output], io)).resolves.toBe(
      EXIT_OK
    );
    expect(io.out).toEqual([`Converted ${input} -> ${output} (1 warning)\n`]);
    expect(io.err).toEqual([
      '  warning [AssetResolutionWarning] Could not resolve local asset "gone.png"\n',
    ]);
  });

  test('reports a failed conversion', async () => {
    const missing = path.join(tempDir, 'missing.html');
    const io = createIo();

    await expect(runCli([missing], io)).resolves.toBe(EXIT_CONVERSION_FAILED);
    expect(io.err).toEqual([
      `Failed: ${missing} [input/INPUT_ERROR] Input file not found: ${missing}\n`,
    ]);
  });

  test('reports invalid configuration as a usage error', async () => {
    const input = await writePage('page.html', '<p>x</p>');
    const io = createIo();

    await expect(runCli(['--set', 'wrap_width=5', input], io)).resolves.toBe(
      EXIT_USAGE
    );
    expect(io.err).toHaveLength(1);
    expect(io.err[0]).toMatch(
      /^Configuration error: Invalid configuration in overrides: wrap_width: /
    );
  });

  test('converts a batch and prints a summary', async () => {
    const first = await writePage('first.html', '<h1>One</h1>');
    const second = await writePage('second.html', '<h1>Two</h1>');
    const outputDir = path.join(tempDir, 'out');
    const io = createIo();

    const args = ['--batch', first, second, '--set', `output_dir=${outputDir}`];

    await expect(runCli(args, io)).resolves.toBe(EXIT_OK);
    expect(io.out).toEqual([
      `Converted ${first} -> ${path.join(outputDir, 'first.md')} (0 warnings)\n`,
      `Converted ${second} -> ${path.join(outputDir, 'second.md')} (0 warnings)\n`,
      '2/2 converted, 0 failed\n',
    ]);
  });
});
