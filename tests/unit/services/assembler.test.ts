import {
  mkdir,
  mkdtemp,
  readdir,
  readFile,
  rm,
  writeFile,
} from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { buildConfig, getDefaultConfig } from '../../../src/config/index.js';
import { OutputError } from '../../../src/errors/index.js';
import {
  assembleMarkdown,
  buildFrontmatter,
  copyAssetSafely,
  placeAssets,
  toOutputReference,
  writeMarkdownFile,
} from '../../../src/services/assembler.js';
import { AssetMap } from '../../../src/services/asset-map.js';
import { Diagnostics } from '../../../src/services/diagnostics.js';

describe('assembler', () => {
  describe('buildFrontmatter', () => {
    test('writes a single field', () => {
      expect(buildFrontmatter({ title: 'Doc' })).toBe('---\ntitle: Doc\n---\n');
    });

    test('uses a fixed key order and lists tags', () => {
      expect(
        buildFrontmatter({ tags: ['a', 'b'], author: 'Ada', title: 'T' })
      ).toBe('---\ntitle: T\nauthor: Ada\ntags:\n  - a\n  - b\n---\n');
    });

    test('maps field names to snake_case keys', () => {
      expect(
        buildFrontmatter({
          canonicalUrl: 'https://example.com/a',
          siteName: 'Notes',
        })
      ).toBe('---\ncanonical_url: https://example.com/a\nsite_name: Notes\n---\n');
    });

    test('quotes values YAML would misread', () => {
      expect(buildFrontmatter({ title: 'Part 1: Basics' })).toBe(
        "---\ntitle: 'Part 1: Basics'\n---\n"
      );
    });

    test('returns an empty string without fields', () => {
      expect(buildFrontmatter({})).toBe('');
      expect(buildFrontmatter({ tags: [] })).toBe('');
    });
  });

  describe('assembleMarkdown', () => {
    test.each([
      ['---\ntitle: T\n---\n', '# T\n', '---\ntitle: T\n---\n\n# T\n'],
      ['---\ntitle: T\n---\n', '', '---\ntitle: T\n---\n'],
      ['', '# T\n', '# T\n'],
      ['', '', ''],
    ])('%j + %j', (frontmatter, body, expected) => {
      expect(assembleMarkdown(frontmatter, body)).toBe(expected);
    });
  });

  test('toOutputReference is relative and percent-encoded', () => {
    expect(
      toOutputReference('/out', '/out/assets/images/my pic (1).png')
    ).toBe('assets/images/my%20pic%20%281%29.png');
    expect(toOutputReference('/out/docs', '/out/assets/a.png')).toBe(
      '../assets/a.png'
    );
  });

  describe('on disk', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(path.join(tmpdir(), 'page2md-assembler-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    async function writeSource(
      relative: string,
      content: string
    ): Promise<string> {
      const filePath = path.join(tempDir, relative);
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, content);
      return filePath;
    }

    describe('copyAssetSafely', () => {
      test('reuses identical content and renames on a clash', async () => {
        const first = await writeSource('src/a.png', 'one');
        const clash = await writeSource('other/a.png', 'two');
        const target = path.join(tempDir, 'target');
        await mkdir(target);

        const copied = await copyAssetSafely(first, target);
        const again = await copyAssetSafely(first, target);
        const renamed = await copyAssetSafely(clash, target);

        expect(copied).toBe(path.join(target, 'a.png'));
        expect(again).toBe(copied);
        expect(renamed).toBe(path.join(target, 'a-1.png'));
        expect(await readFile(renamed, 'utf8')).toBe('two');
      });
    });

    describe('placeAssets', () => {
      test('copies resolved assets and records their references', async () => {
        const source = await writeSource('page_files/img/pic.png', 'png');
        const assets = new AssetMap();
        assets.add('page_files/img/pic.png', 'image', source);
        assets.add('missing.png', 'image', null);
        const outputFile = path.join(tempDir, 'out', 'page.md');

        const manifest = await placeAssets(
          assets,
          outputFile,
          getDefaultConfig(),
          new Diagnostics()
        );

        const destination = path.join(
          tempDir,
          'out',
          'assets',
          'images',
          'pic.png'
        );
        expect(manifest).toEqual([
          {
            reference: 'page_files/img/pic.png',
            source,
            destination,
            outputReference: 'assets/images/pic.png',
          },
        ]);
        expect(assets.referenceFor('page_files/img/pic.png')).toBe(
          'assets/images/pic.png'
        );
        expect(assets.get('page_files/img/pic.png')?.status).toBe('copied');
        expect(await readFile(destination, 'utf8')).toBe('png');
      });

      test('warns and keeps going when a copy fails', async () => {
        const assets = new AssetMap();
        assets.add('gone.png', 'image', path.join(tempDir, 'gone.png'));
        const diagnostics = new Diagnostics();

        const manifest = await placeAssets(
          assets,
          path.join(tempDir, 'page.md'),
          getDefaultConfig(),
          diagnostics
        );

        expect(manifest).toEqual([]);
        expect(assets.get('gone.png')?.status).toBe('copy_failed');
        expect(assets.referenceFor('gone.png')).toBe('gone.png');
        expect(diagnostics.warnings).toHaveLength(1);
        expect(diagnostics.warnings[0]).toMatchObject({
          kind: 'AssetCopyWarning',
          stage: 'output',
          reference: 'gone.png',
        });
        expect(diagnostics.warnings[0]?.message).toMatch(
          /^Could not copy asset "gone\.png": /
        );
      });

      test('copies nothing when images are not preserved', async () => {
        const source = await writeSource('a.png', 'png');
        const assets = new AssetMap();
        assets.add('a.png', 'image', source);
        const config = buildConfig({
          source: 'test',
          values: { preserve_images: false },
        });

        const manifest = await placeAssets(
          assets,
          path.join(tempDir, 'out', 'page.md'),
          config,
          new Diagnostics()
        );

        expect(manifest).toEqual([]);
        expect(assets.referenceFor('a.png')).toBe('a.png');
      });
    });

    describe('writeMarkdownFile', () => {
      test('creates the directory and leaves no temporary file', async () => {
        const outputPath = path.join(tempDir, 'nested', 'page.md');

        await writeMarkdownFile(outputPath, '# Hi\n');

        expect(await readFile(outputPath, 'utf8')).toBe('# Hi\n');
        expect(await readdir(path.join(tempDir, 'nested'))).toEqual([
          'page.md',
        ]);
      });

      test('raises OutputError when the target cannot be written', async () => {
        const blocker = await writeSource('blocker', 'not a directory');
        const outputPath = path.join(blocker, 'page.md');

        const result = writeMarkdownFile(outputPath, '# Hi\n');

        await expect(result).rejects.toThrow(OutputError);
        await expect(result).rejects.toThrow(
          `Cannot write output file ${outputPath}: `
        );
      });
    });
  });
});
