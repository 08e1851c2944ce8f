import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { InputError } from '../../../src/errors/index.js';
import {
  decodeHtmlBuffer,
  getDocumentRoot,
  parseHtmlDocument,
  readHtmlInput,
  wrapHtmlFragment,
} from '../../../src/services/parser.js';

describe('parser', () => {
  describe('decodeHtmlBuffer', () => {
    test('decodes valid UTF-8', () => {
      const result = decodeHtmlBuffer(Buffer.from('<p>café</p>', 'utf8'));

      expect(result).toEqual({ html: '<p>café</p>', encoding: 'utf-8' });
    });

    test('falls back to the declared charset', () => {
      const buffer = Buffer.from(
        '<meta charset="windows-1252"><p>caf\u00e9</p>',
        'latin1'
      );

      const result = decodeHtmlBuffer(buffer);

      expect(result.encoding).toBe('windows-1252');
      expect(result.html).toBe('<meta charset="windows-1252"><p>café</p>');
    });

    test('falls back to latin1 without a declaration', () => {
      const buffer = Buffer.from('<p>na\u00efve</p>', 'latin1');

      expect(decodeHtmlBuffer(buffer)).toEqual({
        html: '<p>naïve</p>',
        encoding: 'latin1',
      });
    });
  });

  describe('readHtmlInput', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(tmpdir(), 'page2md-parser-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    test('reads an HTML file', async () => {
      const file = path.join(dir, 'page.html');
      await writeFile(file, '<html><body><p>Hi</p></body></html>');

      const source = await readHtmlInput(file);

      expect(source).toEqual({
        path: file,
        html: '<html><body><p>Hi</p></body></html>',
        encoding: 'utf-8',
        byteLength: 35,
      });
    });

    test('rejects a missing file', async () => {
      const file = path.join(dir, 'missing.html');

      await expect(readHtmlInput(file)).rejects.toThrow(
        `Input file not found: ${file}`
      );
    });

    test('rejects a directory', async () => {
      const sub = path.join(dir, 'folder.html');
      await mkdir(sub);

      await expect(readHtmlInput(sub)).rejects.toThrow(
        `Input path is not a file: ${sub}`
      );
    });

    test('rejects an empty file', async () => {
      const file = path.join(dir, 'empty.html');
      await writeFile(file, '');

      await expect(readHtmlInput(file)).rejects.toThrow(
        `Input file is empty: ${file}`
      );
    });

    test('rejects binary content', async () => {
      const file = path.join(dir, 'image.html');
      await writeFile(file, Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x0a]));

      await expect(readHtmlInput(file)).rejects.toThrow(
        `Input file looks binary, not HTML: ${file}`
      );
    });

    test('rejects text without markup', async () => {
      const file = path.join(dir, 'notes.html');
      await writeFile(file, 'just some notes');

      const error = await readHtmlInput(file).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(InputError);
      expect(error).toMatchObject({
        message: `Input file contains no HTML markup: ${file}`,
        code: 'INPUT_ERROR',
        stage: 'input',
        path: file,
      });
    });
  });

  describe('parseHtmlDocument', () => {
    test('wraps fragments in a document', () => {
      const document = parseHtmlDocument('<p>Hi</p>');

      expect(document.querySelector('body > p')?.textContent).toBe('Hi');
    });

    test('keeps full documents with a leading comment', () => {
      const document = parseHtmlDocument(
        '<!-- saved from url=(0014)about:internet -->\n<html><head><title>T</title></head><body><p>x</p></body></html>'
      );

      expect(document.querySelector('title')?.textContent).toBe('T');
      expect(getDocumentRoot(document).tagName).toBe('BODY');
    });

    test('wrapHtmlFragment builds a minimal document', () => {
      expect(wrapHtmlFragment('<b>x</b>')).toBe(
        '<!DOCTYPE html><html><head></head><body><b>x</b></body></html>'
      );
    });
  });
});
