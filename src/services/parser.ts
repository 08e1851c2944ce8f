import { readFile, stat } from 'node:fs/promises';

import { parseHTML } from 'linkedom';

import { InputError } from '../errors/index.js';
import { getErrorMessage, hasErrorCode } from '../utils/error-utils.js';
import { logDebug } from './logger.js';

const CHARSET_SNIFF_BYTES = 1024;
const CHARSET_PATTERN = /<meta[^>]+charset\s*=\s*["']?\s*([\w.:-]+)/i;
const MARKUP_PATTERN = /<[a-z!/]/i;
const LEADING_PROLOG_PATTERN = /^(?:\s+|<!--[\s\S]*?-->|<\?[\s\S]*?\?>)*/;

export interface HtmlSource {
  readonly path: string;
  readonly html: string;
  readonly encoding: string;
  readonly byteLength: number;
}

function decodeWithCharset(
  buffer: Buffer,
  charset: string,
  fatal = false
): string | null {
  try {
    return new TextDecoder(charset, { fatal }).decode(buffer);
  } catch (error: unknown) {
    logDebug('Could not decode with charset', {
      charset,
      error: getErrorMessage(error),
    });
    return null;
  }
}

/**
 * Strict UTF-8 first, then the declared `<meta charset>`, then Latin-1.
 */
export function decodeHtmlBuffer(buffer: Buffer): {
  html: string;
  encoding: string;
} {
  const utf8 = decodeWithCharset(buffer, 'utf-8', true);
  if (utf8 !== null) return { html: utf8, encoding: 'utf-8' };

  const head = buffer.subarray(0, CHARSET_SNIFF_BYTES).toString('latin1');
  const declared = CHARSET_PATTERN.exec(head)?.[1]?.toLowerCase();
  if (declared && declared !== 'utf-8' && declared !== 'utf8') {
    const html = decodeWithCharset(buffer, declared);
    if (html !== null) return { html, encoding: declared };
  }

  return { html: buffer.toString('latin1'), encoding: 'latin1' };
}

/**
 * Reads and decodes an HTML file. Missing, unreadable, empty and binary
 * files raise InputError.
 */
export async function readHtmlInput(path: string): Promise<HtmlSource> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new InputError(`Input path is not a file: ${path}`, path);
    }
  } catch (error: unknown) {
    if (error instanceof InputError) throw error;
    const message = hasErrorCode(error, 'ENOENT')
      ? `Input file not found: ${path}`
      : `Cannot access input file ${path}: ${getErrorMessage(error)}`;
    throw new InputError(message, path, { cause: error });
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(path);
  } catch (error: unknown) {
    throw new InputError(
      `Cannot read input file ${path}: ${getErrorMessage(error)}`,
      path,
      { cause: error }
    );
  }

  if (buffer.length === 0) {
    throw new InputError(`Input file is empty: ${path}`, path);
  }
  if (buffer.includes(0)) {
    throw new InputError(
      `Input file looks binary, not HTML: ${path}`,
      path
    );
  }

  const { html, encoding } = decodeHtmlBuffer(buffer);
  if (!MARKUP_PATTERN.test(html)) {
    throw new InputError(`Input file contains no HTML markup: ${path}`, path);
  }

  logDebug('Read HTML input', { path, encoding, bytes: buffer.length });
  return { path, html, encoding, byteLength: buffer.length };
}

function needsDocumentWrapper(html: string): boolean {
  const trimmed = html.replace(LEADING_PROLOG_PATTERN, '').toLowerCase();
  return (
    !trimmed.startsWith('<!doctype') &&
    !trimmed.startsWith('<html') &&
    !trimmed.startsWith('<head') &&
    !trimmed.startsWith('<body')
  );
}

export function wrapHtmlFragment(html: string): string {
  return `<!DOCTYPE html><html><head></head><body>${html}</body></html>`;
}

export function parseHtmlDocument(html: string): Document {
  const source = needsDocumentWrapper(html) ? wrapHtmlFragment(html) : html;
  const { document } = parseHTML(source);
  return document;
}

/**
 * Body when present, else the document element. Avoids `document.body`,
 * which may create missing elements.
 */
export function getDocumentRoot(document: Document): Element {
  return document.querySelector('body') ?? document.documentElement;
}
