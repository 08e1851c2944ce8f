import { stat } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { Config } from '../config/index.js';
import {
  extractFirstSrcsetUrl,
  isDataUri,
  resolveImageSource,
} from '../transform/image-source.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { AssetMap, type AssetKind } from './asset-map.js';
import type { Diagnostics } from './diagnostics.js';
import { logDebug } from './logger.js';

const URL_SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:/i;
const WINDOWS_DRIVE_PATTERN = /^[a-z]:[\\/]/i;

export interface AssetReference {
  readonly reference: string;
  readonly kind: AssetKind;
}

export interface ResolveAssetsOptions {
  /** HTML file the references are relative to; null for detached content. */
  readonly htmlPath: string | null;
  /** Directory relative references resolve against; defaults to the HTML file's. */
  readonly baseDir?: string | null;
  readonly document: Document;
  readonly config: Config;
  readonly diagnostics: Diagnostics;
}

/**
 * Remote, protocol-relative, in-page and inline references are not local
 * assets.
 */
export function isLocalReference(reference: string): boolean {
  const trimmed = reference.trim();
  if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('//')) {
    return false;
  }
  if (isDataUri(trimmed)) return false;
  if (/^file:/i.test(trimmed) || WINDOWS_DRIVE_PATTERN.test(trimmed)) {
    return true;
  }
  return !URL_SCHEME_PATTERN.test(trimmed);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Filesystem path a reference points at: query and fragment stripped,
 * percent-decoded, `file:` URLs converted.
 */
export function referenceToPath(reference: string): string | null {
  const trimmed = reference.trim();
  if (/^file:/i.test(trimmed)) {
    try {
      return fileURLToPath(trimmed.split(/[?#]/)[0] ?? trimmed);
    } catch (error: unknown) {
      logDebug('Invalid file URL reference', {
        reference,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  const withoutSuffix = trimmed.split(/[?#]/)[0] ?? '';
  const decoded = safeDecode(withoutSuffix);
  return decoded.length > 0 ? decoded : null;
}

async function isRegularFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * First existing sibling asset directory for an HTML file, trying the
 * patterns in order (`{stem}` = name without extension, `{name}` = file name).
 */
export async function findAssetDirectory(
  htmlPath: string,
  patterns: readonly string[]
): Promise<string | null> {
  const { dir, name: stem, base: name } = path.parse(path.resolve(htmlPath));
  for (const pattern of patterns) {
    const dirName = pattern
      .replaceAll('{stem}', stem)
      .replaceAll('{name}', name);
    const candidate = path.join(dir, dirName);
    if (await isDirectory(candidate)) return candidate;
  }
  return null;
}

function fileExtension(reference: string): string {
  const pathPart = reference.split(/[?#]/)[0] ?? '';
  const base = pathPart.split('/').pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}

/**
 * Asset references in document order, each listed once.
 */
export function collectAssetReferences(
  document: Document,
  config: Config
): AssetReference[] {
  const selector = config.includeLinkedFiles
    ? 'img, picture source[srcset], a[href]'
    : 'img, picture source[srcset]';
  const linkedExtensions = new Set(config.linkedFileExtensions);
  const seen = new Set<string>();
  const references: AssetReference[] = [];

  const push = (reference: string, kind: AssetKind): void => {
    if (!reference || seen.has(reference)) return;
    seen.add(reference);
    references.push({ reference, kind });
  };

  for (const element of document.querySelectorAll(selector)) {
    const tagName = element.tagName.toUpperCase();
    if (tagName === 'IMG') {
      push(
        resolveImageSource((name) => element.getAttribute(name)),
        'image'
      );
    } else if (tagName === 'SOURCE') {
      const srcset = element.getAttribute('srcset') ?? '';
      push(extractFirstSrcsetUrl(srcset), 'image');
    } else {
      const href = element.getAttribute('href')?.trim() ?? '';
      if (
        isLocalReference(href) &&
        linkedExtensions.has(fileExtension(href))
      ) {
        push(href, 'file');
      }
    }
  }

  return references;
}

function candidatePaths(
  filePath: string,
  assetDir: string | null,
  baseDir: string
): string[] {
  const candidates: string[] = [];
  const relative = filePath.replace(/^(?:\.\/)+/, '');
  if (assetDir && !path.isAbsolute(filePath)) {
    candidates.push(path.join(assetDir, relative));
  }
  if (assetDir) {
    candidates.push(path.join(assetDir, path.basename(relative)));
  }
  candidates.push(
    path.isAbsolute(filePath) ? filePath : path.resolve(baseDir, filePath)
  );
  return [...new Set(candidates)];
}

async function resolveReference(
  reference: string,
  assetDir: string | null,
  baseDir: string | null
): Promise<string | null> {
  const filePath = referenceToPath(reference);
  if (filePath === null) return null;
  if (baseDir === null && !path.isAbsolute(filePath)) return null;

  for (const candidate of candidatePaths(filePath, assetDir, baseDir ?? '/')) {
    if (await isRegularFile(candidate)) return path.resolve(candidate);
  }
  return null;
}

/**
 * Builds the AssetMap for a document. Unresolved local references are kept
 * with a null path and reported once each.
 */
export async function resolveAssets(
  options: ResolveAssetsOptions
): Promise<AssetMap> {
  const { htmlPath, document, config, diagnostics } = options;
  const baseDir = options.baseDir
    ? path.resolve(options.baseDir)
    : htmlPath
      ? path.dirname(path.resolve(htmlPath))
      : null;
  const assetDir = htmlPath
    ? await findAssetDirectory(htmlPath, config.assetDirPatterns)
    : null;

  logDebug('Resolving assets', { htmlPath, assetDir });

  const assets = new AssetMap();
  for (const { reference, kind } of collectAssetReferences(document, config)) {
    if (!isLocalReference(reference)) continue;

    const resolvedPath = await resolveReference(reference, assetDir, baseDir);
    assets.add(reference, kind, resolvedPath);
    if (resolvedPath === null) {
      diagnostics.warn(
        'AssetResolutionWarning',
        'assets',
        `Could not resolve local asset "${reference}"`,
        reference
      );
    }
  }

  return assets;
}
