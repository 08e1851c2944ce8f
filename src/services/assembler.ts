import { randomUUID } from 'node:crypto';
import { constants as fsConstants } from 'node:fs';
import {
  copyFile,
  mkdir,
  readFile,
  rename,
  rm,
  stat,
  writeFile,
} from 'node:fs/promises';
import path from 'node:path';

import { dump } from 'js-yaml';

import type { Config } from '../config/index.js';
import { OutputError } from '../errors/index.js';
import type { Metadata } from '../transform/metadata.js';
import { getErrorMessage, hasErrorCode } from '../utils/error-utils.js';
import type { AssetMap } from './asset-map.js';
import type { Diagnostics } from './diagnostics.js';
import { logDebug } from './logger.js';

const MAX_NAME_ATTEMPTS = 1000;

export interface ManifestEntry {
  readonly reference: string;
  readonly source: string;
  readonly destination: string;
  readonly outputReference: string;
}

// ---------------------------------------------------------------------------
// Frontmatter
// ---------------------------------------------------------------------------

const FRONTMATTER_FIELDS = [
  ['title', 'title'],
  ['author', 'author'],
  ['publishedDate', 'published_date'],
  ['description', 'description'],
  ['canonicalUrl', 'canonical_url'],
  ['siteName', 'site_name'],
  ['tags', 'tags'],
] as const satisfies readonly (readonly [keyof Metadata, string])[];

/**
 * YAML block between `---` lines; only fields with a value, in a fixed
 * order. Empty string when no field is set.
 */
export function buildFrontmatter(metadata: Metadata): string {
  const data: Record<string, string | readonly string[]> = {};
  for (const [field, key] of FRONTMATTER_FIELDS) {
    const value = metadata[field];
    if (value === undefined || value.length === 0) continue;
    data[key] = value;
  }
  if (Object.keys(data).length === 0) return '';

  return `---\n${dump(data, { lineWidth: -1, noRefs: true })}---\n`;
}

export function assembleMarkdown(frontmatter: string, body: string): string {
  if (!frontmatter) return body;
  return body ? `${frontmatter}\n${body}` : frontmatter;
}

// ---------------------------------------------------------------------------
// Asset placement
// ---------------------------------------------------------------------------

/**
 * Relative POSIX path, percent-encoded so it survives as a Markdown link
 * destination.
 */
export function toOutputReference(
  fromDir: string,
  destination: string
): string {
  const relative = path
    .relative(fromDir, destination)
    .split(path.sep)
    .join('/');
  return encodeURI(relative).replace(/\(/g, '%28').replace(/\)/g, '%29');
}

async function hasSameContent(
  source: string,
  candidate: string
): Promise<boolean> {
  const [sourceStats, candidateStats] = await Promise.all([
    stat(source),
    stat(candidate),
  ]);
  if (!candidateStats.isFile() || sourceStats.size !== candidateStats.size) {
    return false;
  }
  const [left, right] = await Promise.all([
    readFile(source),
    readFile(candidate),
  ]);
  return left.equals(right);
}

export function candidateName(fileName: string, attempt: number): string {
  if (attempt === 0) return fileName;
  const { name, ext } = path.parse(fileName);
  return `${name}-${attempt}${ext}`;
}

/**
 * Copies `source` into `directory` under its own name, or `name-N.ext` when
 * the name is taken by different content. A destination with identical
 * bytes is reused.
 */
export async function copyAssetSafely(
  source: string,
  directory: string
): Promise<string> {
  const fileName = path.basename(source);

  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt += 1) {
    const destination = path.join(directory, candidateName(fileName, attempt));
    try {
      await copyFile(source, destination, fsConstants.COPYFILE_EXCL);
      return destination;
    } catch (error: unknown) {
      if (!hasErrorCode(error, 'EEXIST')) throw error;
      if (await hasSameContent(source, destination)) return destination;
    }
  }

  throw new Error(`No free file name for ${fileName} in ${directory}`);
}

export function resolveImagesDirectory(
  outputFile: string,
  config: Config
): string {
  return path.resolve(path.dirname(path.resolve(outputFile)), config.imagesDir);
}

/**
 * Copies every resolved asset next to the output file and records the new
 * references in the AssetMap. Returns the manifest in document order.
 */
export async function placeAssets(
  assets: AssetMap,
  outputFile: string,
  config: Config,
  diagnostics: Diagnostics
): Promise<ManifestEntry[]> {
  if (!config.preserveImages) return [];

  const resolved = assets.resolved();
  if (resolved.length === 0) return [];

  const outputDir = path.dirname(path.resolve(outputFile));
  const imagesDir = resolveImagesDirectory(outputFile, config);
  const manifest: ManifestEntry[] = [];

  for (const entry of resolved) {
    if (entry.resolvedPath === null) continue;
    try {
      await mkdir(imagesDir, { recursive: true });
      const destination = await copyAssetSafely(entry.resolvedPath, imagesDir);
      const outputReference = toOutputReference(outputDir, destination);
      assets.assignDestination(entry.reference, destination, outputReference);
      manifest.push({
        reference: entry.reference,
        source: entry.resolvedPath,
        destination,
        outputReference,
      });
    } catch (error: unknown) {
      assets.markCopyFailed(entry.reference);
      diagnostics.warn(
        'AssetCopyWarning',
        'output',
        `Could not copy asset "${entry.reference}": ${getErrorMessage(error)}`,
        entry.reference
      );
    }
  }

  logDebug('Placed assets', { count: manifest.length, imagesDir });
  return manifest;
}

// ---------------------------------------------------------------------------
// Output file
// ---------------------------------------------------------------------------

/**
 * Writes through a temporary sibling, then renames it over the target.
 */
export async function writeMarkdownFile(
  outputPath: string,
  content: string
): Promise<void> {
  const target = path.resolve(outputPath);
  const directory = path.dirname(target);
  const tempPath = path.join(
    directory,
    `.${path.basename(target)}.${randomUUID()}.tmp`
  );

  try {
    await mkdir(directory, { recursive: true });
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, target);
  } catch (error: unknown) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logDebug('Could not remove temporary output file', {
        tempPath,
        error: getErrorMessage(cleanupError),
      });
    });
    throw new OutputError(
      `Cannot write output file ${target}: ${getErrorMessage(error)}`,
      target,
      { cause: error }
    );
  }
}
