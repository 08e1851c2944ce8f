import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { ConfigError } from '../errors/index.js';
import { logWarn } from '../services/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { isPlainObject } from '../utils/type-guards.js';
import {
  configLayerSchema,
  DEFAULT_RAW_CONFIG,
  rawConfigSchema,
} from './schema.js';
import type { Config } from './types.js';

export type {
  Config,
  SelectionWeights,
  MetadataOverrides,
  WrapWidth,
  CodeFence,
  LinkStyle,
} from './types.js';
export { CONFIG_KEYS } from './schema.js';

type ResolvedRawConfig = z.output<typeof rawConfigSchema>;

export interface ResolveConfigOptions {
  /** Path of a JSON configuration file. */
  readonly file?: string;
  /** Inline overrides in snake_case, applied after the file. */
  readonly overrides?: Record<string, unknown>;
}

function readPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf8')
    );
    if (isPlainObject(raw) && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error: unknown) {
    logWarn('Could not read package version', {
      error: getErrorMessage(error),
    });
  }
  return '0.0.0';
}

export const serverInfo = {
  name: 'page2md',
  version: readPackageVersion(),
} as const;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.map(String).join('.');
    return `${location || '(root)'}: ${issue.message}`;
  });
}

function validateLayer(
  layer: unknown,
  source: string
): Record<string, unknown> {
  const result = configLayerSchema.safeParse(layer);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(
      `Invalid configuration in ${source}: ${issues.join('; ')}`,
      issues
    );
  }
  return result.data;
}

function mergeLayer(
  base: Record<string, unknown>,
  layer: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(layer)) {
    if (value === undefined) continue;
    const current = merged[key];
    // nested objects merge per key, arrays and scalars replace
    if (isPlainObject(current) && isPlainObject(value)) {
      merged[key] = mergeLayer(current, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function toConfig(raw: ResolvedRawConfig): Config {
  const overrides = raw.metadata_overrides;
  return {
    outputDir: raw.output_dir,
    imagesDir: raw.images_dir,
    preserveImages: raw.preserve_images,
    cleanHtml: raw.clean_html,
    addMetadata: raw.add_metadata,
    logLevel: raw.log_level,
    headingOffset: raw.heading_offset,
    maxHeadingDepth: raw.max_heading_depth,
    contentSelector: raw.content_selector,
    wrapWidth: raw.wrap_width,
    codeFence: raw.code_fence,
    emphasisMarker: raw.emphasis_marker,
    strongMarker: raw.strong_marker,
    bulletMarker: raw.bullet_marker,
    linkStyle: raw.link_style,
    detectCodeLanguage: raw.detect_code_language,
    assetDirPatterns: raw.asset_dir_patterns,
    includeLinkedFiles: raw.include_linked_files,
    linkedFileExtensions: raw.linked_file_extensions,
    removeSelectors: raw.remove_selectors,
    removeTokens: raw.remove_tokens,
    stripHidden: raw.strip_hidden,
    preserveInlineStyles: raw.preserve_inline_styles,
    metadataOverrides: {
      ...(overrides.title ? { title: overrides.title } : {}),
      ...(overrides.author ? { author: overrides.author } : {}),
      ...(overrides.published_date
        ? { publishedDate: overrides.published_date }
        : {}),
      ...(overrides.description
        ? { description: overrides.description }
        : {}),
      ...(overrides.canonical_url
        ? { canonicalUrl: overrides.canonical_url }
        : {}),
      ...(overrides.site_name ? { siteName: overrides.site_name } : {}),
      ...(overrides.tags && overrides.tags.length > 0
        ? { tags: overrides.tags }
        : {}),
    },
    selection: {
      semanticTagWeight: raw.selection.semantic_tag_weight,
      hintWeight: raw.selection.hint_weight,
      paragraphBase: raw.selection.paragraph_base,
      commaWeight: raw.selection.comma_weight,
      lengthUnit: raw.selection.length_unit,
      lengthBonusCap: raw.selection.length_bonus_cap,
      minParagraphLength: raw.selection.min_paragraph_length,
      linkDensityWeight: raw.selection.link_density_weight,
      minScore: raw.selection.min_score,
    },
    batchConcurrency: raw.batch_concurrency,
  };
}

/**
 * Builds a frozen Config from already-loaded layers, lowest precedence first.
 * Each layer is validated on its own so errors name their source.
 */
export function buildConfig(
  ...layers: readonly { source: string; values: unknown }[]
): Config {
  let merged: Record<string, unknown> = { ...DEFAULT_RAW_CONFIG };
  for (const layer of layers) {
    merged = mergeLayer(merged, validateLayer(layer.values, layer.source));
  }

  const result = rawConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigError(
      `Invalid configuration: ${issues.join('; ')}`,
      issues
    );
  }
  return deepFreeze(toConfig(result.data));
}

export function getDefaultConfig(): Config {
  return buildConfig();
}

export async function loadConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error: unknown) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${getErrorMessage(error)}`,
      [],
      { cause: error }
    );
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error: unknown) {
    throw new ConfigError(
      `Config file ${path} is not valid JSON: ${getErrorMessage(error)}`,
      [],
      { cause: error }
    );
  }
}

/**
 * Resolves defaults, then the config file, then inline overrides.
 */
export async function resolveConfig(
  options: ResolveConfigOptions = {}
): Promise<Config> {
  const layers: { source: string; values: unknown }[] = [];
  if (options.file) {
    layers.push({
      source: options.file,
      values: await loadConfigFile(options.file),
    });
  }
  if (options.overrides && Object.keys(options.overrides).length > 0) {
    layers.push({ source: 'overrides', values: options.overrides });
  }
  return buildConfig(...layers);
}

/**
 * Expands dotted keys (`selection.min_score`) into nested override objects.
 */
export function expandOverrideKeys(
  entries: Iterable<readonly [string, unknown]>
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of entries) {
    const segments = key.split('.').filter((segment) => segment.length > 0);
    const last = segments.pop();
    if (last === undefined) continue;

    let target = result;
    for (const segment of segments) {
      const existing = target[segment];
      if (isPlainObject(existing)) {
        target = existing;
      } else {
        const created: Record<string, unknown> = {};
        target[segment] = created;
        target = created;
      }
    }
    target[last] = value;
  }
  return result;
}
