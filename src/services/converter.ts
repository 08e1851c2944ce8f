import path from 'node:path';

import {
  CONFIG_KEYS,
  getDefaultConfig,
  resolveConfig,
  type Config,
} from '../config/index.js';
import {
  ConversionError,
  InputError,
  type PipelineStage,
} from '../errors/index.js';
import { TOOL_NAMES } from '../tools/tool-names.js';
import { cleanContent, copyContent } from '../transform/cleaner.js';
import {
  selectContentNode,
  type ContentSelection,
} from '../transform/content-selector.js';
import { extractMetadata, type Metadata } from '../transform/metadata.js';
import { renderMarkdown } from '../transform/renderer.js';
import {
  assembleMarkdown,
  buildFrontmatter,
  placeAssets,
  writeMarkdownFile,
  type ManifestEntry,
} from './assembler.js';
import type { AssetMap } from './asset-map.js';
import { resolveAssets } from './asset-resolver.js';
import {
  Diagnostics,
  StageTracker,
  toStageError,
  type ConversionWarning,
} from './diagnostics.js';
import { logInfo } from './logger.js';
import { getDocumentRoot, parseHtmlDocument, readHtmlInput } from './parser.js';

const CONTENT_SOURCE_LABEL = '<content>';

export interface RenderedDocument {
  readonly body: string;
  readonly markdown: string;
  readonly metadata: Metadata;
  readonly manifest: readonly ManifestEntry[];
  readonly warnings: readonly ConversionWarning[];
}

export interface ConversionSuccess extends RenderedDocument {
  readonly status: 'success' | 'success_with_warnings';
  readonly inputPath: string;
  readonly outputPath: string;
}

export interface ConversionFailureDetails {
  readonly code: string;
  readonly stage: PipelineStage;
  readonly message: string;
}

export interface ConversionFailure {
  readonly status: 'failure';
  readonly inputPath: string;
  readonly error: ConversionFailureDetails;
  readonly warnings: readonly ConversionWarning[];
}

export type ConversionResult = ConversionSuccess | ConversionFailure;

export interface ConvertFileOptions {
  readonly outputPath?: string;
  readonly configFile?: string;
  /** snake_case overrides layered over the config file. */
  readonly overrides?: Record<string, unknown>;
  /** Already resolved Config; takes precedence over file and overrides. */
  readonly config?: Config;
}

export interface ConvertContentOptions {
  /** Directory local image references resolve against. */
  readonly baseDir?: string;
  readonly config?: Config;
}

export interface ContentConversion {
  readonly markdown: string;
  readonly body: string;
  readonly metadata: Metadata;
  readonly warnings: readonly ConversionWarning[];
}

export interface ValidationStats {
  readonly elements: number;
  readonly images: number;
  readonly unresolvedImages: number;
  readonly headings: number;
  readonly codeBlocks: number;
  readonly contentRoot: string;
  readonly usedFallback: boolean;
}

export interface ValidationReport {
  readonly valid: boolean;
  readonly issues: readonly string[];
  readonly stats: ValidationStats | null;
}

export interface Capabilities {
  readonly inputFormats: readonly string[];
  readonly outputFormats: readonly string[];
  readonly configKeys: readonly string[];
  readonly tools: readonly string[];
}

// ---------------------------------------------------------------------------
// Pipeline core
// ---------------------------------------------------------------------------

interface PipelineRun {
  readonly html: string;
  readonly htmlPath: string | null;
  readonly baseDir?: string | undefined;
  /** Output file; null when nothing is written. */
  readonly outputPath: string | null;
  readonly config: Config;
  readonly diagnostics: Diagnostics;
  readonly tracker: StageTracker;
}

interface PipelineOutput extends RenderedDocument {
  readonly assets: AssetMap;
  readonly selection: ContentSelection;
}

async function runPipeline(run: PipelineRun): Promise<PipelineOutput> {
  const { html, htmlPath, outputPath, config, diagnostics, tracker } = run;

  const document = tracker.run('input', () => parseHtmlDocument(html));
  const assets = await tracker.runAsync('assets', () =>
    resolveAssets({
      htmlPath,
      baseDir: run.baseDir ?? null,
      document,
      config,
      diagnostics,
    })
  );
  const metadata = tracker.run('metadata', () =>
    extractMetadata({
      document,
      sourcePath: htmlPath,
      overrides: config.metadataOverrides,
    })
  );
  const selection = tracker.run('selection', () =>
    selectContentNode(document, config, diagnostics)
  );
  const tree = tracker.run('cleaning', () =>
    config.cleanHtml
      ? cleanContent(
          selection.element,
          config,
          diagnostics,
          htmlPath ?? CONTENT_SOURCE_LABEL
        )
      : copyContent(selection.element, config, diagnostics)
  );

  // Assets are placed first so the renderer can emit their final paths.
  const manifest =
    outputPath === null
      ? []
      : await tracker.runAsync('output', () =>
          placeAssets(assets, outputPath, config, diagnostics)
        );

  const body = tracker.run('rendering', () =>
    renderMarkdown(tree, assets, config, diagnostics)
  );
  const frontmatter = config.addMetadata ? buildFrontmatter(metadata) : '';

  return {
    body,
    markdown: assembleMarkdown(frontmatter, body),
    metadata,
    manifest,
    warnings: diagnostics.warnings,
    assets,
    selection,
  };
}

function describeFailure(error: unknown): ConversionFailureDetails {
  const appError = toStageError(error, 'output');
  const stage = appError instanceof ConversionError ? appError.stage : 'output';
  return { code: appError.code, stage, message: appError.message };
}

export function defaultOutputPath(inputPath: string, config: Config): string {
  return path.resolve(config.outputDir, `${path.parse(inputPath).name}.md`);
}

async function resolveRunConfig(options: ConvertFileOptions): Promise<Config> {
  if (options.config) return options.config;
  return resolveConfig({
    ...(options.configFile ? { file: options.configFile } : {}),
    ...(options.overrides ? { overrides: options.overrides } : {}),
  });
}

// ---------------------------------------------------------------------------
// Public operations
// ---------------------------------------------------------------------------

/**
 * Converts one HTML file and writes the Markdown next to its copied assets.
 * Conversion failures are returned, never thrown.
 */
export async function convertFile(
  inputPath: string,
  options: ConvertFileOptions = {}
): Promise<ConversionResult> {
  const diagnostics = new Diagnostics(inputPath);
  const tracker = new StageTracker(inputPath);

  try {
    const config = await tracker.runAsync('config', () =>
      resolveRunConfig(options)
    );
    const source = await tracker.runAsync('input', () =>
      readHtmlInput(inputPath)
    );
    const outputPath = path.resolve(
      options.outputPath ?? defaultOutputPath(inputPath, config)
    );

    const output = await runPipeline({
      html: source.html,
      htmlPath: source.path,
      outputPath,
      config,
      diagnostics,
      tracker,
    });
    await tracker.runAsync('output', () =>
      writeMarkdownFile(outputPath, output.markdown)
    );

    const warnings = diagnostics.warnings;
    logInfo('Converted HTML file', {
      inputPath,
      outputPath,
      assets: output.manifest.length,
      warnings: warnings.length,
    });

    return {
      status: warnings.length > 0 ? 'success_with_warnings' : 'success',
      inputPath,
      outputPath,
      body: output.body,
      markdown: output.markdown,
      metadata: output.metadata,
      manifest: output.manifest,
      warnings,
    };
  } catch (error: unknown) {
    return {
      status: 'failure',
      inputPath,
      error: describeFailure(error),
      warnings: diagnostics.warnings,
    };
  }
}

/**
 * Converts an HTML string without writing anything. Local images resolve
 * against `baseDir` when given but keep their original references.
 */
export async function convertHtmlContent(
  html: string,
  options: ConvertContentOptions = {}
): Promise<ContentConversion> {
  const config = options.config ?? getDefaultConfig();
  const diagnostics = new Diagnostics(CONTENT_SOURCE_LABEL);
  const output = await runPipeline({
    html,
    htmlPath: null,
    baseDir: options.baseDir,
    outputPath: null,
    config,
    diagnostics,
    tracker: new StageTracker(CONTENT_SOURCE_LABEL),
  });

  return {
    markdown: output.markdown,
    body: output.body,
    metadata: output.metadata,
    warnings: output.warnings,
  };
}

export async function extractMetadataFromFile(
  inputPath: string,
  config: Config = getDefaultConfig()
): Promise<{ metadata: Metadata; warnings: readonly ConversionWarning[] }> {
  const diagnostics = new Diagnostics(inputPath);
  const tracker = new StageTracker(inputPath);
  const source = await tracker.runAsync('input', () =>
    readHtmlInput(inputPath)
  );
  const document = tracker.run('input', () => parseHtmlDocument(source.html));
  const metadata = tracker.run('metadata', () =>
    extractMetadata({
      document,
      sourcePath: source.path,
      overrides: config.metadataOverrides,
    })
  );
  return { metadata, warnings: diagnostics.warnings };
}

function describeElement(element: Element): string {
  const tagName = element.tagName.toLowerCase();
  const id = element.getAttribute('id');
  const className = element.getAttribute('class')?.trim().split(/\s+/)[0];
  return `${tagName}${id ? `#${id}` : ''}${className ? `.${className}` : ''}`;
}

/**
 * Dry run: reads, resolves and selects without rendering or writing.
 */
export async function validateHtmlFile(
  inputPath: string,
  config: Config = getDefaultConfig()
): Promise<ValidationReport> {
  const diagnostics = new Diagnostics(inputPath);
  const tracker = new StageTracker(inputPath);

  let html: string;
  try {
    html = (await tracker.runAsync('input', () => readHtmlInput(inputPath)))
      .html;
  } catch (error: unknown) {
    if (error instanceof InputError) {
      return { valid: false, issues: [error.message], stats: null };
    }
    throw error;
  }

  const document = tracker.run('input', () => parseHtmlDocument(html));
  const assets = await tracker.runAsync('assets', () =>
    resolveAssets({ htmlPath: inputPath, document, config, diagnostics })
  );
  const selection = tracker.run('selection', () =>
    selectContentNode(document, config, diagnostics)
  );

  const issues = diagnostics.warnings.map((warning) => warning.message);
  const hasText = (getDocumentRoot(document).textContent ?? '').trim() !== '';
  if (!hasText) issues.push('Document has no text content');

  return {
    valid: hasText,
    issues,
    stats: {
      elements: document.querySelectorAll('*').length,
      images: document.querySelectorAll('img').length,
      unresolvedImages: assets
        .unresolved()
        .filter((entry) => entry.kind === 'image').length,
      headings: document.querySelectorAll('h1, h2, h3, h4, h5, h6').length,
      codeBlocks: document.querySelectorAll('pre').length,
      contentRoot: describeElement(selection.element),
      usedFallback: selection.strategy === 'fallback',
    },
  };
}

export function listCapabilities(): Capabilities {
  return {
    inputFormats: ['html', 'htm', 'xhtml'],
    outputFormats: ['markdown'],
    configKeys: CONFIG_KEYS,
    tools: TOOL_NAMES,
  };
}

export function isConversionFailure(
  result: ConversionResult
): result is ConversionFailure {
  return result.status === 'failure';
}
