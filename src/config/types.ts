import type { LogLevel } from '../services/logger.js';

export type WrapWidth = number | 'none';
export type CodeFence = '```' | '~~~';
export type EmphasisMarker = '*' | '_';
export type StrongMarker = '**' | '__';
export type BulletMarker = '-' | '*' | '+';
export type LinkStyle = 'inline' | 'referenced';

/**
 * Weights of the content-selection scoring rules.
 */
export interface SelectionWeights {
  readonly semanticTagWeight: number;
  readonly hintWeight: number;
  readonly paragraphBase: number;
  readonly commaWeight: number;
  readonly lengthUnit: number;
  readonly lengthBonusCap: number;
  readonly minParagraphLength: number;
  readonly linkDensityWeight: number;
  readonly minScore: number;
}

export interface MetadataOverrides {
  readonly title?: string;
  readonly author?: string;
  readonly publishedDate?: string;
  readonly description?: string;
  readonly canonicalUrl?: string;
  readonly siteName?: string;
  readonly tags?: readonly string[];
}

/**
 * Immutable conversion settings, resolved once before a conversion starts.
 */
export interface Config {
  readonly outputDir: string;
  readonly imagesDir: string;
  readonly preserveImages: boolean;
  readonly cleanHtml: boolean;
  readonly addMetadata: boolean;
  readonly logLevel: LogLevel;
  readonly headingOffset: number;
  readonly maxHeadingDepth: number;
  readonly contentSelector: string | null;
  readonly wrapWidth: WrapWidth;
  readonly codeFence: CodeFence;
  readonly emphasisMarker: EmphasisMarker;
  readonly strongMarker: StrongMarker;
  readonly bulletMarker: BulletMarker;
  readonly linkStyle: LinkStyle;
  readonly detectCodeLanguage: boolean;
  readonly assetDirPatterns: readonly string[];
  readonly includeLinkedFiles: boolean;
  readonly linkedFileExtensions: readonly string[];
  readonly removeSelectors: readonly string[];
  readonly removeTokens: readonly string[];
  readonly stripHidden: boolean;
  readonly preserveInlineStyles: boolean;
  readonly metadataOverrides: MetadataOverrides;
  readonly selection: SelectionWeights;
  readonly batchConcurrency: number;
}

export interface ToolErrorResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent: {
    [x: string]: unknown;
    error: string;
    path: string;
    errorCode: string;
  };
  isError: true;
}

export interface ToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent: Record<string, unknown>;
}
