import { z } from 'zod';

export const DEFAULT_ASSET_DIR_PATTERNS = [
  '{stem}_files',
  '{stem}_assets',
  '{name}_files',
] as const;

export const DEFAULT_LINKED_FILE_EXTENSIONS = [
  'pdf',
  'zip',
  'doc',
  'docx',
  'xls',
  'xlsx',
  'ppt',
  'pptx',
  'csv',
  'txt',
  'epub',
] as const;

export const DEFAULT_REMOVE_SELECTORS = [
  'nav',
  'header',
  'footer',
  'aside',
  'form',
  'button',
  '[role="navigation"]',
  '[role="banner"]',
  '[role="contentinfo"]',
  '[role="dialog"]',
  '.advertisement',
  '.popup',
  '.modal',
  '.cookie-banner',
  '.newsletter-signup',
  '.social-share',
  '.comments-section',
] as const;

export const DEFAULT_REMOVE_TOKENS = [
  'ad',
  'ads',
  'advert',
  'banner',
  'promo',
  'sponsor',
  'newsletter',
  'subscribe',
  'cookie',
  'consent',
  'popup',
  'modal',
  'share',
  'social',
  'related',
  'recommend',
  'comment',
  'comments',
  'breadcrumb',
  'pagination',
] as const;

const nonEmptyString = z.string().trim().min(1);

export const selectionSchema = z.strictObject({
  semantic_tag_weight: z.number(),
  hint_weight: z.number(),
  paragraph_base: z.number(),
  comma_weight: z.number(),
  length_unit: z.number().positive(),
  length_bonus_cap: z.number().min(0),
  min_paragraph_length: z.number().int().min(0),
  link_density_weight: z.number().min(0),
  min_score: z.number(),
});

export const metadataOverridesSchema = z.strictObject({
  title: nonEmptyString.optional(),
  author: nonEmptyString.optional(),
  published_date: nonEmptyString.optional(),
  description: nonEmptyString.optional(),
  canonical_url: nonEmptyString.optional(),
  site_name: nonEmptyString.optional(),
  tags: z.array(nonEmptyString).optional(),
});

/**
 * Complete configuration in its on-disk (snake_case) form.
 */
export const rawConfigSchema = z.strictObject({
  output_dir: nonEmptyString,
  images_dir: nonEmptyString,
  preserve_images: z.boolean(),
  clean_html: z.boolean(),
  add_metadata: z.boolean(),
  log_level: z.enum(['error', 'warn', 'info', 'debug']),
  heading_offset: z.number().int().min(-5).max(5),
  max_heading_depth: z.number().int().min(1).max(6),
  content_selector: nonEmptyString.nullable(),
  wrap_width: z.union([z.number().int().min(20), z.literal('none')]),
  code_fence: z.enum(['```', '~~~']),
  emphasis_marker: z.enum(['*', '_']),
  strong_marker: z.enum(['**', '__']),
  bullet_marker: z.enum(['-', '*', '+']),
  link_style: z.enum(['inline', 'referenced']),
  detect_code_language: z.boolean(),
  asset_dir_patterns: z.array(nonEmptyString),
  include_linked_files: z.boolean(),
  linked_file_extensions: z.array(
    nonEmptyString.transform((ext) => ext.replace(/^\./, '').toLowerCase())
  ),
  remove_selectors: z.array(nonEmptyString),
  remove_tokens: z.array(
    nonEmptyString.regex(
      /^[a-z0-9_-]+$/i,
      'Tokens may only contain letters, digits, "_" and "-"'
    )
  ),
  strip_hidden: z.boolean(),
  preserve_inline_styles: z.boolean(),
  metadata_overrides: metadataOverridesSchema,
  selection: selectionSchema,
  batch_concurrency: z.number().int().min(1).max(10),
});

/**
 * One configuration layer (config file or inline overrides): every key
 * optional, nested objects partial.
 */
export const configLayerSchema = rawConfigSchema
  .extend({ selection: selectionSchema.partial() })
  .partial();

export type RawConfig = z.input<typeof rawConfigSchema>;

export const DEFAULT_RAW_CONFIG: RawConfig = {
  output_dir: 'output',
  images_dir: 'assets/images',
  preserve_images: true,
  clean_html: true,
  add_metadata: true,
  log_level: 'info',
  heading_offset: 0,
  max_heading_depth: 6,
  content_selector: null,
  wrap_width: 'none',
  code_fence: '```',
  emphasis_marker: '*',
  strong_marker: '**',
  bullet_marker: '-',
  link_style: 'inline',
  detect_code_language: true,
  asset_dir_patterns: [...DEFAULT_ASSET_DIR_PATTERNS],
  include_linked_files: false,
  linked_file_extensions: [...DEFAULT_LINKED_FILE_EXTENSIONS],
  remove_selectors: [...DEFAULT_REMOVE_SELECTORS],
  remove_tokens: [...DEFAULT_REMOVE_TOKENS],
  strip_hidden: true,
  preserve_inline_styles: false,
  metadata_overrides: {},
  selection: {
    semantic_tag_weight: 25,
    hint_weight: 25,
    paragraph_base: 1,
    comma_weight: 1,
    length_unit: 100,
    length_bonus_cap: 3,
    min_paragraph_length: 25,
    link_density_weight: 1,
    min_score: 20,
  },
  batch_concurrency: 4,
};

export const CONFIG_KEYS = Object.keys(rawConfigSchema.shape);
