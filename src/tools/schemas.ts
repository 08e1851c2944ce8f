import { z } from 'zod';

const MAX_PATH_LENGTH = 4096;
const MAX_HTML_LENGTH = 10 * 1024 * 1024;

const pathSchema = z.string().trim().min(1).max(MAX_PATH_LENGTH);
const overridesSchema = z
  .record(z.string(), z.unknown())
  .optional()
  .describe('Configuration overrides in snake_case, e.g. {"wrap_width": 80}.');

/* -------------------------------------------------------------------------------------------------
 * Inputs
 * ------------------------------------------------------------------------------------------------- */

export const convertHtmlFileInputSchema = z.strictObject({
  inputPath: pathSchema.describe('Path of the saved HTML page.'),
  outputPath: pathSchema
    .optional()
    .describe('Markdown file to write. Defaults to <output_dir>/<stem>.md.'),
  configFile: pathSchema.optional().describe('JSON configuration file.'),
  overrides: overridesSchema,
});

export const validateHtmlFileInputSchema = z.strictObject({
  inputPath: pathSchema.describe('Path of the saved HTML page.'),
  configFile: pathSchema.optional().describe('JSON configuration file.'),
});

export const extractMetadataInputSchema = z.strictObject({
  inputPath: pathSchema.describe('Path of the saved HTML page.'),
  configFile: pathSchema.optional().describe('JSON configuration file.'),
});

export const listFormatsInputSchema = z.strictObject({});

export const convertHtmlContentInputSchema = z.strictObject({
  html: z.string().min(1).max(MAX_HTML_LENGTH).describe('HTML markup.'),
  baseDir: pathSchema
    .optional()
    .describe('Directory local image references resolve against.'),
  overrides: overridesSchema,
});

/* -------------------------------------------------------------------------------------------------
 * Outputs
 * ------------------------------------------------------------------------------------------------- */

const metadataSchema = z.strictObject({
  title: z.string().optional(),
  author: z.string().optional(),
  publishedDate: z.string().optional(),
  description: z.string().optional(),
  canonicalUrl: z.string().optional(),
  siteName: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

const warningSchema = z.strictObject({
  kind: z.string(),
  stage: z.string(),
  message: z.string(),
  reference: z.string().optional(),
});

const manifestEntrySchema = z.strictObject({
  reference: z.string(),
  source: z.string(),
  destination: z.string(),
  outputReference: z.string(),
});

export const convertHtmlFileOutputSchema = z.strictObject({
  status: z.enum(['success', 'success_with_warnings']),
  inputPath: z.string(),
  outputPath: z.string(),
  markdown: z.string().describe('Written Markdown, frontmatter included.'),
  metadata: metadataSchema,
  manifest: z.array(manifestEntrySchema),
  warnings: z.array(warningSchema),
});

export const validateHtmlFileOutputSchema = z.strictObject({
  valid: z.boolean(),
  issues: z.array(z.string()),
  stats: z
    .strictObject({
      elements: z.number().int(),
      images: z.number().int(),
      unresolvedImages: z.number().int(),
      headings: z.number().int(),
      codeBlocks: z.number().int(),
      contentRoot: z.string(),
      usedFallback: z.boolean(),
    })
    .nullable(),
});

export const extractMetadataOutputSchema = z.strictObject({
  inputPath: z.string(),
  metadata: metadataSchema,
  warnings: z.array(warningSchema),
});

export const listFormatsOutputSchema = z.strictObject({
  inputFormats: z.array(z.string()),
  outputFormats: z.array(z.string()),
  configKeys: z.array(z.string()),
  tools: z.array(z.string()),
});

export const convertHtmlContentOutputSchema = z.strictObject({
  markdown: z.string(),
  body: z.string(),
  metadata: metadataSchema,
  warnings: z.array(warningSchema),
});

export type ConvertHtmlFileInput = z.infer<typeof convertHtmlFileInputSchema>;
export type ValidateHtmlFileInput = z.infer<typeof validateHtmlFileInputSchema>;
export type ExtractMetadataInput = z.infer<typeof extractMetadataInputSchema>;
export type ConvertHtmlContentInput = z.infer<
  typeof convertHtmlContentInputSchema
>;
