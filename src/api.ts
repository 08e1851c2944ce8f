export {
  buildConfig,
  CONFIG_KEYS,
  expandOverrideKeys,
  getDefaultConfig,
  loadConfigFile,
  resolveConfig,
  type CodeFence,
  type Config,
  type LinkStyle,
  type MetadataOverrides,
  type ResolveConfigOptions,
  type SelectionWeights,
  type WrapWidth,
} from './config/index.js';
export {
  AppError,
  ConfigError,
  ConversionError,
  InputError,
  OutputError,
  type PipelineStage,
} from './errors/index.js';
export {
  convertBatch,
  summarizeBatch,
  type BatchOptions,
  type BatchSummary,
} from './services/batch.js';
export {
  convertFile,
  convertHtmlContent,
  defaultOutputPath,
  extractMetadataFromFile,
  isConversionFailure,
  listCapabilities,
  validateHtmlFile,
  type Capabilities,
  type ContentConversion,
  type ConversionFailure,
  type ConversionFailureDetails,
  type ConversionResult,
  type ConversionSuccess,
  type ConvertContentOptions,
  type ConvertFileOptions,
  type RenderedDocument,
  type ValidationReport,
  type ValidationStats,
} from './services/converter.js';
export type { ManifestEntry } from './services/assembler.js';
export type {
  ConversionWarning,
  StageEvent,
  WarningKind,
} from './services/diagnostics.js';
export { setLogLevel, setLoggingEnabled } from './services/logger.js';
export type { Metadata } from './transform/metadata.js';
export { createMcpServer, startStdioServer } from './server.js';
