export {
  AppError,
  ConfigError,
  ConversionError,
  InputError,
  OutputError,
} from './app-error.js';
export type { PipelineStage } from './app-error.js';
