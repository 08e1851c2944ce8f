/**
 * Pipeline stage an error or warning is attributed to.
 */
export type PipelineStage =
  | 'config'
  | 'input'
  | 'assets'
  | 'metadata'
  | 'selection'
  | 'cleaning'
  | 'rendering'
  | 'output';

/**
 * Base application error class with a machine-readable code
 */
export class AppError extends Error {
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Fatal conversion failure attributed to a pipeline stage
 */
export class ConversionError extends AppError {
  public readonly stage: PipelineStage;

  constructor(
    message: string,
    code: string,
    stage: PipelineStage,
    options?: ErrorOptions
  ) {
    super(message, code, true, options);
    this.stage = stage;
  }
}

/**
 * Input file missing, unreadable, empty or not HTML
 */
export class InputError extends ConversionError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'INPUT_ERROR', 'input', options);
    this.path = path;
  }
}

/**
 * Markdown file could not be written
 */
export class OutputError extends ConversionError {
  public readonly path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'OUTPUT_ERROR', 'output', options);
    this.path = path;
  }
}

/**
 * Configuration file unreadable or a value failed validation
 */
export class ConfigError extends ConversionError {
  public readonly issues: readonly string[];

  constructor(
    message: string,
    issues: readonly string[] = [],
    options?: ErrorOptions
  ) {
    super(message, 'CONFIG_ERROR', 'config', options);
    this.issues = issues;
  }
}
