import type { ToolErrorResponse } from '../config/types.js';
import {
  AppError,
  ConfigError,
  ConversionError,
  InputError,
  OutputError,
} from '../errors/index.js';

const isDevelopment = process.env.NODE_ENV === 'development';

export function createToolErrorResponse(
  message: string,
  path: string,
  code: string
): ToolErrorResponse {
  const structuredContent = { error: message, path, errorCode: code };
  return {
    content: [{ type: 'text', text: JSON.stringify(structuredContent) }],
    structuredContent,
    isError: true,
  };
}

function withStack(error: Error, message = error.message): string {
  return isDevelopment ? `${message}\n${error.stack ?? ''}` : message;
}

export function handleToolError(
  error: unknown,
  path: string,
  fallbackMessage = 'Operation failed'
): ToolErrorResponse {
  if (error instanceof InputError || error instanceof OutputError) {
    return createToolErrorResponse(withStack(error), error.path, error.code);
  }
  if (error instanceof ConfigError) {
    const message =
      error.issues.length > 0
        ? `${error.message}\nIssues: ${error.issues.join(', ')}`
        : error.message;
    return createToolErrorResponse(withStack(error, message), path, error.code);
  }
  if (error instanceof ConversionError) {
    return createToolErrorResponse(
      withStack(error, `[${error.stage}] ${error.message}`),
      path,
      error.code
    );
  }
  if (error instanceof AppError) {
    return createToolErrorResponse(withStack(error), path, error.code);
  }

  const message = error instanceof Error ? error.message : 'Unknown error';
  const fullMessage =
    isDevelopment && error instanceof Error
      ? `${fallbackMessage}: ${message}\n${error.stack ?? ''}`
      : `${fallbackMessage}: ${message}`;

  return createToolErrorResponse(fullMessage, path, 'UNKNOWN_ERROR');
}
