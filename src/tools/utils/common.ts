import type { ToolResponse } from '../../config/types.js';
import { resolveConfig, type Config } from '../../config/index.js';

export function buildToolResponse(
  structuredContent: Record<string, unknown>
): ToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(structuredContent) }],
    structuredContent,
  };
}

export async function resolveToolConfig(options: {
  configFile?: string | undefined;
  overrides?: Record<string, unknown> | undefined;
}): Promise<Config> {
  return resolveConfig({
    ...(options.configFile ? { file: options.configFile } : {}),
    ...(options.overrides ? { overrides: options.overrides } : {}),
  });
}
