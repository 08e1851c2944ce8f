import type {
  ToolErrorResponse,
  ToolResponse,
} from '../../config/types.js';
import { convertFile } from '../../services/converter.js';
import { logDebug } from '../../services/logger.js';
import {
  createToolErrorResponse,
  handleToolError,
} from '../../utils/tool-error-handler.js';
import type { ConvertHtmlFileInput } from '../schemas.js';
import { CONVERT_HTML_FILE_TOOL_NAME } from '../tool-names.js';
import { buildToolResponse } from '../utils/common.js';

export { CONVERT_HTML_FILE_TOOL_NAME };
export const CONVERT_HTML_FILE_TOOL_DESCRIPTION =
  'Converts a saved HTML page on disk to Markdown with frontmatter, copies its local images next to the output and writes the file.';

export async function convertHtmlFileToolHandler(
  input: ConvertHtmlFileInput
): Promise<ToolResponse | ToolErrorResponse> {
  logDebug('convert_html_file called', { inputPath: input.inputPath });

  try {
    const result = await convertFile(input.inputPath, {
      ...(input.outputPath ? { outputPath: input.outputPath } : {}),
      ...(input.configFile ? { configFile: input.configFile } : {}),
      ...(input.overrides ? { overrides: input.overrides } : {}),
    });

    if (result.status === 'failure') {
      return createToolErrorResponse(
        `[${result.error.stage}] ${result.error.message}`,
        input.inputPath,
        result.error.code
      );
    }

    return buildToolResponse({
      status: result.status,
      inputPath: result.inputPath,
      outputPath: result.outputPath,
      markdown: result.markdown,
      metadata: { ...result.metadata },
      manifest: [...result.manifest],
      warnings: [...result.warnings],
    });
  } catch (error: unknown) {
    return handleToolError(error, input.inputPath, 'Failed to convert file');
  }
}
