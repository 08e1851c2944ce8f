import type {
  ToolErrorResponse,
  ToolResponse,
} from '../../config/types.js';
import { convertHtmlContent } from '../../services/converter.js';
import { handleToolError } from '../../utils/tool-error-handler.js';
import type { ConvertHtmlContentInput } from '../schemas.js';
import { CONVERT_HTML_CONTENT_TOOL_NAME } from '../tool-names.js';
import { buildToolResponse, resolveToolConfig } from '../utils/common.js';

export { CONVERT_HTML_CONTENT_TOOL_NAME };
export const CONVERT_HTML_CONTENT_TOOL_DESCRIPTION =
  'Converts an HTML string to Markdown and returns it. Writes no files; local images keep their original references.';

export async function convertHtmlContentToolHandler(
  input: ConvertHtmlContentInput
): Promise<ToolResponse | ToolErrorResponse> {
  const source = input.baseDir ?? '<content>';
  try {
    const config = await resolveToolConfig(input);
    const result = await convertHtmlContent(input.html, {
      config,
      ...(input.baseDir ? { baseDir: input.baseDir } : {}),
    });
    return buildToolResponse({
      markdown: result.markdown,
      body: result.body,
      metadata: { ...result.metadata },
      warnings: [...result.warnings],
    });
  } catch (error: unknown) {
    return handleToolError(error, source, 'Failed to convert content');
  }
}
