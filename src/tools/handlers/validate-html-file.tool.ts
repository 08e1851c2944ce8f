import type {
  ToolErrorResponse,
  ToolResponse,
} from '../../config/types.js';
import { validateHtmlFile } from '../../services/converter.js';
import { handleToolError } from '../../utils/tool-error-handler.js';
import type { ValidateHtmlFileInput } from '../schemas.js';
import { VALIDATE_HTML_FILE_TOOL_NAME } from '../tool-names.js';
import { buildToolResponse, resolveToolConfig } from '../utils/common.js';

export { VALIDATE_HTML_FILE_TOOL_NAME };
export const VALIDATE_HTML_FILE_TOOL_DESCRIPTION =
  'Checks that an HTML file can be converted and reports element, image and heading counts, unresolved images and the detected content root. Writes nothing.';

export async function validateHtmlFileToolHandler(
  input: ValidateHtmlFileInput
): Promise<ToolResponse | ToolErrorResponse> {
  try {
    const config = await resolveToolConfig(input);
    const report = await validateHtmlFile(input.inputPath, config);
    return buildToolResponse({
      valid: report.valid,
      issues: [...report.issues],
      stats: report.stats ? { ...report.stats } : null,
    });
  } catch (error: unknown) {
    return handleToolError(error, input.inputPath, 'Failed to validate file');
  }
}
