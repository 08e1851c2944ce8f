import type {
  ToolErrorResponse,
  ToolResponse,
} from '../../config/types.js';
import { extractMetadataFromFile } from '../../services/converter.js';
import { handleToolError } from '../../utils/tool-error-handler.js';
import type { ExtractMetadataInput } from '../schemas.js';
import { EXTRACT_METADATA_TOOL_NAME } from '../tool-names.js';
import { buildToolResponse, resolveToolConfig } from '../utils/common.js';

export { EXTRACT_METADATA_TOOL_NAME };
export const EXTRACT_METADATA_TOOL_DESCRIPTION =
  'Reads title, author, publish date, description, canonical URL, site name and tags from an HTML file without converting it.';

export async function extractMetadataToolHandler(
  input: ExtractMetadataInput
): Promise<ToolResponse | ToolErrorResponse> {
  try {
    const config = await resolveToolConfig(input);
    const { metadata, warnings } = await extractMetadataFromFile(
      input.inputPath,
      config
    );
    return buildToolResponse({
      inputPath: input.inputPath,
      metadata: { ...metadata },
      warnings: [...warnings],
    });
  } catch (error: unknown) {
    return handleToolError(error, input.inputPath, 'Failed to read metadata');
  }
}
