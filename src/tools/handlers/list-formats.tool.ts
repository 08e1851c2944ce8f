import type { ToolResponse } from '../../config/types.js';
import { listCapabilities } from '../../services/converter.js';
import { LIST_FORMATS_TOOL_NAME } from '../tool-names.js';
import { buildToolResponse } from '../utils/common.js';

export { LIST_FORMATS_TOOL_NAME };
export const LIST_FORMATS_TOOL_DESCRIPTION =
  'Lists supported input and output formats, configuration keys and the tools of this server.';

export function listFormatsToolHandler(): Promise<ToolResponse> {
  const capabilities = listCapabilities();
  return Promise.resolve(
    buildToolResponse({
      inputFormats: [...capabilities.inputFormats],
      outputFormats: [...capabilities.outputFormats],
      configKeys: [...capabilities.configKeys],
      tools: [...capabilities.tools],
    })
  );
}
