import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import {
  CONVERT_HTML_CONTENT_TOOL_DESCRIPTION,
  CONVERT_HTML_CONTENT_TOOL_NAME,
  convertHtmlContentToolHandler,
} from './handlers/convert-html-content.tool.js';
import {
  CONVERT_HTML_FILE_TOOL_DESCRIPTION,
  CONVERT_HTML_FILE_TOOL_NAME,
  convertHtmlFileToolHandler,
} from './handlers/convert-html-file.tool.js';
import {
  EXTRACT_METADATA_TOOL_DESCRIPTION,
  EXTRACT_METADATA_TOOL_NAME,
  extractMetadataToolHandler,
} from './handlers/extract-metadata.tool.js';
import {
  LIST_FORMATS_TOOL_DESCRIPTION,
  LIST_FORMATS_TOOL_NAME,
  listFormatsToolHandler,
} from './handlers/list-formats.tool.js';
import {
  VALIDATE_HTML_FILE_TOOL_DESCRIPTION,
  VALIDATE_HTML_FILE_TOOL_NAME,
  validateHtmlFileToolHandler,
} from './handlers/validate-html-file.tool.js';
import {
  convertHtmlContentInputSchema,
  convertHtmlContentOutputSchema,
  convertHtmlFileInputSchema,
  convertHtmlFileOutputSchema,
  extractMetadataInputSchema,
  extractMetadataOutputSchema,
  listFormatsInputSchema,
  listFormatsOutputSchema,
  validateHtmlFileInputSchema,
  validateHtmlFileOutputSchema,
} from './schemas.js';

export function registerTools(server: McpServer): void {
  server.registerTool(
    CONVERT_HTML_FILE_TOOL_NAME,
    {
      title: 'Convert HTML File',
      description: CONVERT_HTML_FILE_TOOL_DESCRIPTION,
      inputSchema: convertHtmlFileInputSchema,
      outputSchema: convertHtmlFileOutputSchema,
    },
    convertHtmlFileToolHandler
  );
  server.registerTool(
    VALIDATE_HTML_FILE_TOOL_NAME,
    {
      title: 'Validate HTML File',
      description: VALIDATE_HTML_FILE_TOOL_DESCRIPTION,
      inputSchema: validateHtmlFileInputSchema,
      outputSchema: validateHtmlFileOutputSchema,
      annotations: { readOnlyHint: true },
    },
    validateHtmlFileToolHandler
  );
  server.registerTool(
    EXTRACT_METADATA_TOOL_NAME,
    {
      title: 'Extract Metadata',
      description: EXTRACT_METADATA_TOOL_DESCRIPTION,
      inputSchema: extractMetadataInputSchema,
      outputSchema: extractMetadataOutputSchema,
      annotations: { readOnlyHint: true },
    },
    extractMetadataToolHandler
  );
  server.registerTool(
    LIST_FORMATS_TOOL_NAME,
    {
      title: 'List Formats',
      description: LIST_FORMATS_TOOL_DESCRIPTION,
      inputSchema: listFormatsInputSchema,
      outputSchema: listFormatsOutputSchema,
      annotations: { readOnlyHint: true },
    },
    listFormatsToolHandler
  );
  server.registerTool(
    CONVERT_HTML_CONTENT_TOOL_NAME,
    {
      title: 'Convert HTML Content',
      description: CONVERT_HTML_CONTENT_TOOL_DESCRIPTION,
      inputSchema: convertHtmlContentInputSchema,
      outputSchema: convertHtmlContentOutputSchema,
      annotations: { readOnlyHint: true },
    },
    convertHtmlContentToolHandler
  );
}
