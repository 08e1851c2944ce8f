export const CONVERT_HTML_FILE_TOOL_NAME = 'convert_html_file';
export const VALIDATE_HTML_FILE_TOOL_NAME = 'validate_html_file';
export const EXTRACT_METADATA_TOOL_NAME = 'extract_metadata';
export const LIST_FORMATS_TOOL_NAME = 'list_formats';
export const CONVERT_HTML_CONTENT_TOOL_NAME = 'convert_html_content';

export const TOOL_NAMES = [
  CONVERT_HTML_FILE_TOOL_NAME,
  VALIDATE_HTML_FILE_TOOL_NAME,
  EXTRACT_METADATA_TOOL_NAME,
  LIST_FORMATS_TOOL_NAME,
  CONVERT_HTML_CONTENT_TOOL_NAME,
] as const;
