import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import process from 'node:process';

import { serverInfo } from './config/index.js';
import { logError, logInfo } from './services/logger.js';
import { registerTools } from './tools/index.js';

const SERVER_INSTRUCTIONS = [
  'Converts saved HTML pages (an .html file plus its "<name>_files" asset folder) into Markdown.',
  'Use validate_html_file or extract_metadata to inspect a page, convert_html_file to write the Markdown,',
  'and convert_html_content for HTML you already hold in memory.',
].join(' ');

/* -------------------------------------------------------------------------------------------------
 * Server lifecycle
 * ------------------------------------------------------------------------------------------------- */

export function createMcpServer(): McpServer {
  const server = new McpServer(
    {
      name: serverInfo.name,
      title: 'page2md',
      version: serverInfo.version,
    },
    {
      capabilities: { tools: {}, logging: {} },
      instructions: SERVER_INSTRUCTIONS,
    }
  );

  registerTools(server);
  attachServerErrorHandler(server);
  return server;
}

function attachServerErrorHandler(server: McpServer): void {
  server.server.onerror = (error) => {
    logError('[MCP Error]', error instanceof Error ? error : { error });
  };
}

function createShutdownHandler(server: McpServer): (signal: string) => void {
  let shuttingDown = false;

  return (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    process.stderr.write(`\n${signal} received, shutting down page2md...\n`);

    void server
      .close()
      .catch((err: unknown) => {
        const error = err instanceof Error ? err : new Error(String(err));
        logError('Error during shutdown', error);
        process.exitCode = 1;
      })
      .finally(() => {
        if (process.exitCode === undefined) process.exitCode = 0;
      });
  };
}

function registerSignalHandlers(handler: (signal: string) => void): void {
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      handler(signal);
    });
  }
}

export async function startStdioServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();

  registerSignalHandlers(createShutdownHandler(server));
  try {
    await server.connect(transport);
    logInfo('page2md MCP server running on stdio');
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    throw new Error(`Failed to start stdio server: ${err.message}`, {
      cause: error,
    });
  }
}
