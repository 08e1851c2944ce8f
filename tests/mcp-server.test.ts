import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { createMcpServer } from '../src/server.js';
import {
  convertHtmlFileToolHandler,
} from '../src/tools/handlers/convert-html-file.tool.js';
import {
  extractMetadataToolHandler,
} from '../src/tools/handlers/extract-metadata.tool.js';
import {
  validateHtmlFileToolHandler,
} from '../src/tools/handlers/validate-html-file.tool.js';

async function connectClient(): Promise<{
  client: Client;
  close: () => Promise<void>;
}> {
  const server = createMcpServer();
  const client = new Client({ name: 'page2md-test', version: '1.0.0' });
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);
  return {
    client,
    close: async () => {
      await client.close();
      await server.close();
    },
  };
}

describe('MCP Server', () => {
  describe('createMcpServer', () => {
    test('creates a server that closes cleanly', async () => {
      const server = createMcpServer();

      expect(typeof server.server.onerror).toBe('function');
      await server.close();
    });
  });

  describe('tools over an in-memory transport', () => {
    test('lists every tool', async () => {
      const { client, close } = await connectClient();
      try {
        const { tools } = await client.listTools();

        expect(tools.map((tool) => tool.name).sort()).toEqual([
          'convert_html_content',
          'convert_html_file',
          'extract_metadata',
          'list_formats',
          'validate_html_file',
        ]);
        const readOnly = tools
          .filter((tool) => tool.annotations?.readOnlyHint === true)
          .map((tool) => tool.name)
          .sort();
        expect(readOnly).toEqual([
          'convert_html_content',
          'extract_metadata',
          'list_formats',
          'validate_html_file',
        ]);
      } finally {
        await close();
      }
    });

    test('converts HTML content', async () => {
      const { client, close } = await connectClient();
      try {
        const result = await client.callTool({
          name: 'convert_html_content',
          arguments: { html: '<h1>Hi</h1><p>World</p>' },
        });

        expect(result.isError).toBeFalsy();
        expect(result.structuredContent).toEqual({
          markdown: '---\ntitle: Hi\n---\n\n# Hi\n\nWorld\n',
          body: '# Hi\n\nWorld\n',
          metadata: { title: 'Hi' },
          warnings: [],
        });
      } finally {
        await close();
      }
    });

    test('lists formats', async () => {
      const { client, close } = await connectClient();
      try {
        const result = await client.callTool({
          name: 'list_formats',
          arguments: {},
        });

        expect(result.structuredContent).toMatchObject({
          inputFormats: ['html', 'htm', 'xhtml'],
          outputFormats: ['markdown'],
        });
      } finally {
        await close();
      }
    });
  });

  describe('tool handlers', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await mkdtemp(path.join(tmpdir(), 'page2md-mcp-'));
    });

    afterEach(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    test('convert_html_file writes the Markdown', async () => {
      const inputPath = path.join(tempDir, 'page.html');
      const outputPath = path.join(tempDir, 'page.md');
      await writeFile(inputPath, '<html><body><h1>Hi</h1></body></html>');

      const response = await convertHtmlFileToolHandler({
        inputPath,
        outputPath,
      });

      expect(response.isError).toBeUndefined();
      expect(response.structuredContent).toMatchObject({
        status: 'success',
        inputPath,
        outputPath,
        markdown: '---\ntitle: Hi\n---\n\n# Hi\n',
        manifest: [],
        warnings: [],
      });
    });

    test('convert_html_file reports a failed conversion as a tool error', async () => {
      const inputPath = path.join(tempDir, 'missing.html');

      const response = await convertHtmlFileToolHandler({ inputPath });

      expect(response.isError).toBe(true);
      expect(response.structuredContent).toEqual({
        error: `[input] Input file not found: ${inputPath}`,
        path: inputPath,
        errorCode: 'INPUT_ERROR',
      });
    });

    test('validate_html_file and extract_metadata read without writing', async () => {
      const inputPath = path.join(tempDir, 'page.html');
      await writeFile(
        inputPath,
        '<html><head><title>Doc</title></head><body><p>Text</p></body></html>'
      );

      const validation = await validateHtmlFileToolHandler({ inputPath });
      const metadata = await extractMetadataToolHandler({ inputPath });

      expect(validation.structuredContent).toMatchObject({
        valid: true,
        issues: [],
      });
      expect(metadata.structuredContent).toEqual({
        inputPath,
        metadata: { title: 'Doc' },
        warnings: [],
      });
    });
  });
});
