import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { toolError } from './toolError.js';

/**
 * MCP Tool: docshelf_get
 * 對應 CLI: docshelf get <path>
 * 預設回傳原始 markdown；format = html 時回傳渲染後的 HTML 片段。
 */
export function registerGetDocTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'docshelf_get',
    'Retrieve one document by its path relative to the docs root (e.g. "architecture/overview.md")',
    {
      path: z.string().describe('Document path relative to the docs root; ".md" may be omitted'),
      format: z.enum(['markdown', 'html']).optional().default('markdown').describe('Return raw markdown or rendered HTML'),
    },
    async ({ path, format }) => {
      try {
        const { document } = await deps.fetcher.fetch(deps.docsRoot, path, 'json');
        const body = format === 'html' ? document.renderedHtml ?? '' : document.rawMarkdown;
        const lines = [
          `# ${document.ref.title}`,
          `Path: ${document.ref.relativePath} | Category: ${document.ref.category ?? '(root)'} | ${document.ref.sizeBytes} bytes`,
          '',
          body,
        ];
        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        return toolError(err);
      }
    },
  );
}
