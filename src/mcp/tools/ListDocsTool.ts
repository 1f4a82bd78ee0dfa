import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { McpDependencies } from '../McpServer.js';
import { toolError } from './toolError.js';

/**
 * MCP Tool: docshelf_list
 * 對應 CLI: docshelf list [--category]
 */
export function registerListDocsTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'docshelf_list',
    'List markdown documents under the docs root, optionally filtered by category (top-level directory)',
    {
      category: z.string().optional().describe('Exact top-level directory name, e.g. "architecture" or "adr"'),
    },
    async ({ category }) => {
      try {
        const refs = await deps.catalog.list(deps.docsRoot, category);
        if (refs.length === 0) {
          return {
            content: [{ type: 'text' as const, text: category ? `No documents in category "${category}".` : 'No documents found.' }],
          };
        }

        const lines = [`Found ${refs.length} documents`, ''];
        for (const ref of refs) {
          lines.push(`${ref.relativePath} — ${ref.title}${ref.category ? ` [${ref.category}]` : ''}`);
        }
        return {
          content: [{ type: 'text' as const, text: lines.join('\n') }],
        };
      } catch (err) {
        return toolError(err);
      }
    },
  );
}
