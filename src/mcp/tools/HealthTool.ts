import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: docshelf_health
 * 對應 CLI: docshelf health
 */
export function registerHealthTool(server: McpServer, deps: McpDependencies): void {
  server.tool(
    'docshelf_health',
    'Show docs root health: existence, readability and markdown file count',
    {},
    async () => {
      const result = await deps.health.check(deps.docsRoot);
      const lines = [`Status: ${result.status} (${result.service}, computed ${result.computedAt})`, ''];
      for (const check of result.checks) {
        lines.push(`  [${check.status}] ${check.name}: ${check.detail}`);
      }
      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
