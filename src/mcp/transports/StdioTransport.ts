import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { Logger } from '../../shared/Logger.js';

/**
 * Stdio Transport
 *
 * 透過 stdin/stdout 與 LLM client 通訊；stdout 只能輸出 MCP 訊息，log 一律走 stderr。
 */
export async function startStdioTransport(
  server: McpServer,
  logger: Logger = new Logger('StdioTransport'),
): Promise<StdioServerTransport> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('MCP stdio server ready');
  return transport;
}
