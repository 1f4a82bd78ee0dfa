import type { Command } from 'commander';
import { addCommonOptions, createCliContext, type CommonOptions } from '../container.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { version } from '../version.js';

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   docshelf mcp [--docs-root ./docs]
 */
export function registerMcpCommand(program: Command): void {
  addCommonOptions(
    program
      .command('mcp')
      .description('Start an MCP server over stdio for LLM tool integration'),
  )
    .action(async (opts: CommonOptions) => {
      const ctx = createCliContext(opts);

      const server = createMcpServer({
        catalog: ctx.catalog,
        fetcher: ctx.fetcher,
        health: ctx.health,
        docsRoot: ctx.config.docsRoot,
        version,
      });

      // stdio 模式：持續執行直到 stdin 關閉
      await startStdioTransport(server, ctx.logger.child({}, 'StdioTransport'));

      process.once('SIGINT', () => {
        server.close().then(
          () => process.exit(0),
          () => process.exit(1),
        );
      });
    });
}
