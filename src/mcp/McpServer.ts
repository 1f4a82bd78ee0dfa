import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { DocCatalogUseCase } from '../application/DocCatalogUseCase.js';
import type { DocFetchUseCase } from '../application/DocFetchUseCase.js';
import type { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import { registerListDocsTool } from './tools/ListDocsTool.js';
import { registerGetDocTool } from './tools/GetDocTool.js';
import { registerHealthTool } from './tools/HealthTool.js';

/**
 * MCP Server Factory
 *
 * 設計意圖：把 HTTP API 的三個讀取操作（列表、取文件、健康檢查）以 MCP 工具提供給 LLM client。
 * 工具與 CLI 指令一一對應，共用同一組 use case。
 */

export interface McpDependencies {
  catalog: DocCatalogUseCase;
  fetcher: DocFetchUseCase;
  health: HealthCheckUseCase;
  docsRoot: string;
  version?: string;
}

export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'docshelf', version: deps.version ?? '0.0.0' },
    { instructions: buildInstructions(deps.docsRoot) },
  );

  registerListDocsTool(server, deps);
  registerGetDocTool(server, deps);
  registerHealthTool(server, deps);

  return server;
}

/** 建構 MCP server 的 instructions 文字 */
export function buildInstructions(docsRoot: string): string {
  return [
    'docshelf: read-only access to a tree of markdown documentation.',
    '',
    'Available tools:',
    '- docshelf_list: List documents, optionally by category (top-level directory such as architecture, adr, runbooks)',
    '- docshelf_get: Read one document by path (raw markdown or rendered HTML)',
    '- docshelf_health: Check that the docs root exists, is readable and contains markdown files',
    '',
    'Recommended workflow:',
    '1. docshelf_list to discover documents and their categories',
    '2. docshelf_get with a path from the list',
    '',
    `Docs root: ${docsRoot}`,
  ].join('\n');
}
