import type { DocsConfig } from './types.js';

export const CONFIG_FILE_NAME = '.docshelf.json';

export const DEFAULT_CONFIG: DocsConfig = {
  docsRoot: 'docs',
  markdown: {
    extensions: ['fenced_code', 'codehilite', 'tables', 'toc', 'extra'],
  },
  server: {
    host: '127.0.0.1',
    port: 8000,
  },
  cors: {
    enabled: true,
    allowedOrigins: ['*'],
  },
  health: {
    cacheTtlMs: 5000, // 5 秒
  },
  log: {
    level: 'info',
  },
};
