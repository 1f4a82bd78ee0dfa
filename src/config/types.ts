import type { LogLevel } from '../shared/Logger.js';

/** Markdown 渲染設定 */
export interface MarkdownConfig {
  /** 啟用的 extension 名稱（fenced_code、codehilite、tables、toc、extra） */
  extensions: string[];
}

/** HTTP server 設定 */
export interface ServerConfig {
  host: string;
  port: number;
}

/** CORS 設定（只有 HTTP 邊界層會用到） */
export interface CorsConfig {
  enabled: boolean;
  /** `*` 代表全部允許 */
  allowedOrigins: string[];
}

/** 健康檢查設定 */
export interface HealthConfig {
  /** 快取 TTL（毫秒，預設 5 秒） */
  cacheTtlMs: number;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface DocsConfig {
  /** docs root 的絕對路徑（載入時以 baseDir 解析） */
  docsRoot: string;
  markdown: MarkdownConfig;
  server: ServerConfig;
  cors: CorsConfig;
  health: HealthConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  docsRoot?: string;
} & {
  [K in Exclude<keyof DocsConfig, 'docsRoot'>]?: Partial<DocsConfig[K]>;
};
