import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import type { DocsConfig, PartialConfig } from './types.js';
import { LOG_LEVELS, type LogLevel } from '../shared/Logger.js';

export type { DocsConfig, PartialConfig } from './types.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/** `.docshelf.json` 的格式；未知欄位視為錯誤，避免打錯字而默默使用預設值 */
const fileConfigSchema = z.object({
  docsRoot: z.string().min(1).optional(),
  markdown: z.object({
    extensions: z.array(z.string()).optional(),
  }).strict().optional(),
  server: z.object({
    host: z.string().min(1).optional(),
    port: z.number().optional(),
  }).strict().optional(),
  cors: z.object({
    enabled: z.boolean().optional(),
    allowedOrigins: z.array(z.string()).optional(),
  }).strict().optional(),
  health: z.object({
    cacheTtlMs: z.number().optional(),
  }).strict().optional(),
  log: z.object({
    level: logLevelSchema.optional(),
  }).strict().optional(),
}).strict();

/** 淺層合併：每個區塊逐欄位以 partial 覆蓋 base */
function merge(base: DocsConfig, partial: PartialConfig): DocsConfig {
  return {
    docsRoot: partial.docsRoot ?? base.docsRoot,
    markdown: {
      extensions: partial.markdown?.extensions ?? base.markdown.extensions,
    },
    server: {
      host: partial.server?.host ?? base.server.host,
      port: partial.server?.port ?? base.server.port,
    },
    cors: {
      enabled: partial.cors?.enabled ?? base.cors.enabled,
      allowedOrigins: partial.cors?.allowedOrigins ?? base.cors.allowedOrigins,
    },
    health: {
      cacheTtlMs: partial.health?.cacheTtlMs ?? base.health.cacheTtlMs,
    },
    log: {
      level: partial.log?.level ?? base.log.level,
    },
  };
}

/** 逗號分隔字串 → 去空白、去空項目 */
export function splitList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function intFromEnv(name: string, value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}: "${value}". Expected an integer.`);
  }
  return Number.parseInt(trimmed, 10);
}

function boolFromEnv(name: string, value: string): boolean {
  const normalized = value.toLowerCase().trim();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
  if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;
  throw new Error(`Invalid ${name}: "${value}". Expected "true" or "false".`);
}

function logLevelFromEnv(value: string): LogLevel {
  const parsed = logLevelSchema.safeParse(value.toLowerCase().trim());
  if (!parsed.success) {
    throw new Error(`Invalid LOG_LEVEL: "${value}". Expected one of ${LOG_LEVELS.join(', ')}.`);
  }
  return parsed.data;
}

/** 環境變數覆蓋：DOCS_ROOT、MARKDOWN_EXTENSIONS、HOST、PORT、CORS_*、HEALTH_CACHE_TTL_MS、LOG_LEVEL */
function envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const partial: PartialConfig = {};

  if (env.DOCS_ROOT) partial.docsRoot = env.DOCS_ROOT;
  if (env.MARKDOWN_EXTENSIONS !== undefined) {
    partial.markdown = { extensions: splitList(env.MARKDOWN_EXTENSIONS) };
  }

  if (env.HOST) partial.server = { ...partial.server, host: env.HOST };
  if (env.PORT) partial.server = { ...partial.server, port: intFromEnv('PORT', env.PORT) };

  if (env.CORS_ENABLED) {
    partial.cors = { ...partial.cors, enabled: boolFromEnv('CORS_ENABLED', env.CORS_ENABLED) };
  }
  if (env.CORS_ALLOWED_ORIGINS) {
    partial.cors = { ...partial.cors, allowedOrigins: splitList(env.CORS_ALLOWED_ORIGINS) };
  }

  if (env.HEALTH_CACHE_TTL_MS) {
    partial.health = { cacheTtlMs: intFromEnv('HEALTH_CACHE_TTL_MS', env.HEALTH_CACHE_TTL_MS) };
  }
  if (env.LOG_LEVEL) partial.log = { level: logLevelFromEnv(env.LOG_LEVEL) };

  return partial;
}

function readConfigFile(baseDir: string): PartialConfig {
  const configPath = path.join(baseDir, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = fileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${issues}`);
  }
  return parsed.data;
}

/** 驗證設定值的合法性 */
function validate(config: DocsConfig): void {
  const { port } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error('port must be an integer between 0 and 65535');
  }

  const { cacheTtlMs } = config.health;
  if (!Number.isInteger(cacheTtlMs) || cacheTtlMs < 0) {
    throw new Error('cacheTtlMs must be a non-negative integer');
  }

  if (!config.docsRoot.trim()) {
    throw new Error('docsRoot must not be empty');
  }
}

/**
 * 載入設定：讀取 .docshelf.json（若存在）並合併到預設值上
 * @param baseDir - 設定檔所在目錄，相對的 docsRoot 也以此解析
 * @param overrides - 程式碼層級的覆蓋值（例如 CLI flags，優先權最高）
 * @param env - 環境變數來源（優先於檔案）
 */
export function loadConfig(
  baseDir: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): DocsConfig {
  // 合併順序：defaults < file config < env < overrides
  let merged = merge(DEFAULT_CONFIG, readConfigFile(baseDir));
  merged = merge(merged, envOverrides(env));
  if (overrides) {
    merged = merge(merged, overrides);
  }

  validate(merged);
  return { ...merged, docsRoot: path.resolve(baseDir, merged.docsRoot) };
}
