import http from 'node:http';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { DocCatalogUseCase } from '../application/DocCatalogUseCase.js';
import type { DocFetchUseCase } from '../application/DocFetchUseCase.js';
import type { HealthCheckUseCase } from '../application/HealthCheckUseCase.js';
import { toDocResponse, toDocSummary, toHealthResponse } from '../application/dto/DocResponses.js';
import type { CorsConfig } from '../config/types.js';
import { HttpErrors, toErrorResponse } from './HttpErrors.js';
import { Logger } from '../shared/Logger.js';

/**
 * HTTP 邊界層（node:http）
 *
 * 路由：
 *   GET /                     服務資訊
 *   GET /healthz              健康檢查（healthy → 200，其餘 → 503）
 *   GET /api/v1/docs[/]       文件列表，?category=
 *   GET /api/v1/docs/{path}   單一文件，?format=json|html
 *
 * 直接使用原始 request target 做路由（不經 URL 正規化），
 * 讓 `..%2F` 之類的路徑原樣交給 PathResolver 判斷。
 */

export const DOCS_PREFIX = '/api/v1/docs';

export interface HttpDependencies {
  catalog: DocCatalogUseCase;
  fetcher: DocFetchUseCase;
  health: HealthCheckUseCase;
  docsRoot: string;
  cors: CorsConfig;
  serviceName?: string;
  version?: string;
  logger?: Logger;
}

export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void>;

const listQuerySchema = z.object({
  category: z.string().optional().transform((v) => v || undefined),
});

const getQuerySchema = z.object({
  format: z.enum(['json', 'html']).default('json'),
});

interface RequestTarget {
  pathname: string;
  query: URLSearchParams;
}

function parseTarget(rawUrl: string | undefined): RequestTarget {
  const url = rawUrl ?? '/';
  const idx = url.indexOf('?');
  return idx >= 0
    ? { pathname: url.slice(0, idx), query: new URLSearchParams(url.slice(idx + 1)) }
    : { pathname: url, query: new URLSearchParams() };
}

function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: URLSearchParams): T {
  const parsed = schema.safeParse(Object.fromEntries(query));
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw HttpErrors.badRequest(`Invalid query parameters: ${message}`);
  }
  return parsed.data;
}

/** 逐段 percent-decode；解碼失敗視為不存在 */
function decodeDocPath(encoded: string): string {
  try {
    return encoded.split('/').map((segment) => decodeURIComponent(segment)).join('/');
  } catch {
    throw HttpErrors.notFound(`Documentation file not found: ${encoded}`);
  }
}

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function sendHtml(res: http.ServerResponse, statusCode: number, html: string): void {
  res.writeHead(statusCode, {
    'Content-Type': 'text/html; charset=utf-8',
    'Content-Length': Buffer.byteLength(html),
  });
  res.end(html);
}

/** 依設定加上 CORS headers；`*` 全開，否則只回應白名單內的 Origin */
function applyCors(req: http.IncomingMessage, res: http.ServerResponse, cors: CorsConfig): void {
  if (!cors.enabled) return;

  if (cors.allowedOrigins.includes('*')) {
    res.setHeader('Access-Control-Allow-Origin', '*');
  } else {
    const origin = req.headers.origin;
    res.setHeader('Vary', 'Origin');
    if (!origin || !cors.allowedOrigins.includes(origin)) return;
    res.setHeader('Access-Control-Allow-Origin', origin);
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
  res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID');
}

export function createRequestHandler(deps: HttpDependencies): RequestHandler {
  const logger = deps.logger ?? new Logger('HttpServer');
  const serviceName = deps.serviceName ?? 'docshelf';

  async function route(req: http.IncomingMessage, res: http.ServerResponse, target: RequestTarget): Promise<void> {
    const { pathname, query } = target;

    if (req.method === 'OPTIONS' && deps.cors.enabled) {
      res.writeHead(204);
      res.end();
      return;
    }
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.setHeader('Allow', deps.cors.enabled ? 'GET, HEAD, OPTIONS' : 'GET, HEAD');
      throw HttpErrors.methodNotAllowed(`Method ${req.method ?? ''} is not allowed`);
    }

    if (pathname === '/') {
      sendJson(res, 200, {
        service: serviceName,
        version: deps.version ?? '0.0.0',
        endpoints: { docs: DOCS_PREFIX, health: '/healthz' },
      });
      return;
    }

    if (pathname === '/healthz') {
      const result = await deps.health.check(deps.docsRoot);
      sendJson(res, result.status === 'healthy' ? 200 : 503, toHealthResponse(result));
      return;
    }

    if (pathname === DOCS_PREFIX || pathname === `${DOCS_PREFIX}/`) {
      const { category } = parseQuery(listQuerySchema, query);
      const refs = await deps.catalog.list(deps.docsRoot, category);
      sendJson(res, 200, refs.map(toDocSummary));
      return;
    }

    if (pathname.startsWith(`${DOCS_PREFIX}/`)) {
      const { format } = parseQuery(getQuerySchema, query);
      const docPath = decodeDocPath(pathname.slice(DOCS_PREFIX.length + 1));
      const fetched = await deps.fetcher.fetch(deps.docsRoot, docPath, format);
      if (fetched.kind === 'html') {
        sendHtml(res, 200, fetched.page);
      } else {
        sendJson(res, 200, toDocResponse(fetched.document));
      }
      return;
    }

    throw HttpErrors.notFound(`No route for ${pathname}`);
  }

  return async (req, res) => {
    const requestId = randomUUID();
    const startedAt = performance.now();
    const reqLogger = logger.child({ requestId });
    const target = parseTarget(req.url);
    const method = req.method ?? 'GET';

    res.setHeader('X-Request-ID', requestId);
    applyCors(req, res, deps.cors);
    reqLogger.info('request_started', { method, path: target.pathname, query: target.query.toString() });

    try {
      await route(req, res, target);
    } catch (err) {
      const { statusCode, body, expected } = toErrorResponse(err);
      if (!expected) {
        reqLogger.error('request_failed', {
          method,
          path: target.pathname,
          error: err instanceof Error ? err.stack ?? err.message : String(err),
        });
      }
      if (res.headersSent) {
        res.end();
      } else {
        sendJson(res, statusCode, body);
      }
    }

    reqLogger.info('request_completed', {
      method,
      path: target.pathname,
      statusCode: res.statusCode,
      durationMs: Math.round((performance.now() - startedAt) * 100) / 100,
    });
  };
}

export interface HttpServerOptions {
  host: string;
  port: number;
}

/** 啟動 HTTP server，listen 成功後 resolve */
export function startHttpServer(deps: HttpDependencies, options: HttpServerOptions): Promise<http.Server> {
  const logger = deps.logger ?? new Logger('HttpServer');
  const handler = createRequestHandler({ ...deps, logger });

  const server = http.createServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      logger.error('unhandled_request_error', { error: err instanceof Error ? err.message : String(err) });
      if (!res.writableEnded) res.end();
    });
  });

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : options.port;
      logger.info(`Docs HTTP server listening on http://${options.host}:${port}`, { docsRoot: deps.docsRoot });
      resolve(server);
    });
  });
}

export function closeHttpServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
