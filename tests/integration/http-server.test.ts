import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type http from 'node:http';
import path from 'node:path';
import { closeHttpServer, startHttpServer } from '../../src/http/HttpServer.js';
import type { CorsConfig } from '../../src/config/types.js';
import { SAMPLE_DOCS, createDocsTree, removeDocsTree } from '../helpers/docsTree.js';
import { createServices } from '../helpers/services.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

async function startServer(docsRoot: string, cors: CorsConfig = { enabled: true, allowedOrigins: ['*'] }) {
  const services = createServices();
  const server = await startHttpServer(
    { ...services, docsRoot, cors, version: '1.2.3' },
    { host: '127.0.0.1', port: 0 },
  );
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

/**
 * Feature: HTTP API
 *
 * 作為文件網站前端，我需要透過 /api/v1/docs 列出與取得文件，並以 /healthz 監控服務。
 */
describe('HTTP server', () => {
  let root: string;
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    root = createDocsTree('http');
    ({ server, baseUrl } = await startServer(root));
  });

  afterAll(async () => {
    await closeHttpServer(server);
    removeDocsTree(root);
  });

  it('should describe the service at /', async () => {
    const res = await fetch(`${baseUrl}/`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      service: 'docshelf',
      version: '1.2.3',
      endpoints: { docs: '/api/v1/docs', health: '/healthz' },
    });
  });

  it('should list documents', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('application/json; charset=utf-8');
    const body: unknown = await res.json();
    expect(Array.isArray(body) && body.length).toBe(6);
    expect(Array.isArray(body) && body[0]).toEqual({ path: 'README.md', title: 'Docs Home', category: null });
  });

  it('should list documents without the trailing slash', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs`);
    expect(res.status).toBe(200);
  });

  it('should filter the list by category', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/?category=adr`);
    expect(await res.json()).toEqual([
      { path: 'adr/0001-record-decisions.md', title: 'ADR 1: Record decisions', category: 'adr' },
      { path: 'adr/README.md', title: 'Decision Log', category: 'adr' },
    ]);
  });

  it('should return a document as JSON by default', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/architecture/overview.md`);

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toEqual({
      path: 'architecture/overview.md',
      title: 'Overview',
      content: SAMPLE_DOCS['architecture/overview.md'],
      html: expect.stringContaining('<h1 id="overview">Overview</h1>'),
      metadata: null,
    });
  });

  it('should include frontmatter metadata in the JSON response', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/adr/0001-record-decisions.md`);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ metadata: { status: 'accepted', owners: ['platform'] } });
  });

  it('should return a full HTML page when format=html', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/architecture/overview.md?format=html`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8');
    const html = await res.text();
    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>Overview - docshelf</title>');
  });

  it('should reject an unknown format with 400', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/README.md?format=pdf`);

    expect(res.status).toBe(400);
    const body: unknown = await res.json();
    expect(body).toMatchObject({ error_kind: 'BadRequest' });
  });

  it('should decode percent-encoded path segments', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/architecture/overview%2Emd`);
    expect(res.status).toBe(200);
  });

  /**
   * Scenario: 編碼過的路徑穿越
   * Given 攻擊者送出 ..%2F..%2Fetc%2Fpasswd
   * When 解碼後交給 PathResolver
   * Then 回傳 403 與 Forbidden 錯誤
   */
  it('should answer encoded traversal with 403', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/..%2F..%2Fetc%2Fpasswd`);

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({
      error_kind: 'Forbidden',
      message: 'Path escapes the docs root: ../../etc/passwd',
    });
  });

  it('should answer a missing document with 404', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/missing.md`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error_kind: 'NotFound',
      message: 'Documentation file not found: missing.md',
    });
  });

  it('should answer malformed percent-encoding with 404', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/%E0%A4%A`);
    expect(res.status).toBe(404);
  });

  it('should answer unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/api/v2/docs`);
    expect(res.status).toBe(404);
  });

  it('should report health at /healthz', async () => {
    const res = await fetch(`${baseUrl}/healthz`);

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      status: 'healthy',
      service: 'docshelf',
      checks: [
        { name: 'service-up', status: 'ok' },
        { name: 'root-exists', status: 'ok', detail: root },
        { name: 'root-readable', status: 'ok' },
        { name: 'markdown-file-count', status: 'ok', detail: '6 markdown files' },
      ],
    });
  });

  it('should tag every response with a request id', async () => {
    const first = await fetch(`${baseUrl}/healthz`);
    const second = await fetch(`${baseUrl}/api/v1/docs/missing.md`);

    expect(first.headers.get('x-request-id')).toMatch(UUID);
    expect(second.headers.get('x-request-id')).toMatch(UUID);
    expect(first.headers.get('x-request-id')).not.toBe(second.headers.get('x-request-id'));
  });

  it('should send CORS headers', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/`, { headers: { Origin: 'https://docs.example' } });
    expect(res.headers.get('access-control-allow-origin')).toBe('*');
  });

  it('should answer preflight requests with 204', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/`, { method: 'OPTIONS' });
    expect(res.status).toBe(204);
    expect(res.headers.get('access-control-allow-methods')).toBe('GET, OPTIONS');
  });

  it('should reject writes with 405', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/README.md`, { method: 'POST', body: 'x' });

    expect(res.status).toBe(405);
    expect(res.headers.get('allow')).toBe('GET, HEAD, OPTIONS');
    expect(await res.json()).toEqual({ error_kind: 'MethodNotAllowed', message: 'Method POST is not allowed' });
  });
});

describe('HTTP server with a missing docs root', () => {
  let root: string;
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    root = createDocsTree('http-missing');
    ({ server, baseUrl } = await startServer(path.join(root, 'gone')));
  });

  afterAll(async () => {
    await closeHttpServer(server);
    removeDocsTree(root);
  });

  it('should answer /healthz with 503', async () => {
    const res = await fetch(`${baseUrl}/healthz`);

    expect(res.status).toBe(503);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      status: 'unhealthy',
      checks: [
        { name: 'service-up', status: 'ok' },
        { name: 'root-exists', status: 'fail' },
        { name: 'root-readable', status: 'fail' },
        { name: 'markdown-file-count', status: 'fail' },
      ],
    });
  });

  it('should answer the list with 503 Unavailable', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ error_kind: 'Unavailable' });
  });

  it('should answer document requests with 503 Unavailable', async () => {
    const res = await fetch(`${baseUrl}/api/v1/docs/README.md`);
    expect(res.status).toBe(503);
  });
});

describe('HTTP server with an origin allow-list', () => {
  let root: string;
  let server: http.Server;
  let baseUrl: string;

  beforeAll(async () => {
    root = createDocsTree('http-cors');
    ({ server, baseUrl } = await startServer(root, { enabled: true, allowedOrigins: ['https://docs.example'] }));
  });

  afterAll(async () => {
    await closeHttpServer(server);
    removeDocsTree(root);
  });

  it('should echo an allowed origin', async () => {
    const res = await fetch(`${baseUrl}/`, { headers: { Origin: 'https://docs.example' } });
    expect(res.headers.get('access-control-allow-origin')).toBe('https://docs.example');
    expect(res.headers.get('vary')).toBe('Origin');
  });

  it('should omit CORS headers for other origins', async () => {
    const res = await fetch(`${baseUrl}/`, { headers: { Origin: 'https://evil.example' } });
    expect(res.headers.get('access-control-allow-origin')).toBeNull();
  });
});
