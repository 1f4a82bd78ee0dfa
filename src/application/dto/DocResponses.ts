import type { DocumentContent, DocumentMetadata, DocumentRef } from '../../domain/entities/Document.js';
import type { HealthCheckResult } from '../../domain/entities/HealthCheckResult.js';

/** 列表回應中的單筆摘要 */
export interface DocSummary {
  path: string;
  title: string;
  category: string | null;
}

/** 單一文件的 JSON 回應 */
export interface DocResponse {
  path: string;
  title: string;
  /** 原始 markdown（含 frontmatter） */
  content: string;
  html: string | null;
  metadata: DocumentMetadata | null;
}

export interface HealthResponse {
  status: HealthCheckResult['status'];
  service: string;
  checks: Array<{ name: string; status: string; detail: string }>;
  computedAt: string;
}

export function toDocSummary(ref: DocumentRef): DocSummary {
  return { path: ref.relativePath, title: ref.title, category: ref.category };
}

export function toDocResponse(doc: DocumentContent): DocResponse {
  return {
    path: doc.ref.relativePath,
    title: doc.ref.title,
    content: doc.rawMarkdown,
    html: doc.renderedHtml,
    metadata: doc.metadata,
  };
}

export function toHealthResponse(result: HealthCheckResult): HealthResponse {
  return {
    status: result.status,
    service: result.service,
    checks: result.checks.map((c) => ({ name: c.name, status: c.status, detail: c.detail })),
    computedAt: result.computedAt,
  };
}
