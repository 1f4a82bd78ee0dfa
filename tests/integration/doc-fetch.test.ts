import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { DocFetchUseCase } from '../../src/application/DocFetchUseCase.js';
import { FileSystemDocsAdapter } from '../../src/infrastructure/filesystem/FileSystemDocsAdapter.js';
import { PathResolver } from '../../src/infrastructure/filesystem/PathResolver.js';
import { FrontmatterParser } from '../../src/infrastructure/markdown/FrontmatterParser.js';
import { MarkdownRenderer } from '../../src/infrastructure/markdown/MarkdownRenderer.js';
import {
  DocumentDecodeError,
  DocumentNotFoundError,
  PathForbiddenError,
} from '../../src/domain/errors/DomainErrors.js';
import { Logger } from '../../src/shared/Logger.js';
import { SAMPLE_DOCS, createDocsTree, removeDocsTree } from '../helpers/docsTree.js';

/**
 * Feature: 取回單一文件
 *
 * 作為文件讀者，我需要以相對路徑取得原始 markdown、渲染後的 HTML 與 frontmatter。
 */
describe('DocFetchUseCase', () => {
  let root: string;
  let fetcher: DocFetchUseCase;

  beforeEach(() => {
    root = createDocsTree('fetch');
    const fsAdapter = new FileSystemDocsAdapter();
    const logger = new Logger('test', 'error');
    fetcher = new DocFetchUseCase(
      fsAdapter,
      new PathResolver(fsAdapter),
      new FrontmatterParser(),
      new MarkdownRenderer(undefined, logger),
      logger,
    );
  });

  afterEach(() => {
    removeDocsTree(root);
  });

  /**
   * Scenario: 取得 architecture/overview.md
   * Given docs root 內有 architecture/overview.md
   * When 以 json 格式取回
   * Then 原文與檔案內容完全相同，HTML 含帶 id 的標題
   */
  it('should return raw markdown, rendered HTML and reference data', async () => {
    const fetched = await fetcher.fetch(root, 'architecture/overview.md');

    expect(fetched.kind).toBe('json');
    const { document } = fetched;
    expect(document.rawMarkdown).toBe(SAMPLE_DOCS['architecture/overview.md']);
    expect(document.renderedHtml).toContain('<h1 id="overview">Overview</h1>');
    expect(document.metadata).toBeNull();
    expect(document.ref).toMatchObject({
      relativePath: 'architecture/overview.md',
      category: 'architecture',
      title: 'Overview',
      sizeBytes: Buffer.byteLength(SAMPLE_DOCS['architecture/overview.md']),
    });
  });

  it('should expose frontmatter as metadata and keep it out of the HTML', async () => {
    const { document } = await fetcher.fetch(root, 'adr/0001-record-decisions');

    expect(document.rawMarkdown).toBe(SAMPLE_DOCS['adr/0001-record-decisions.md']);
    expect(document.metadata).toEqual({ status: 'accepted', owners: ['platform'] });
    expect(document.renderedHtml).toContain('<h1 id="adr-1-record-decisions">ADR 1: Record decisions</h1>');
    expect(document.renderedHtml).not.toContain('status: accepted');
  });

  it('should return the same bytes on repeated fetches', async () => {
    const first = await fetcher.fetch(root, 'README.md');
    const second = await fetcher.fetch(root, 'README.md');
    expect(second.document.rawMarkdown).toBe(first.document.rawMarkdown);
    expect(second.document.renderedHtml).toBe(first.document.renderedHtml);
  });

  it('should wrap the document in a full HTML page', async () => {
    const fetched = await fetcher.fetch(root, 'guides', 'html');

    expect(fetched.kind).toBe('html');
    if (fetched.kind !== 'html') return;
    expect(fetched.document.ref.relativePath).toBe('guides/index.md');
    expect(fetched.page).toContain('<title>Guides - docshelf</title>');
    expect(fetched.page).toContain('<h1 id="guides">Guides</h1>');
  });

  it('should reject path traversal', async () => {
    await expect(fetcher.fetch(root, '../../etc/passwd')).rejects.toBeInstanceOf(PathForbiddenError);
  });

  it('should reject missing documents', async () => {
    await expect(fetcher.fetch(root, 'architecture/missing.md')).rejects.toBeInstanceOf(DocumentNotFoundError);
  });

  it('should reject documents that are not valid UTF-8', async () => {
    fs.writeFileSync(path.join(root, 'broken.md'), Buffer.from([0x23, 0x20, 0xff, 0x0a]));

    await expect(fetcher.fetch(root, 'broken.md')).rejects.toBeInstanceOf(DocumentDecodeError);
  });

  it('should still serve a document whose frontmatter is invalid', async () => {
    fs.writeFileSync(path.join(root, 'odd.md'), '---\ntitle: [unclosed\n---\n# Odd\n');

    const { document } = await fetcher.fetch(root, 'odd.md');
    expect(document.metadata).toBeNull();
    expect(document.ref.title).toBe('Odd');
  });

  it('should keep the body of a document whose opening delimiter is never closed', async () => {
    const content = '---\n# Deploy Guide\n\nRun the script.\n';
    fs.writeFileSync(path.join(root, 'guide.md'), content);

    const { document } = await fetcher.fetch(root, 'guide.md');
    expect(document.rawMarkdown).toBe(content);
    expect(document.metadata).toBeNull();
    expect(document.ref.title).toBe('Deploy Guide');
    expect(document.renderedHtml).toContain('<h1 id="deploy-guide">Deploy Guide</h1>');
    expect(document.renderedHtml).toContain('<p>Run the script.</p>');
  });

  it('should serve a document with scalar frontmatter without metadata', async () => {
    fs.writeFileSync(path.join(root, 'note.md'), '---\njust a note\n---\n# Hi\n');

    const { document } = await fetcher.fetch(root, 'note.md');
    expect(document.metadata).toBeNull();
    expect(document.ref.title).toBe('Hi');
  });
});
