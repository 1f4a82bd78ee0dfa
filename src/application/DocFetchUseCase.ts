import type { DocsFileSystemPort } from '../domain/ports/DocsFileSystemPort.js';
import type { DocFormat, DocumentContent, FetchedDocument } from '../domain/entities/Document.js';
import { DocPath } from '../domain/value-objects/DocPath.js';
import { DocumentTitle } from '../domain/value-objects/DocumentTitle.js';
import { DocumentNotFoundError } from '../domain/errors/DomainErrors.js';
import type { PathResolver } from '../infrastructure/filesystem/PathResolver.js';
import type { FrontmatterParser } from '../infrastructure/markdown/FrontmatterParser.js';
import type { MarkdownRenderer } from '../infrastructure/markdown/MarkdownRenderer.js';
import { renderHtmlPage } from '../infrastructure/markdown/HtmlPageTemplate.js';
import { Logger } from '../shared/Logger.js';

/**
 * 取回單一文件：PathResolver → 讀檔（嚴格 UTF-8）→ 切 frontmatter → 渲染
 *
 * 不論格式都會渲染；format = html 時另外包成完整頁面。
 * PathResolver 與讀檔的錯誤原樣往上拋，由邊界層對應成 HTTP status。
 */
export class DocFetchUseCase {
  constructor(
    private readonly fs: DocsFileSystemPort,
    private readonly resolver: PathResolver,
    private readonly parser: FrontmatterParser,
    private readonly renderer: MarkdownRenderer,
    private readonly logger: Logger = new Logger('DocFetch'),
  ) {}

  async fetch(rootDir: string, requestedPath: string, format: DocFormat = 'json'): Promise<FetchedDocument> {
    const resolved = await this.resolver.resolve(rootDir, requestedPath);
    const rawMarkdown = await this.fs.readText(resolved.absolutePath);

    // 解析與讀檔之間被刪除
    const info = await this.fs.stat(resolved.absolutePath);
    if (info === null) {
      throw new DocumentNotFoundError(requestedPath);
    }

    const parsed = this.parser.parse(rawMarkdown);
    if (parsed.frontmatterError) {
      this.logger.warn('invalid_frontmatter', { path: resolved.relativePath, error: parsed.frontmatterError });
    }

    const docPath = DocPath.fromRelative(resolved.relativePath);
    const renderedHtml = this.renderer.render(parsed.body);
    const document: DocumentContent = {
      ref: {
        relativePath: docPath.value,
        category: docPath.category,
        title: DocumentTitle.derive(parsed.body, docPath.fileName),
        sizeBytes: info.size,
        modifiedTime: new Date(info.mtimeMs),
      },
      rawMarkdown,
      renderedHtml,
      metadata: parsed.frontmatter,
    };

    this.logger.info('served_doc', { path: docPath.value, format });

    if (format === 'html') {
      return { kind: 'html', document, page: renderHtmlPage(document.ref.title, renderedHtml) };
    }
    return { kind: 'json', document };
  }
}
