import path from 'node:path';
import type { DocsFileSystemPort } from '../domain/ports/DocsFileSystemPort.js';
import type { DocumentRef } from '../domain/entities/Document.js';
import { DocPath } from '../domain/value-objects/DocPath.js';
import { DocumentTitle } from '../domain/value-objects/DocumentTitle.js';
import { DocsRootUnavailableError } from '../domain/errors/DomainErrors.js';
import type { FrontmatterParser } from '../infrastructure/markdown/FrontmatterParser.js';
import { Logger } from '../shared/Logger.js';

/**
 * 文件目錄用例：列出 docs root 底下所有 `.md`，可依 category（第一層目錄）過濾
 *
 * - root 不存在、不是目錄或不可讀 → DocsRootUnavailableError
 * - category 比對為大小寫敏感的完全相等；root 層級的檔案（category = null）不符合任何 filter
 * - 依 relativePath 的 code unit 順序排序
 */
export class DocCatalogUseCase {
  constructor(
    private readonly fs: DocsFileSystemPort,
    private readonly parser: FrontmatterParser,
    private readonly logger: Logger = new Logger('DocCatalog'),
  ) {}

  async list(rootDir: string, categoryFilter?: string | null): Promise<DocumentRef[]> {
    const absoluteRoot = path.resolve(rootDir);
    await this.assertRootAvailable(rootDir, absoluteRoot);

    let files: string[];
    try {
      files = await this.fs.listMarkdownFiles(absoluteRoot);
    } catch (err) {
      throw new DocsRootUnavailableError(rootDir, 'directory could not be listed', { cause: err });
    }

    const filter = categoryFilter ?? null;
    const matched = files
      .map((file) => ({ file, docPath: DocPath.fromRelative(path.relative(absoluteRoot, file)) }))
      .filter(({ docPath }) => filter === null || docPath.category === filter)
      .sort((a, b) => compareCodeUnits(a.docPath.value, b.docPath.value));

    const refs: DocumentRef[] = [];
    for (const { file, docPath } of matched) {
      const ref = await this.describe(file, docPath);
      if (ref) refs.push(ref);
    }

    this.logger.info('listed_docs', { count: refs.length, category: filter });
    return refs;
  }

  private async assertRootAvailable(rootDir: string, absoluteRoot: string): Promise<void> {
    const info = await this.fs.stat(absoluteRoot);
    if (info === null) {
      throw new DocsRootUnavailableError(rootDir, 'directory does not exist');
    }
    if (info.kind !== 'directory') {
      throw new DocsRootUnavailableError(rootDir, 'not a directory');
    }
    if (!(await this.fs.isReadable(absoluteRoot))) {
      throw new DocsRootUnavailableError(rootDir, 'directory is not readable');
    }
  }

  /** 建立單一檔案的 DocumentRef；檔案在走訪後被刪除時回傳 null */
  private async describe(file: string, docPath: DocPath): Promise<DocumentRef | null> {
    const info = await this.fs.stat(file);
    if (info === null) {
      this.logger.warn('doc_vanished_during_listing', { path: docPath.value });
      return null;
    }

    let title: string;
    try {
      const { body } = this.parser.parse(await this.fs.readText(file));
      title = DocumentTitle.derive(body, docPath.fileName);
    } catch (err) {
      this.logger.warn('failed_to_read_doc', {
        path: docPath.value,
        error: err instanceof Error ? err.message : String(err),
      });
      title = DocumentTitle.fromFileName(docPath.fileName);
    }

    return {
      relativePath: docPath.value,
      category: docPath.category,
      title,
      sizeBytes: info.size,
      modifiedTime: new Date(info.mtimeMs),
    };
  }
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
