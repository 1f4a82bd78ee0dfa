import path from 'node:path';
import type { DocsFileSystemPort } from '../../domain/ports/DocsFileSystemPort.js';
import { DocPath } from '../../domain/value-objects/DocPath.js';
import {
  DocsRootUnavailableError,
  DocumentNotFoundError,
  PathForbiddenError,
} from '../../domain/errors/DomainErrors.js';

export interface ResolvedDocPath {
  /** canonical 絕對路徑（已解析 symlink） */
  absolutePath: string;
  /** 相對於 docs root、以 `/` 分隔 */
  relativePath: string;
}

/** child 是否位於 parent 之內（兩者皆為 canonical 絕對路徑） */
function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  if (rel === '') return true;
  return rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * 將使用者給的相對路徑解析成 docs root 底下的 `.md` 檔案
 *
 * 先做純字串檢查（絕對路徑、`..` 逃逸一律 Forbidden，與檔案是否存在無關），
 * 再依序嘗試候選路徑：原路徑 → 補 `.md` → `<dir>/README.md` → `<dir>/index.md`。
 * 每個存在的候選都會取 realpath，確認仍在 canonical root 之內。
 */
export class PathResolver {
  constructor(private readonly fs: DocsFileSystemPort) {}

  async resolve(rootDir: string, requestedPath: string): Promise<ResolvedDocPath> {
    const normalized = DocPath.normalize(requestedPath);
    if (!normalized.ok) {
      if (normalized.reason === 'absolute' || normalized.reason === 'escapes-root') {
        throw new PathForbiddenError(requestedPath);
      }
      throw new DocumentNotFoundError(requestedPath);
    }

    const absoluteRoot = path.resolve(rootDir);
    const canonicalRoot = await this.fs.realpath(absoluteRoot);
    if (canonicalRoot === null) {
      throw new DocsRootUnavailableError(rootDir, 'directory does not exist');
    }

    for (const candidate of this.candidates(normalized.relativePath)) {
      const lexical = path.join(absoluteRoot, ...candidate.split('/'));
      const canonical = await this.fs.realpath(lexical);
      if (canonical === null) continue;

      if (!isWithin(canonicalRoot, canonical)) {
        throw new PathForbiddenError(requestedPath);
      }
      if (!candidate.endsWith('.md')) continue;

      const info = await this.fs.stat(canonical);
      if (info?.kind === 'file') {
        return { absolutePath: canonical, relativePath: candidate };
      }
    }

    throw new DocumentNotFoundError(requestedPath);
  }

  private candidates(relativePath: string): string[] {
    const list = [relativePath];
    if (!relativePath.endsWith('.md')) {
      list.push(`${relativePath}.md`);
    }
    list.push(`${relativePath}/README.md`, `${relativePath}/index.md`);
    return list;
  }
}
