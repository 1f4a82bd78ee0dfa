import fs from 'node:fs/promises';
import { constants, type Dirent } from 'node:fs';
import path from 'node:path';
import type { DocsFileSystemPort, EntryKind, FileInfo } from '../../domain/ports/DocsFileSystemPort.js';
import { DocumentDecodeError, DocumentReadError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/** 「不存在」類的錯誤碼：視為查無此路徑，其餘錯誤往上拋 */
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ELOOP']);

/** 走訪時遇到這些錯誤碼的子目錄整個略過 */
const DENIED_CODES = new Set(['EACCES', 'EPERM']);

function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function isMissing(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && MISSING_CODES.has(code);
}

export class FileSystemDocsAdapter implements DocsFileSystemPort {
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly logger: Logger = new Logger('FileSystemDocsAdapter')) {}

  async stat(filePath: string): Promise<FileInfo | null> {
    try {
      const stat = await fs.stat(filePath);
      const kind: EntryKind = stat.isFile() ? 'file' : stat.isDirectory() ? 'directory' : 'other';
      return { path: filePath, kind, size: stat.size, mtimeMs: stat.mtimeMs };
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async realpath(filePath: string): Promise<string | null> {
    try {
      return await fs.realpath(filePath);
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async isReadable(dirPath: string): Promise<boolean> {
    try {
      await fs.access(dirPath, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  }

  async readText(filePath: string): Promise<string> {
    let bytes: Buffer;
    try {
      bytes = await fs.readFile(filePath);
    } catch (err) {
      throw new DocumentReadError(filePath, { cause: err });
    }

    try {
      return this.decoder.decode(bytes);
    } catch (err) {
      throw new DocumentDecodeError(filePath, { cause: err });
    }
  }

  async listMarkdownFiles(dirPath: string): Promise<string[]> {
    const results: string[] = [];
    await this.walkDir(dirPath, results, true);
    return results;
  }

  /**
   * 遞迴走訪目錄，收集 .md 檔案（跳過隱藏項目與 symlink）
   * root 本身讀取失敗往上拋；root 以下無權限的子目錄記 warn 後略過
   */
  private async walkDir(dir: string, results: string[], isRoot: boolean = false): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      const code = errorCode(err);
      if (isRoot || code === undefined || !DENIED_CODES.has(code)) throw err;
      this.logger.warn('skipped_unreadable_directory', { path: dir, code });
      return;
    }

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.walkDir(fullPath, results);
      } else if (entry.isFile() && entry.name.endsWith('.md')) {
        results.push(fullPath);
      }
    }
  }
}
