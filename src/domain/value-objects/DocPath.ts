import path from 'node:path';

export type DocPathNormalization =
  | { ok: true; relativePath: string }
  | { ok: false; reason: 'absolute' | 'escapes-root' | 'empty' | 'invalid' };

/**
 * docs root 底下的相對路徑值物件
 *
 * 只做字串層級的正規化與 category 推導，不碰檔案系統；
 * 實際存在與否、symlink 是否逃出 root 由 PathResolver 檢查。
 */
export class DocPath {
  private constructor(public readonly value: string) {}

  /**
   * 正規化使用者輸入的路徑
   * - `\` 視為 `/`
   * - 絕對路徑（`/…`、`C:…`）→ absolute
   * - 正規化後仍以 `..` 開頭 → escapes-root
   * - 去掉首尾斜線後為空 → empty
   */
  static normalize(requested: string): DocPathNormalization {
    if (requested.includes('\0')) return { ok: false, reason: 'invalid' };

    const slashed = requested.replaceAll('\\', '/');
    if (path.posix.isAbsolute(slashed) || /^[A-Za-z]:/.test(slashed)) {
      return { ok: false, reason: 'absolute' };
    }

    const normalized = path.posix.normalize(slashed).replace(/\/+$/, '');
    if (normalized === '..' || normalized.startsWith('../')) {
      return { ok: false, reason: 'escapes-root' };
    }
    if (normalized === '' || normalized === '.') {
      return { ok: false, reason: 'empty' };
    }
    return { ok: true, relativePath: normalized };
  }

  /** 從平台路徑（可能含 `\`）建立 */
  static fromRelative(relativePath: string): DocPath {
    return new DocPath(relativePath.split(path.sep).join('/'));
  }

  /** 第一層目錄；直接在 root 的檔案回傳 null */
  get category(): string | null {
    const idx = this.value.indexOf('/');
    return idx > 0 ? this.value.slice(0, idx) : null;
  }

  get fileName(): string {
    return path.posix.basename(this.value);
  }

  toString(): string {
    return this.value;
  }
}
