const FENCE = /^\s{0,3}(```|~~~)/;
const H1 = /^# +(.*?)(?: +#+)? *$/;

/**
 * 文件標題推導規則
 *
 * 1. markdown 本文（不含 frontmatter）第一個 `# ` 開頭的行，跳過 fenced code block 內的行
 * 2. 否則用檔名：去掉 `.md`，`-` / `_` 換成空白，每個字首字母大寫（其餘字母保持原樣）
 */
export class DocumentTitle {
  static derive(markdownBody: string, fileName: string): string {
    return DocumentTitle.fromHeading(markdownBody) ?? DocumentTitle.fromFileName(fileName);
  }

  static fromHeading(markdownBody: string): string | null {
    let inFence = false;
    for (const line of markdownBody.split(/\r?\n/)) {
      if (FENCE.test(line)) {
        inFence = !inFence;
        continue;
      }
      if (inFence) continue;

      const match = H1.exec(line);
      if (match && match[1].trim()) {
        return match[1].trim();
      }
    }
    return null;
  }

  static fromFileName(fileName: string): string {
    const stem = fileName.replace(/\.md$/i, '');
    const words = stem.split(/[-_\s]+/).filter(Boolean);
    if (words.length === 0) return stem;
    return words.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join(' ');
  }
}
