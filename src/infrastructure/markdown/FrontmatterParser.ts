import matter from 'gray-matter';
import type { DocumentMetadata } from '../../domain/entities/Document.js';

export interface ParsedMarkdown {
  /** 沒有 frontmatter（或為空）時為 null */
  frontmatter: DocumentMetadata | null;
  body: string;
  /** YAML 解析失敗或不是 mapping 時的錯誤訊息；此時 body 為整份原文 */
  frontmatterError?: string;
}

/** 開頭的 `---` 行到下一個 `---` 行；沒有結尾分隔線就不算 frontmatter */
const FRONTMATTER_BLOCK = /^---[ \t]*\r?\n(?:[\s\S]*?\r?\n)?---[ \t]*(?:\r?\n|$)/;

/** 以 gray-matter 切出 YAML frontmatter 與 markdown 本文 */
export class FrontmatterParser {
  parse(rawMarkdown: string): ParsedMarkdown {
    if (!rawMarkdown.trim()) {
      return { frontmatter: null, body: rawMarkdown };
    }
    if (!FRONTMATTER_BLOCK.test(rawMarkdown)) {
      return { frontmatter: null, body: rawMarkdown };
    }

    try {
      // 傳入空 options 物件，避免 gray-matter 以內容字串為 key 的全域快取
      const parsed = matter(rawMarkdown, {});
      const data: unknown = parsed.data;
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        return { frontmatter: null, body: rawMarkdown, frontmatterError: 'frontmatter is not a mapping' };
      }

      const frontmatter: DocumentMetadata = Object.fromEntries(Object.entries(data));
      return {
        frontmatter: Object.keys(frontmatter).length > 0 ? frontmatter : null,
        body: parsed.content,
      };
    } catch (err) {
      return {
        frontmatter: null,
        body: rawMarkdown,
        frontmatterError: err instanceof Error ? err.message : String(err),
      };
    }
  }
}
