/** 文件在 docs root 底下的描述；每次請求由檔案列表即時建構，不持久化 */
export interface DocumentRef {
  /** 以 `/` 分隔、無前導斜線、無 `..` 的相對路徑 */
  relativePath: string;
  /** 第一層目錄名稱；直接放在 root 的檔案為 null */
  category: string | null;
  title: string;
  sizeBytes: number;
  modifiedTime: Date;
}

export type DocumentMetadata = Record<string, unknown>;

/** 單一文件的完整內容，回應送出後即丟棄（不快取） */
export interface DocumentContent {
  ref: DocumentRef;
  /** 檔案原始內容（含 frontmatter） */
  rawMarkdown: string;
  renderedHtml: string | null;
  /** frontmatter 解析結果；沒有 frontmatter 時為 null */
  metadata: DocumentMetadata | null;
}

export type DocFormat = 'json' | 'html';

export type FetchedDocument =
  | { kind: 'json'; document: DocumentContent }
  | { kind: 'html'; document: DocumentContent; page: string };
