export type EntryKind = 'file' | 'directory' | 'other';

export interface FileInfo {
  path: string;
  kind: EntryKind;
  size: number;
  mtimeMs: number;
}

/** docs root 的唯讀檔案系統存取；健康檢查與路徑解析都只透過這個 port 碰磁碟 */
export interface DocsFileSystemPort {
  /** 不存在時回傳 null（跟隨 symlink） */
  stat(filePath: string): Promise<FileInfo | null>;
  /** 回傳 canonical 路徑；不存在時回傳 null */
  realpath(filePath: string): Promise<string | null>;
  isReadable(dirPath: string): Promise<boolean>;
  /** 以嚴格 UTF-8 解碼讀取 */
  readText(filePath: string): Promise<string>;
  /** 遞迴列出 `.md` 檔案的絕對路徑（跳過隱藏項目） */
  listMarkdownFiles(dirPath: string): Promise<string[]>;
}
