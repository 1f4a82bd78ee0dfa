import type { DocumentContent, DocumentRef } from '../../domain/entities/Document.js';
import { toDocResponse } from '../../application/dto/DocResponses.js';

export type OutputFormat = 'json' | 'text';

/**
 * CLI 輸出格式化器
 *
 * - json：給程式讀取，欄位與 HTTP API 相同
 * - text：給人看，列表一行一筆、物件平展成縮排的 key: value
 */
export class OutputFormatter {
  formatDocList(refs: DocumentRef[], format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(refs.map((ref) => ({
        path: ref.relativePath,
        title: ref.title,
        category: ref.category,
        sizeBytes: ref.sizeBytes,
        modifiedTime: ref.modifiedTime.toISOString(),
      })), null, 2);
    }
    if (refs.length === 0) return 'No documents found.';

    return refs
      .map((ref) => `${ref.relativePath}  ${ref.title}${ref.category ? ` [${ref.category}]` : ''}`)
      .join('\n');
  }

  formatDocument(doc: DocumentContent, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(toDocResponse(doc), null, 2);
    }
    return [
      `# ${doc.ref.title}`,
      `Path: ${doc.ref.relativePath} | ${doc.ref.sizeBytes} bytes | modified ${doc.ref.modifiedTime.toISOString()}`,
      '---',
      doc.rawMarkdown,
    ].join('\n');
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}]\n${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val === null || val === undefined ? '' : String(val)}`;
      })
      .join('\n');
  }
}
