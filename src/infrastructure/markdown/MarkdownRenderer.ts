import { Marked, type MarkedExtension } from 'marked';
import { markedHighlight } from 'marked-highlight';
import { gfmHeadingId } from 'marked-gfm-heading-id';
import markedFootnote from 'marked-footnote';
import hljs from 'highlight.js';
import { Logger } from '../../shared/Logger.js';

export const KNOWN_EXTENSIONS = ['fenced_code', 'codehilite', 'tables', 'toc', 'extra'] as const;

export type MarkdownExtensionName = (typeof KNOWN_EXTENSIONS)[number];

export const DEFAULT_EXTENSIONS: readonly MarkdownExtensionName[] = KNOWN_EXTENSIONS;

function isKnownExtension(name: string): name is MarkdownExtensionName {
  return KNOWN_EXTENSIONS.some((known) => known === name);
}

/** 宣告的語言優先；未宣告則自動偵測；highlight.js 不認得的語言當純文字 */
function highlightCode(code: string, lang: string): string {
  if (!lang) {
    return hljs.highlightAuto(code).value;
  }
  const language = hljs.getLanguage(lang) ? lang : 'plaintext';
  return hljs.highlight(code, { language }).value;
}

/**
 * Markdown → HTML 轉換器
 *
 * 建構時依 extension 名稱組出一個私有的 Marked 實例，之後 render 為純函式。
 * - fenced_code：marked 的 CommonMark 核心永遠支援，名稱僅作為合法值
 * - codehilite：marked-highlight + highlight.js
 * - tables：開啟 GFM（pipe table）
 * - toc：標題加上 id（marked-gfm-heading-id）
 * - extra：腳註（marked-footnote）
 *
 * 未知的名稱忽略，建構時記一次 warn。
 * 文件來源視為可信任（作者自行維護），raw HTML 不做 sanitize。
 */
export class MarkdownRenderer {
  readonly extensions: ReadonlySet<MarkdownExtensionName>;
  private readonly marked: Marked;

  constructor(
    extensionNames: readonly string[] = DEFAULT_EXTENSIONS,
    logger: Logger = new Logger('MarkdownRenderer'),
  ) {
    const enabled = new Set<MarkdownExtensionName>();
    const unknown: string[] = [];
    for (const raw of extensionNames) {
      const name = raw.trim();
      if (!name) continue;
      if (isKnownExtension(name)) {
        enabled.add(name);
      } else {
        unknown.push(name);
      }
    }
    if (unknown.length > 0) {
      logger.warn('Ignoring unknown markdown extensions', { unknown, known: [...KNOWN_EXTENSIONS] });
    }
    this.extensions = enabled;

    const plugins: MarkedExtension[] = [{ gfm: enabled.has('tables'), async: false }];
    if (enabled.has('codehilite')) {
      plugins.push(markedHighlight({
        emptyLangClass: 'hljs',
        langPrefix: 'hljs language-',
        highlight: highlightCode,
      }));
    }
    if (enabled.has('toc')) {
      plugins.push(gfmHeadingId());
    }
    if (enabled.has('extra')) {
      plugins.push(markedFootnote());
    }
    this.marked = new Marked(...plugins);
  }

  render(rawText: string): string {
    return this.marked.parse(rawText, { async: false });
  }
}
