const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

const PAGE_STYLE = `
    body {
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Oxygen, Ubuntu, Cantarell, sans-serif;
      max-width: 900px;
      margin: 0 auto;
      padding: 2rem;
      line-height: 1.6;
      color: #333;
    }
    h1, h2, h3, h4, h5, h6 { margin-top: 2rem; margin-bottom: 1rem; }
    code { background: #f4f4f4; padding: 0.2em 0.4em; border-radius: 3px; font-size: 0.9em; }
    pre { background: #f4f4f4; padding: 1rem; border-radius: 5px; overflow-x: auto; }
    pre code { padding: 0; background: none; }
    a { color: #0066cc; text-decoration: none; }
    a:hover { text-decoration: underline; }
    table { border-collapse: collapse; width: 100%; margin: 1rem 0; }
    th, td { border: 1px solid #ddd; padding: 0.5rem; text-align: left; }
    th { background: #f4f4f4; font-weight: 600; }
    .hljs-keyword, .hljs-selector-tag, .hljs-built_in { color: #a626a4; }
    .hljs-string, .hljs-attr { color: #50a14f; }
    .hljs-number, .hljs-literal { color: #986801; }
    .hljs-comment { color: #a0a1a7; font-style: italic; }
    .hljs-title, .hljs-section { color: #4078f2; }`;

/** 將渲染後的 HTML 片段包成完整頁面 */
export function renderHtmlPage(title: string, bodyHtml: string, siteName: string = 'docshelf'): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)} - ${escapeHtml(siteName)}</title>
  <style>${PAGE_STYLE}
  </style>
</head>
<body>
${bodyHtml}
</body>
</html>
`;
}
