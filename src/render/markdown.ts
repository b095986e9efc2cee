// markdown 渲染协作者：插件只依赖 MarkdownRenderer 接口；默认实现覆盖标题、段落、列表、引用、代码、链接与强调

import { escapeHtml } from "../utils/html.js";
import { hrefFor, slugify, type Item } from "../types/item.js";


export interface MarkdownRenderer {
  render(markdown: string, item: Item): string | Promise<string>;
}


function renderInlineText(text: string): string {
  return escapeHtml(text)
    .replace(/!\[([^\]]*)\]\(([^)\s]+)\)/g, "<img src=\"$2\" alt=\"$1\">")
    .replace(/\[\[\s*([^\]|]+?)\s*(?:\|\s*([^\]]+?)\s*)?\]\]/g, (_, target: string, label?: string) => {
      return `<a href="${hrefFor(slugify(target))}">${label ?? target}</a>`;
    })
    .replace(/\[([^\]]+)\]\(([^)\s]+)\)/g, "<a href=\"$2\">$1</a>")
    .replace(/\*\*(.+?)\*\*|__(.+?)__/g, (_, a?: string, b?: string) => `<strong>${a ?? b ?? ""}</strong>`)
    .replace(/(^|[^\w*])\*(?!\s)(.+?)\*(?!\w)/g, "$1<em>$2</em>")
    .replace(/(^|[^\w])_(?!\s)(.+?)_(?!\w)/g, "$1<em>$2</em>");
}


/** 行内语法：代码片段内部不再做其他替换 */
export function renderInline(text: string): string {
  return text
    .split(/(`[^`]+`)/)
    .map((part) => (part.startsWith("`") && part.endsWith("`") && part.length > 1 ? `<code>${escapeHtml(part.slice(1, -1))}</code>` : renderInlineText(part)))
    .join("");
}


type Block =
  | { type: "code"; lang: string; lines: string[] }
  | { type: "lines"; lines: string[] };


function splitBlocks(markdown: string): Block[] {
  const blocks: Block[] = [];
  let current: string[] = [];
  let code: { lang: string; lines: string[]; fence: string } | null = null;
  const flush = (): void => {
    if (current.length > 0) blocks.push({ type: "lines", lines: current });
    current = [];
  };
  for (const line of markdown.replace(/\r\n/g, "\n").split("\n")) {
    if (code) {
      if (line.trim().startsWith(code.fence)) {
        blocks.push({ type: "code", lang: code.lang, lines: code.lines });
        code = null;
      } else {
        code.lines.push(line);
      }
      continue;
    }
    const fence = /^\s*(```|~~~)\s*([\w-]*)/.exec(line);
    if (fence) {
      flush();
      code = { fence: fence[1], lang: fence[2], lines: [] };
      continue;
    }
    if (line.trim() === "") flush();
    else current.push(line);
  }
  if (code) blocks.push({ type: "code", lang: code.lang, lines: code.lines });
  flush();
  return blocks;
}


function renderLines(lines: string[]): string {
  const first = lines[0];
  const heading = /^(#{1,6})\s+(.*?)\s*#*\s*$/.exec(first);
  if (heading && lines.length === 1) {
    const level = heading[1].length;
    return `<h${level}>${renderInline(heading[2])}</h${level}>`;
  }
  if (heading) {
    return [renderLines([first]), renderLines(lines.slice(1))].join("\n");
  }
  if (lines.length === 1 && /^\s*([-*_])(\s*\1){2,}\s*$/.test(first)) return "<hr>";
  if (lines.every((l) => /^\s*[-*+]\s+/.test(l))) {
    const items = lines.map((l) => `<li>${renderInline(l.replace(/^\s*[-*+]\s+/, ""))}</li>`);
    return `<ul>\n${items.join("\n")}\n</ul>`;
  }
  if (lines.every((l) => /^\s*\d+[.)]\s+/.test(l))) {
    const items = lines.map((l) => `<li>${renderInline(l.replace(/^\s*\d+[.)]\s+/, ""))}</li>`);
    return `<ol>\n${items.join("\n")}\n</ol>`;
  }
  if (lines.every((l) => l.startsWith(">"))) {
    const inner = lines.map((l) => l.replace(/^>\s?/, ""));
    return `<blockquote>\n${renderMarkdown(inner.join("\n"))}\n</blockquote>`;
  }
  return `<p>${renderInline(lines.map((l) => l.trim()).join(" "))}</p>`;
}


/** 最小 markdown → HTML 转换 */
export function renderMarkdown(markdown: string): string {
  return splitBlocks(markdown)
    .map((block) => {
      if (block.type === "code") {
        const cls = block.lang ? ` class="language-${escapeHtml(block.lang)}"` : "";
        return `<pre><code${cls}>${escapeHtml(block.lines.join("\n"))}</code></pre>`;
      }
      return renderLines(block.lines);
    })
    .join("\n");
}


export const basicMarkdownRenderer: MarkdownRenderer = {
  render: (markdown) => renderMarkdown(markdown),
};
