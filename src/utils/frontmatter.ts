// frontmatter 解析：--- 包裹的 key: value 头部（简单实现，不依赖 YAML 库）
// 支持引号字符串、布尔、数字、行内列表 [a, b] 与缩进列表 "  - a"

export type FrontmatterValue = string | number | boolean | null | string[];

export interface ParsedDocument {
  data: Record<string, FrontmatterValue>;
  body: string;
  /** 文件是否带 frontmatter */
  hasFrontmatter: boolean;
}


const FRONTMATTER_RE = /^---\r?\n([\s\S]*?)\r?\n---[ \t]*(?:\r?\n|$)/;


function unquote(s: string): string {
  const t = s.trim();
  if (t.length >= 2 && ((t.startsWith("\"") && t.endsWith("\"")) || (t.startsWith("'") && t.endsWith("'")))) {
    return t.slice(1, -1).replace(/\\"/g, "\"").replace(/\\'/g, "'");
  }
  return t;
}


/** 行内列表按逗号拆分，引号内的逗号不拆 */
function splitInlineList(inner: string): string[] {
  const parts: string[] = [];
  let current = "";
  let quote: string | null = null;
  for (let i = 0; i < inner.length; i++) {
    const ch = inner[i];
    if (quote) {
      if (ch === "\\" && i + 1 < inner.length) {
        current += ch + inner[++i];
        continue;
      }
      if (ch === quote) quote = null;
      current += ch;
    } else if (ch === "\"" || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === ",") {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}


function parseScalar(raw: string): FrontmatterValue {
  const t = raw.trim();
  if (t === "") return null;
  if (t.startsWith("\"") || t.startsWith("'")) return unquote(t);
  if (t === "true") return true;
  if (t === "false") return false;
  if (t === "null" || t === "~") return null;
  if (/^-?\d+(\.\d+)?$/.test(t)) return Number(t);
  if (t.startsWith("[") && t.endsWith("]")) {
    return splitInlineList(t.slice(1, -1))
      .map(unquote)
      .filter((s) => s.length > 0);
  }
  return t;
}


/** 拆出 frontmatter 与正文；无 frontmatter 时 data 为空对象 */
export function parseFrontmatter(raw: string): ParsedDocument {
  const m = FRONTMATTER_RE.exec(raw);
  if (!m) return { data: {}, body: raw, hasFrontmatter: false };
  const data: Record<string, FrontmatterValue> = {};
  let listKey: string | null = null;
  for (const line of m[1].split(/\r?\n/)) {
    if (line.trim() === "" || line.trim().startsWith("#")) continue;
    const listItem = /^\s+-\s*(.*)$/.exec(line);
    if (listItem && listKey) {
      const current = data[listKey];
      const list = Array.isArray(current) ? current : [];
      list.push(unquote(listItem[1]));
      data[listKey] = list;
      continue;
    }
    const kv = /^([A-Za-z_][\w-]*)\s*:\s*(.*)$/.exec(line);
    if (!kv) continue;
    const [, key, value] = kv;
    if (value.trim() === "") {
      listKey = key;
      data[key] = [];
    } else {
      listKey = null;
      data[key] = parseScalar(value);
    }
  }
  return { data, body: raw.slice(m[0].length), hasFrontmatter: true };
}
