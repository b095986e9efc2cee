// 过滤表达式词法分析：字符串 → token 序列

import { FilterSyntaxError } from "./errors.js";


export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type Keyword = "and" | "or" | "not" | "in" | "contains" | "true" | "false" | "none" | "today" | "now";

export type Token =
  | { type: "ident"; value: string; pos: number }
  | { type: "keyword"; value: Keyword; text: string; pos: number }
  | { type: "string"; value: string; pos: number }
  | { type: "number"; value: number; pos: number }
  | { type: "op"; value: CompareOp; pos: number }
  | { type: "lparen"; pos: number }
  | { type: "rparen"; pos: number }
  | { type: "dot"; pos: number }
  | { type: "comma"; pos: number }
  | { type: "eof"; pos: number };


const KEYWORDS: Record<string, Keyword> = {
  and: "and",
  or: "or",
  not: "not",
  in: "in",
  contains: "contains",
  true: "true",
  True: "true",
  false: "false",
  False: "false",
  None: "none",
  null: "none",
  today: "today",
  now: "now",
};

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };


function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}


/** 将表达式切分为 token，末尾总有一个 eof */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const start = i;
    if (ch === "(") {
      tokens.push({ type: "lparen", pos: start });
      i++;
    } else if (ch === ")") {
      tokens.push({ type: "rparen", pos: start });
      i++;
    } else if (ch === ".") {
      tokens.push({ type: "dot", pos: start });
      i++;
    } else if (ch === ",") {
      tokens.push({ type: "comma", pos: start });
      i++;
    } else if (ch === "\"" || ch === "'") {
      const [value, end] = readString(source, start);
      tokens.push({ type: "string", value, pos: start });
      i = end;
    } else if (isDigit(ch) || (ch === "-" && isDigit(source[i + 1] ?? ""))) {
      i++;
      while (i < source.length && isDigit(source[i])) i++;
      if (source[i] === "." && isDigit(source[i + 1] ?? "")) {
        i++;
        while (i < source.length && isDigit(source[i])) i++;
      }
      tokens.push({ type: "number", value: Number(source.slice(start, i)), pos: start });
    } else if (isIdentStart(ch)) {
      while (i < source.length && isIdentPart(source[i])) i++;
      const text = source.slice(start, i);
      const keyword = Object.hasOwn(KEYWORDS, text) ? KEYWORDS[text] : undefined;
      if (keyword) tokens.push({ type: "keyword", value: keyword, text, pos: start });
      else tokens.push({ type: "ident", value: text, pos: start });
    } else {
      const two = source.slice(i, i + 2);
      if (two === "==" || two === "!=" || two === "<=" || two === ">=") {
        tokens.push({ type: "op", value: two, pos: start });
        i += 2;
      } else if (ch === "<" || ch === ">") {
        tokens.push({ type: "op", value: ch, pos: start });
        i++;
      } else if (ch === "=" || ch === "!") {
        throw new FilterSyntaxError(`未知运算符 "${ch}"，是否想写 "${ch}="`, start, source);
      } else {
        throw new FilterSyntaxError(`无法识别的字符 "${ch}"`, start, source);
      }
    }
  }
  tokens.push({ type: "eof", pos: source.length });
  return tokens;
}


/** 读取引号字符串，返回 [内容, 结束位置]；支持反斜杠转义 */
function readString(source: string, start: number): [string, number] {
  const quote = source[start];
  let out = "";
  let i = start + 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "\\") {
      const next = source[i + 1];
      if (next === undefined) break;
      out += ESCAPES[next] ?? next;
      i += 2;
      continue;
    }
    if (ch === quote) return [out, i + 1];
    out += ch;
    i++;
  }
  throw new FilterSyntaxError("字符串缺少结束引号", start, source);
}
