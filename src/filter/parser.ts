// 过滤表达式语法分析：递归下降，优先级 or < and < not < 比较/in < 成员访问 < 基本项

import type { FilterNode } from "./ast.js";
import { isStringMethod } from "./ast.js";
import { FilterSyntaxError } from "./errors.js";
import type { Keyword, Token } from "./lexer.js";
import { tokenize } from "./lexer.js";


class Parser {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly source: string,
  ) {}

  parse(): FilterNode {
    if (this.peek().type === "eof") {
      throw new FilterSyntaxError("表达式为空", 0, this.source);
    }
    const node = this.parseOr();
    const rest = this.peek();
    if (rest.type !== "eof") {
      throw new FilterSyntaxError(`多余的内容 ${describe(rest)}`, rest.pos, this.source);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private advance(): Token {
    const token = this.tokens[this.index];
    if (token.type !== "eof") this.index++;
    return token;
  }

  private atKeyword(value: Keyword): boolean {
    const token = this.peek();
    return token.type === "keyword" && token.value === value;
  }

  private parseOr(): FilterNode {
    let left = this.parseAnd();
    while (this.atKeyword("or")) {
      this.advance();
      left = { kind: "logical", op: "or", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): FilterNode {
    let left = this.parseNot();
    while (this.atKeyword("and")) {
      this.advance();
      left = { kind: "logical", op: "and", left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): FilterNode {
    if (this.atKeyword("not")) {
      this.advance();
      return { kind: "not", operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): FilterNode {
    const left = this.parseAccess();
    const token = this.peek();
    if (token.type === "op") {
      this.advance();
      return { kind: "compare", op: token.value, left, right: this.parseAccess() };
    }
    if (this.atKeyword("in")) {
      this.advance();
      return { kind: "in", needle: left, haystack: this.parseAccess() };
    }
    if (this.atKeyword("contains")) {
      this.advance();
      return { kind: "in", needle: this.parseAccess(), haystack: left };
    }
    return left;
  }

  private parseAccess(): FilterNode {
    let node = this.parsePrimary();
    while (this.peek().type === "dot") {
      this.advance();
      const nameToken = this.advance();
      const name = nameToken.type === "ident" ? nameToken.value : nameToken.type === "keyword" ? nameToken.text : undefined;
      if (name === undefined) {
        throw new FilterSyntaxError(`"." 之后应为字段名，得到 ${describe(nameToken)}`, nameToken.pos, this.source);
      }
      if (this.peek().type !== "lparen") {
        node = { kind: "member", object: node, property: name };
        continue;
      }
      if (!isStringMethod(name)) {
        throw new FilterSyntaxError(`未知方法 "${name}"`, nameToken.pos, this.source);
      }
      this.advance();
      const args: FilterNode[] = [];
      if (this.peek().type !== "rparen") {
        args.push(this.parseOr());
        while (this.peek().type === "comma") {
          this.advance();
          args.push(this.parseOr());
        }
      }
      this.expect("rparen", ")");
      node = { kind: "call", object: node, method: name, args };
    }
    return node;
  }

  private parsePrimary(): FilterNode {
    const token = this.advance();
    switch (token.type) {
      case "string":
      case "number":
        return { kind: "literal", value: token.value };
      case "ident":
        return { kind: "field", name: token.value };
      case "keyword":
        if (token.value === "true") return { kind: "literal", value: true };
        if (token.value === "false") return { kind: "literal", value: false };
        if (token.value === "none") return { kind: "literal", value: null };
        if (token.value === "today" || token.value === "now") return { kind: "clock", which: token.value };
        throw new FilterSyntaxError(`缺少操作数，得到关键字 "${token.text}"`, token.pos, this.source);
      case "lparen": {
        const inner = this.parseOr();
        this.expect("rparen", ")");
        return inner;
      }
      default:
        throw new FilterSyntaxError(`缺少操作数，得到 ${describe(token)}`, token.pos, this.source);
    }
  }

  private expect(type: Token["type"], text: string): void {
    const token = this.advance();
    if (token.type !== type) {
      throw new FilterSyntaxError(`缺少 "${text}"，得到 ${describe(token)}`, token.pos, this.source);
    }
  }
}


function describe(token: Token): string {
  switch (token.type) {
    case "eof":
      return "表达式结尾";
    case "ident":
      return `"${token.value}"`;
    case "keyword":
      return `"${token.text}"`;
    case "string":
      return `字符串 "${token.value}"`;
    case "number":
      return `数字 ${token.value}`;
    case "op":
      return `"${token.value}"`;
    case "lparen":
      return "\"(\"";
    case "rparen":
      return "\")\"";
    case "dot":
      return "\".\"";
    case "comma":
      return "\",\"";
  }
}


/** 解析表达式为语法树；语法错误抛出 FilterSyntaxError */
export function parseExpression(source: string): FilterNode {
  return new Parser(tokenize(source), source).parse();
}
