import { describe, it, expect } from "vitest";
import { FilterSyntaxError, parseExpression, tokenize } from "../src/filter/index.js";


function syntaxError(fn: () => unknown): FilterSyntaxError {
  try {
    fn();
  } catch (err) {
    if (err instanceof FilterSyntaxError) return err;
    throw err;
  }
  throw new Error("应当抛出 FilterSyntaxError");
}


describe("过滤表达式词法分析", () => {
  it("切分成员判断表达式", () => {
    expect(tokenize(`"go" in tags`)).toEqual([
      { type: "string", value: "go", pos: 0 },
      { type: "keyword", value: "in", text: "in", pos: 5 },
      { type: "ident", value: "tags", pos: 8 },
      { type: "eof", pos: 12 },
    ]);
  });

  it("识别双字符运算符与负小数", () => {
    const tokens = tokenize("rating >= -1.5");
    expect(tokens[1]).toEqual({ type: "op", value: ">=", pos: 7 });
    expect(tokens[2]).toEqual({ type: "number", value: -1.5, pos: 10 });
  });

  it("True / None 等别名映射到统一关键字", () => {
    const tokens = tokenize("True None null");
    expect(tokens.slice(0, 3)).toEqual([
      { type: "keyword", value: "true", text: "True", pos: 0 },
      { type: "keyword", value: "none", text: "None", pos: 5 },
      { type: "keyword", value: "none", text: "null", pos: 10 },
    ]);
  });

  it("字符串支持单双引号与转义", () => {
    expect(tokenize(`'it\\'s'`)[0]).toEqual({ type: "string", value: "it's", pos: 0 });
    expect(tokenize(`"a\\nb"`)[0]).toEqual({ type: "string", value: "a\nb", pos: 0 });
  });

  it("单个等号报错并给出位置", () => {
    const err = syntaxError(() => tokenize(`title = "x"`));
    expect(err.position).toBe(6);
    expect(err.message).toContain("未知运算符");
  });

  it("未闭合的字符串报告起始引号位置", () => {
    const err = syntaxError(() => tokenize(`title == "abc`));
    expect(err.position).toBe(9);
    expect(err.message).toContain("字符串缺少结束引号");
  });

  it("无法识别的字符", () => {
    const err = syntaxError(() => tokenize("tags @ 1"));
    expect(err.position).toBe(5);
    expect(err.source).toBe("tags @ 1");
  });
});


describe("过滤表达式语法分析", () => {
  it("and 比 or 结合更紧", () => {
    expect(parseExpression("a or b and c")).toEqual({
      kind: "logical",
      op: "or",
      left: { kind: "field", name: "a" },
      right: {
        kind: "logical",
        op: "and",
        left: { kind: "field", name: "b" },
        right: { kind: "field", name: "c" },
      },
    });
  });

  it("括号改变结合顺序", () => {
    const tree = parseExpression("(a or b) and c");
    expect(tree).toMatchObject({ kind: "logical", op: "and", left: { kind: "logical", op: "or" }, right: { kind: "field", name: "c" } });
  });

  it("同级运算从左到右结合", () => {
    expect(parseExpression("a and b and c")).toMatchObject({
      kind: "logical",
      op: "and",
      left: { kind: "logical", op: "and", left: { name: "a" }, right: { name: "b" } },
      right: { name: "c" },
    });
  });

  it("not 只作用于紧随的比较", () => {
    expect(parseExpression("not a and b")).toMatchObject({
      kind: "logical",
      op: "and",
      left: { kind: "not", operand: { kind: "field", name: "a" } },
      right: { kind: "field", name: "b" },
    });
  });

  it("contains 等价于交换操作数的 in", () => {
    expect(parseExpression(`tags contains "go"`)).toEqual({
      kind: "in",
      needle: { kind: "literal", value: "go" },
      haystack: { kind: "field", name: "tags" },
    });
  });

  it("链式成员访问与方法调用", () => {
    expect(parseExpression(`title.lower().startswith("a")`)).toEqual({
      kind: "call",
      method: "startswith",
      object: { kind: "call", method: "lower", object: { kind: "field", name: "title" }, args: [] },
      args: [{ kind: "literal", value: "a" }],
    });
    expect(parseExpression("extra.series.name")).toEqual({
      kind: "member",
      property: "name",
      object: { kind: "member", property: "series", object: { kind: "field", name: "extra" } },
    });
  });

  it("today / now / None 为特殊值", () => {
    expect(parseExpression("date < today")).toMatchObject({ right: { kind: "clock", which: "today" } });
    expect(parseExpression("title == None")).toMatchObject({ right: { kind: "literal", value: null } });
  });

  it.each([
    ["", 0, "表达式为空"],
    ["   ", 0, "表达式为空"],
    ["a and", 5, "缺少操作数"],
    ["(a or b", 7, "缺少 \")\""],
    ["a b", 2, "多余的内容"],
    ["title.foo()", 6, "未知方法"],
    ["a == and", 5, "缺少操作数"],
  ])("语法错误 %j 位于 %i", (source, position, fragment) => {
    const err = syntaxError(() => parseExpression(source));
    expect(err.position).toBe(position);
    expect(err.message).toContain(fragment);
  });
});
