import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { always, and, compileFilter, matchAll, never, not, or, parseFilter } from "../src/filter/index.js";
import { ABSENT, ITEM_FIELDS, readPath, toFilterValue } from "../src/filter/fields.js";
import { createItem, type Item } from "../src/types/item.js";


const NOW = new Date("2025-01-01T12:00:00Z");

function matches(source: string, item: Item): boolean {
  return parseFilter(source, { now: NOW }).matches(item);
}


describe("过滤表达式：成员与相等", () => {
  const first = createItem({ slug: "first", tags: ["go", "rust"] });
  const second = createItem({ slug: "second", tags: ["go"] });

  it("\"go\" in tags 命中两个条目，\"rust\" in tags 只命中第一个", () => {
    expect(matchAll(parseFilter(`"go" in tags`), [first, second]).map((i) => i.slug)).toEqual(["first", "second"]);
    expect(matchAll(parseFilter(`"rust" in tags`), [first, second]).map((i) => i.slug)).toEqual(["first"]);
  });

  it("category == \"News\" 只命中对应分类（末尾空白不影响）", () => {
    const news = createItem({ slug: "news", category: "News" });
    const blog = createItem({ slug: "blog", category: "Blog" });
    expect(matchAll(parseFilter(`category == "News" `), [news, blog])).toEqual([news]);
  });

  it("字符串相等区分大小写", () => {
    expect(matches(`category == "news"`, createItem({ slug: "a", category: "News" }))).toBe(false);
  });

  it("in 对非数组恒为假", () => {
    expect(matches(`"a" in title`, createItem({ slug: "a", title: "abc" }))).toBe(false);
  });

  it("数组上的 contains 方法与 in 等价", () => {
    expect(matches(`tags.contains("go")`, first)).toBe(true);
    expect(matches(`tags contains "rust"`, second)).toBe(false);
  });
});


describe("过滤表达式：缺失值与三值逻辑", () => {
  const item = createItem({ slug: "a", title: "Hello", tags: ["go"], extra: { rating: 5, series: { name: "intro" } } });
  const bare = createItem({ slug: "b" });

  it("未知字段参与比较永不命中，取反也不命中", () => {
    expect(matches("views > 3", item)).toBe(false);
    expect(matches("not (views > 3)", item)).toBe(false);
    expect(matches("views != 3", item)).toBe(false);
  });

  it("与 None 比较判断字段是否存在", () => {
    expect(matches("views == None", item)).toBe(true);
    expect(matches("title == None", bare)).toBe(true);
    expect(matches("title != None", item)).toBe(true);
    expect(matches("title == None", item)).toBe(false);
  });

  it("extra 字段可直接或通过 extra. 访问", () => {
    expect(matches("rating >= 5", item)).toBe(true);
    expect(matches("extra.rating > 4", item)).toBe(true);
    expect(matches(`series.name == "intro"`, item)).toBe(true);
    expect(matches(`series.missing == "intro"`, item)).toBe(false);
  });

  it("or 有一侧为真即命中，and 有一侧未知则不命中", () => {
    expect(matches(`views > 3 or "go" in tags`, item)).toBe(true);
    expect(matches(`views > 3 and "go" in tags`, item)).toBe(false);
    expect(matches(`views > 3 and "rust" in tags`, item)).toBe(false);
  });

  it("类型不匹配：== 为假，!= 为真，大小比较为假", () => {
    expect(matches("title == 1", item)).toBe(false);
    expect(matches("title != 1", item)).toBe(true);
    expect(matches("title > 1", item)).toBe(false);
  });

  it("任意未知字段名都不会命中", () => {
    const reserved = new Set<string>([...ITEM_FIELDS, "and", "or", "not", "in", "contains", "true", "false", "null", "today", "now", "rating", "series"]);
    fc.assert(
      fc.property(
        fc.stringMatching(/^[a-z_][a-z0-9_]{0,10}$/).filter((name) => !reserved.has(name)),
        fc.integer({ min: -5, max: 5 }),
        (name, n) => {
          for (const source of [`${name} == ${n}`, `${name} > ${n}`, `not (${name} < ${n})`, `${name}.lower() == "x"`]) {
            if (matches(source, item)) return false;
          }
          return true;
        },
      ),
    );
  });
});


describe("过滤表达式：日期、方法与布尔字段", () => {
  const post = createItem({ slug: "post", title: "Hello World", date: new Date("2024-03-01T00:00:00Z"), draft: true });

  it("日期与 ISO 字符串按时间比较", () => {
    expect(matches(`date >= "2024-01-01"`, post)).toBe(true);
    expect(matches(`date < "2024-03-01T00:00:00Z"`, post)).toBe(false);
    expect(matches(`date == "2024-03-01T00:00:00.000Z"`, post)).toBe(true);
  });

  it("不带时区的日期字符串按 UTC 比较", () => {
    const late = createItem({ slug: "late", date: new Date("2024-01-31T23:30:00Z") });
    expect(matches(`date == "2024-01-31 23:30"`, late)).toBe(true);
    expect(matches(`date < "2024-02-01"`, late)).toBe(true);
    expect(matches(`date >= "2024-01-31T23:30:00"`, late)).toBe(true);
  });

  it("today / now 取自固定时钟", () => {
    expect(matches("date < today", post)).toBe(true);
    expect(parseFilter("date > now", { now: new Date("2020-01-01T00:00:00Z") }).matches(post)).toBe(true);
  });

  it("字符串方法", () => {
    expect(matches(`title.lower() == "hello world"`, post)).toBe(true);
    expect(matches(`title.startswith("Hello")`, post)).toBe(true);
    expect(matches(`title.endswith("hello")`, post)).toBe(false);
    expect(matches(`title.contains("lo W")`, post)).toBe(true);
    expect(matches(`title.upper().strip() == "HELLO WORLD"`, post)).toBe(true);
  });

  it("布尔字段可直接作为条件", () => {
    expect(matches("draft", post)).toBe(true);
    expect(matches("not draft", post)).toBe(false);
    expect(matches("draft == True and published", post)).toBe(true);
  });
});


describe("过滤表达式：extra 中的嵌套对象", () => {
  it("成员访问只读取访问到的路径，循环引用不影响", () => {
    const meta: Record<string, unknown> = { name: "intro", level: 2 };
    meta.self = meta;
    const item = createItem({ slug: "cyclic", extra: { meta } });
    expect(matches(`meta.name == "intro"`, item)).toBe(true);
    expect(matches(`meta.self.level == 2`, item)).toBe(true);
    expect(matches(`meta.missing == None`, item)).toBe(true);
    expect(readPath(item, ["meta", "self", "self", "name"])).toBe("intro");
    expect(readPath(item, ["meta", "name", "length"])).toBe(ABSENT);
  });

  it("循环引用转换为缺失而非溢出", () => {
    const loop: Record<string, unknown> = { id: 1 };
    loop.again = loop;
    expect(toFilterValue(loop)).toEqual({ id: 1 });
    const shared = { v: 1 };
    expect(toFilterValue({ a: shared, b: shared })).toEqual({ a: { v: 1 }, b: { v: 1 } });
    expect(toFilterValue([loop, loop])).toEqual([{ id: 1 }, { id: 1 }]);
  });
});


describe("批量筛选与组合", () => {
  const items = ["c", "a", "b"].map((slug, i) => createItem({ slug, tags: i === 1 ? [] : ["x"] }));

  it("matchAll 保持输入顺序且不修改条目", () => {
    const before = JSON.stringify(items);
    expect(matchAll(parseFilter(`"x" in tags`), items).map((i) => i.slug)).toEqual(["c", "b"]);
    expect(JSON.stringify(items)).toBe(before);
  });

  it("同一表达式重复求值结果一致", () => {
    const expr = parseFilter(`"x" in tags or slug == "a"`);
    expect(items.map((i) => expr.matches(i))).toEqual(items.map((i) => expr.matches(i)));
    expect(expr.toString()).toBe(`"x" in tags or slug == "a"`);
  });

  it("空白表达式命中全部", () => {
    expect(compileFilter("  ")).toBe(always);
    expect(matchAll(compileFilter(""), items)).toHaveLength(3);
  });

  it("谓词组合", () => {
    const hasX = parseFilter(`"x" in tags`);
    const isA = parseFilter(`slug == "a"`);
    expect(matchAll(or(hasX, isA), items)).toHaveLength(3);
    expect(matchAll(and(hasX, not(isA)), items).map((i) => i.slug)).toEqual(["c", "b"]);
    expect(matchAll(and(always, never), items)).toEqual([]);
  });
});
