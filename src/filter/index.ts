// 过滤表达式入口：parseFilter 解析（语法树按表达式字符串缓存），matches 求值，matchAll 批量筛选

import type { Item } from "../types/item.js";
import type { FilterNode } from "./ast.js";
import { evaluate, truthOf } from "./evaluator.js";
import { parseExpression } from "./parser.js";

export { FilterSyntaxError } from "./errors.js";
export type { FilterNode, FilterValue } from "./ast.js";
export { tokenize } from "./lexer.js";
export type { Token, CompareOp } from "./lexer.js";
export { parseExpression } from "./parser.js";


/** 可对单个条目判断是否命中的谓词 */
export interface ItemPredicate {
  matches(item: Item): boolean;
}


export interface ParseFilterOptions {
  /** today / now 使用的时钟，默认解析时刻 */
  now?: Date;
}


/** 语法树缓存上限，超出后清空重建 */
const MAX_CACHED_TREES = 500;

const treeCache = new Map<string, FilterNode>();


/** 已解析的过滤表达式：不可变，求值无副作用 */
export class FilterExpression implements ItemPredicate {
  constructor(
    readonly source: string,
    private readonly root: FilterNode,
    private readonly now: Date,
  ) {}

  matches(item: Item): boolean {
    return truthOf(evaluate(this.root, item, { now: this.now })) === true;
  }

  toString(): string {
    return this.source;
  }
}


/** 解析过滤表达式；语法错误抛出 FilterSyntaxError */
export function parseFilter(source: string, options: ParseFilterOptions = {}): FilterExpression {
  let root = treeCache.get(source);
  if (!root) {
    root = parseExpression(source);
    if (treeCache.size >= MAX_CACHED_TREES) treeCache.clear();
    treeCache.set(source, root);
  }
  return new FilterExpression(source, root, options.now ?? new Date());
}


/** 清空语法树缓存（测试用） */
export function clearFilterCache(): void {
  treeCache.clear();
}


/** 批量筛选：保持输入顺序，只返回命中的条目；不处理 private / draft，由调用方决定 */
export function matchAll(predicate: ItemPredicate, items: readonly Item[]): Item[] {
  return items.filter((item) => predicate.matches(item));
}


export const always: ItemPredicate = { matches: () => true };

export const never: ItemPredicate = { matches: () => false };


export function and(...predicates: ItemPredicate[]): ItemPredicate {
  return { matches: (item) => predicates.every((p) => p.matches(item)) };
}


export function or(...predicates: ItemPredicate[]): ItemPredicate {
  return { matches: (item) => predicates.some((p) => p.matches(item)) };
}


export function not(predicate: ItemPredicate): ItemPredicate {
  return { matches: (item) => !predicate.matches(item) };
}


/** 空白表达式视为全部命中，其余交给 parseFilter */
export function compileFilter(source: string, options: ParseFilterOptions = {}): ItemPredicate {
  return source.trim() === "" ? always : parseFilter(source, options);
}
