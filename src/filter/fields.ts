// 字段解析：已知字段直接取条目属性，其余落到 extra 扩展字段

import type { Item } from "../types/item.js";
import type { FilterValue } from "./ast.js";


/** 缺失值：与 None(null) 区分，参与任何比较都得到「未知」 */
export const ABSENT: unique symbol = Symbol("absent");

export type Resolved = FilterValue | typeof ABSENT;


/** 表达式可直接使用的条目字段 */
export const ITEM_FIELDS = [
  "slug",
  "href",
  "path",
  "title",
  "description",
  "content",
  "tags",
  "category",
  "date",
  "modified",
  "published",
  "draft",
  "private",
  "skip",
  "extra",
] as const;


export type ItemField = (typeof ITEM_FIELDS)[number];


export function isItemField(name: string): name is ItemField {
  return ITEM_FIELDS.some((f) => f === name);
}


/** 将任意值规范为 FilterValue；函数、symbol、undefined 与循环引用视为缺失 */
export function toFilterValue(value: unknown, seen: WeakSet<object> = new WeakSet()): Resolved {
  if (value === undefined) return ABSENT;
  if (value === null) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isNaN(value) ? ABSENT : value;
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? ABSENT : value;
  if (typeof value !== "object") return ABSENT;
  if (seen.has(value)) return ABSENT;
  seen.add(value);
  let result: Resolved;
  if (Array.isArray(value)) {
    const out: FilterValue[] = [];
    for (const el of value) {
      const v = toFilterValue(el, seen);
      if (v !== ABSENT) out.push(v);
    }
    result = out;
  } else {
    const out: { [key: string]: FilterValue } = {};
    for (const [k, el] of Object.entries(value)) {
      const v = toFilterValue(el, seen);
      if (v !== ABSENT) out[k] = v;
    }
    result = out;
  }
  seen.delete(value);
  return result;
}


/** 按名称读取条目字段；未知字段读 extra，都没有则为 ABSENT */
export function readField(item: Item, name: string): Resolved {
  switch (name) {
    case "slug":
      return item.slug;
    case "href":
      return item.href;
    case "path":
      return item.path;
    case "title":
      return toFilterValue(item.title);
    case "description":
      return toFilterValue(item.description);
    case "content":
      return item.content;
    case "tags":
      return item.tags.slice();
    case "category":
      return toFilterValue(item.category);
    case "date":
      return toFilterValue(item.date);
    case "modified":
      return toFilterValue(item.modified);
    case "published":
      return item.published;
    case "draft":
      return item.draft;
    case "private":
      return item.private;
    case "skip":
      return item.skip;
    case "extra":
      return toFilterValue(item.extra);
  }
  if (!Object.hasOwn(item.extra, name)) return ABSENT;
  return toFilterValue(item.extra[name]);
}


function isPlainRecord(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Date);
}


/**
 * 按成员路径读取，如 ["series", "name"]：沿原始值逐级取属性，只转换最终取到的值。
 * 首段同 readField：已知字段取条目属性，其余读 extra。
 */
export function readPath(item: Item, path: readonly string[]): Resolved {
  if (path.length === 0) return ABSENT;
  const [head, ...rest] = path;
  if (rest.length === 0) return readField(item, head);
  let current: unknown;
  if (isItemField(head)) current = item[head];
  else if (Object.hasOwn(item.extra, head)) current = item.extra[head];
  else return ABSENT;
  for (const property of rest) {
    if (!isPlainRecord(current) || !Object.hasOwn(current, property)) return ABSENT;
    current = Reflect.get(current, property);
  }
  return toFilterValue(current);
}


/** 成员访问：仅对普通对象生效，数组与其他类型的属性均为缺失 */
export function readMember(value: Resolved, property: string): Resolved {
  if (value === ABSENT || value === null) return ABSENT;
  if (typeof value !== "object" || Array.isArray(value) || value instanceof Date) return ABSENT;
  return Object.hasOwn(value, property) ? value[property] : ABSENT;
}
