// 过滤表达式求值：三值逻辑（真 / 假 / 未知），缺失字段永远不会命中

import type { Item } from "../types/item.js";
import { parseDate } from "../utils/date.js";
import type { FilterNode, FilterValue, StringMethod } from "./ast.js";
import type { CompareOp } from "./lexer.js";
import { ABSENT, readField, readMember, readPath, type Resolved } from "./fields.js";


/** 求值上下文：today / now 取自固定时钟，保证同一表达式多次求值结果一致 */
export interface EvalContext {
  now: Date;
}


/** 值 → 三值真假；null 表示未知 */
export function truthOf(value: Resolved): boolean | null {
  if (value === ABSENT) return null;
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "string") return value.length > 0;
  if (typeof value === "number") return value !== 0;
  if (value instanceof Date) return true;
  if (Array.isArray(value)) return value.length > 0;
  return Object.keys(value).length > 0;
}


function fromTruth(truth: boolean | null): Resolved {
  return truth === null ? ABSENT : truth;
}


function toTime(value: FilterValue): number | undefined {
  if (value instanceof Date) return value.getTime();
  if (typeof value === "string") return parseDate(value)?.getTime();
  return undefined;
}


/** 有序比较：类型不兼容时返回 undefined；日期与 ISO 字符串按时间先后比较 */
export function orderOf(a: FilterValue, b: FilterValue): number | undefined {
  if (a instanceof Date || b instanceof Date) {
    const ta = toTime(a);
    const tb = toTime(b);
    if (ta === undefined || tb === undefined) return undefined;
    return Math.sign(ta - tb);
  }
  if (typeof a === "number" && typeof b === "number") return Math.sign(a - b);
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  return undefined;
}


/** 严格相等（字符串区分大小写）；数组逐元素比较 */
export function valuesEqual(a: FilterValue, b: FilterValue): boolean {
  if (a === null || b === null) return a === b;
  if (Array.isArray(a) && Array.isArray(b)) {
    const other = b;
    return a.length === other.length && a.every((el, i) => valuesEqual(el, other[i]));
  }
  if (Array.isArray(a) || Array.isArray(b)) return false;
  return orderOf(a, b) === 0;
}


function compare(op: CompareOp, a: Resolved, b: Resolved): Resolved {
  if (a === ABSENT || b === ABSENT) {
    // 与 None 比较用于显式判断字段是否存在
    if ((op === "==" || op === "!=") && (a === null || b === null)) return op === "==";
    return ABSENT;
  }
  if (op === "==") return valuesEqual(a, b);
  if (op === "!=") return !valuesEqual(a, b);
  const order = orderOf(a, b);
  if (order === undefined) return false;
  switch (op) {
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
  }
}


function membership(needle: Resolved, haystack: Resolved): Resolved {
  if (needle === ABSENT || haystack === ABSENT) return ABSENT;
  if (!Array.isArray(haystack)) return false;
  return haystack.some((el) => valuesEqual(needle, el));
}


function callMethod(method: StringMethod, receiver: Resolved, args: Resolved[]): Resolved {
  if (receiver === ABSENT || args.some((a) => a === ABSENT)) return ABSENT;
  const arg = args.length > 0 ? args[0] : ABSENT;
  if (method === "contains" && Array.isArray(receiver)) return membership(arg, receiver);
  if (typeof receiver !== "string") return false;
  switch (method) {
    case "lower":
      return receiver.toLowerCase();
    case "upper":
      return receiver.toUpperCase();
    case "strip":
    case "trim":
      return receiver.trim();
    case "startswith":
      return typeof arg === "string" && receiver.startsWith(arg);
    case "endswith":
      return typeof arg === "string" && receiver.endsWith(arg);
    case "contains":
      return typeof arg === "string" && receiver.includes(arg);
  }
}


function startOfDayUtc(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}


/** 以字段开头的成员链（extra.series.name）对应的路径；其他对象上的成员访问返回 undefined */
function memberPath(node: FilterNode): string[] | undefined {
  if (node.kind === "field") return [node.name];
  if (node.kind !== "member") return undefined;
  const base = memberPath(node.object);
  return base ? [...base, node.property] : undefined;
}


/** 对单个条目求值语法树；纯函数，不修改条目 */
export function evaluate(node: FilterNode, item: Item, ctx: EvalContext): Resolved {
  switch (node.kind) {
    case "literal":
      return node.value;
    case "field":
      return readField(item, node.name);
    case "member": {
      const path = memberPath(node);
      return path ? readPath(item, path) : readMember(evaluate(node.object, item, ctx), node.property);
    }
    case "call":
      return callMethod(
        node.method,
        evaluate(node.object, item, ctx),
        node.args.map((arg) => evaluate(arg, item, ctx)),
      );
    case "clock":
      return node.which === "now" ? new Date(ctx.now.getTime()) : startOfDayUtc(ctx.now);
    case "not": {
      const truth = truthOf(evaluate(node.operand, item, ctx));
      return truth === null ? ABSENT : !truth;
    }
    case "logical": {
      const left = truthOf(evaluate(node.left, item, ctx));
      if (node.op === "and") {
        if (left === false) return false;
        const right = truthOf(evaluate(node.right, item, ctx));
        if (right === false) return false;
        return fromTruth(left === null || right === null ? null : true);
      }
      if (left === true) return true;
      const right = truthOf(evaluate(node.right, item, ctx));
      if (right === true) return true;
      return fromTruth(left === null || right === null ? null : false);
    }
    case "compare":
      return compare(node.op, evaluate(node.left, item, ctx), evaluate(node.right, item, ctx));
    case "in":
      return membership(evaluate(node.needle, item, ctx), evaluate(node.haystack, item, ctx));
  }
}
