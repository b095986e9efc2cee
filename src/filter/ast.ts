// 过滤表达式语法树：不可变，解析后可被多个表达式实例共享

import type { CompareOp } from "./lexer.js";


/** 表达式中可出现的值 */
export type FilterValue =
  | string
  | number
  | boolean
  | Date
  | null
  | FilterValue[]
  | { [key: string]: FilterValue };


/** 字符串方法白名单：解析期校验，避免运行期才发现拼写错误 */
export const STRING_METHODS = ["startswith", "endswith", "contains", "lower", "upper", "strip", "trim"] as const;

export type StringMethod = (typeof STRING_METHODS)[number];


export type FilterNode =
  | { kind: "literal"; value: FilterValue }
  | { kind: "field"; name: string }
  | { kind: "member"; object: FilterNode; property: string }
  | { kind: "call"; object: FilterNode; method: StringMethod; args: FilterNode[] }
  | { kind: "clock"; which: "today" | "now" }
  | { kind: "not"; operand: FilterNode }
  | { kind: "logical"; op: "and" | "or"; left: FilterNode; right: FilterNode }
  | { kind: "compare"; op: CompareOp; left: FilterNode; right: FilterNode }
  | { kind: "in"; needle: FilterNode; haystack: FilterNode };


export function isStringMethod(name: string): name is StringMethod {
  return STRING_METHODS.some((m) => m === name);
}
