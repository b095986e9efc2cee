// 时长字符串 → 毫秒："30s"、"10min"、"1h"、"1d"、"7day"，纯数字按毫秒处理

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  min: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};


/** 解析失败返回 undefined，由调用方决定回退值 */
export function parseDuration(input: string): number | undefined {
  const m = /^\s*(\d+(?:\.\d+)?)\s*([a-z]*)\s*$/i.exec(input);
  if (!m) return undefined;
  const unit = m[2].toLowerCase() || "ms";
  if (!Object.hasOwn(UNIT_MS, unit)) return undefined;
  return Math.round(Number(m[1]) * UNIT_MS[unit]);
}
