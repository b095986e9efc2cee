// 日期解析：不带时区的日期时间按 UTC 解释，构建结果不随主机 TZ 变化

const ZONELESS_DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;


/** "2024-01-31 23:30" → 2024-01-31T23:30:00Z；带偏移量或纯日期的按原样解析，无法解析时返回 undefined */
export function parseDate(input: string): Date | undefined {
  const s = input.trim();
  const m = ZONELESS_DATE_TIME.exec(s);
  const d = new Date(m ? `${m[1]}T${m[2]}Z` : s);
  return Number.isNaN(d.getTime()) ? undefined : d;
}
