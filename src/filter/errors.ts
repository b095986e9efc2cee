// 过滤表达式错误：解析失败时抛出，携带出错位置，调用方不可恢复

export class FilterSyntaxError extends Error {
  /** 出错位置（表达式中的字符偏移，从 0 开始） */
  readonly position: number;
  readonly source: string;

  constructor(message: string, position: number, source: string) {
    super(`${message} (位置 ${position}): ${source}`);
    this.name = "FilterSyntaxError";
    this.position = position;
    this.source = source;
  }
}
