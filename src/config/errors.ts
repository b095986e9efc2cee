// 配置错误：stagepress.json 无法读取或校验失败，在任何阶段运行前抛出

export class ConfigError extends Error {
  /** 逐条校验问题，形如 "feeds.0.slug: Required" */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message, options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
