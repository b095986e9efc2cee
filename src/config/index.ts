// 配置加载：读取 stagepress.json，叠加环境变量覆盖，交给 zod 校验并补全默认值

import { readFile } from "node:fs/promises";
import { errorMessage, logger } from "../logger/index.js";
import { ConfigError } from "./errors.js";
import { SITE_CONFIG_PATH } from "./paths.js";
import { siteConfigSchema, type SiteConfig } from "./schema.js";

export { ConfigError } from "./errors.js";
export type {
  AutoFeedsConfig,
  BlogrollConfig,
  ExternalFeedConfig,
  FeedConfigInput,
  PluginSettings,
  SeriesConfig,
  SiteConfig,
  SiteConfigInput,
} from "./schema.js";


/** 校验配置对象并补全默认值；不合法时抛出 ConfigError，列出每条问题 */
export function parseSiteConfig(raw: unknown): SiteConfig {
  const result = siteConfigSchema.safeParse(raw ?? {});
  if (result.success) return result.data;
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  throw new ConfigError("站点配置不合法", issues);
}


function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}


/** 环境变量覆盖：STAGEPRESS_OUTPUT_DIR / STAGEPRESS_CONTENT_DIR / STAGEPRESS_CONCURRENCY / CACHE_DIR */
export function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const out = { ...raw };
  if (env.STAGEPRESS_OUTPUT_DIR) out.outputDir = env.STAGEPRESS_OUTPUT_DIR;
  if (env.STAGEPRESS_CONTENT_DIR) out.contentDir = env.STAGEPRESS_CONTENT_DIR;
  if (env.CACHE_DIR) out.cacheDir = env.CACHE_DIR;
  if (env.STAGEPRESS_CONCURRENCY) {
    const n = Number(env.STAGEPRESS_CONCURRENCY);
    if (Number.isInteger(n) && n > 0) out.concurrency = n;
    else logger.warn("config", "STAGEPRESS_CONCURRENCY 不是正整数，已忽略", { value: env.STAGEPRESS_CONCURRENCY });
  }
  return out;
}


/** 读取配置文件；文件不存在时使用全部默认值 */
export async function loadSiteConfig(path: string = SITE_CONFIG_PATH, env: NodeJS.ProcessEnv = process.env): Promise<SiteConfig> {
  let raw: unknown = {};
  try {
    raw = JSON.parse(await readFile(path, "utf-8"));
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new ConfigError(`配置文件不是合法 JSON: ${path}`, [err.message], { cause: err });
    }
    if (isErrnoException(err) && err.code === "ENOENT") {
      logger.info("config", "未找到配置文件，使用默认配置", { path });
    } else {
      throw new ConfigError(`读取配置文件失败: ${path}`, [errorMessage(err)], { cause: err });
    }
  }
  if (!isRecord(raw)) throw new ConfigError(`配置文件顶层必须是对象: ${path}`);
  return parseSiteConfig(applyEnvOverrides(raw, env));
}


function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
