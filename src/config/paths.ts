// 路径配置：集中管理运行时路径，区分项目文件与用户数据

import { mkdir } from "node:fs/promises";
import { join } from "node:path";


/** 用户数据根目录：.stagepress/（不纳入版本管理） */
export const USER_DIR = join(process.cwd(), ".stagepress");


/** 构建数据库目录：.stagepress/data/ */
export const DATA_DIR = join(USER_DIR, "data");


/** 文件缓存目录：.stagepress/cache/，可由 CACHE_DIR 覆盖 */
export const CACHE_DIR = process.env.CACHE_DIR ?? join(USER_DIR, "cache");


/** 站点配置文件：stagepress.json（项目文件，纳入版本管理） */
export const SITE_CONFIG_PATH = join(process.cwd(), "stagepress.json");


/** 内置插件目录：plugins/（项目文件，纳入版本管理） */
export const BUILTIN_PLUGINS_DIR = join(process.cwd(), "plugins");


/** 用户自定义插件目录：.stagepress/plugins/ */
export const USER_PLUGINS_DIR = join(USER_DIR, "plugins");


/** 初始化用户数据目录 */
export async function initUserDir(): Promise<void> {
  await mkdir(DATA_DIR, { recursive: true });
  await mkdir(CACHE_DIR, { recursive: true });
  await mkdir(USER_PLUGINS_DIR, { recursive: true });
}
