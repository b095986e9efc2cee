// glob：discover 阶段最先执行，遍历内容目录，按扩展名收集源文件（相对路径，排序后写入缓存）

import { readdir } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { readCache } from "../cacher/memory.js";
import type { Manager } from "../lifecycle/manager.js";
import type { DiscoverPlugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import { logger } from "../logger/index.js";


/** 缓存键：discover 阶段找到的源文件列表（相对内容目录，使用 / 分隔） */
export const GLOB_FILES_KEY = "glob.files";


/** 跳过的目录：隐藏目录与 node_modules */
function ignoredDir(name: string): boolean {
  return name.startsWith(".") || name === "node_modules";
}


async function walk(dir: string, extensions: readonly string[], out: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const e of entries) {
    const full = join(dir, e.name);
    if (e.isDirectory()) {
      if (!ignoredDir(e.name)) await walk(full, extensions, out);
    } else if (e.isFile() && extensions.some((ext) => e.name.toLowerCase().endsWith(ext.toLowerCase()))) {
      out.push(full);
    }
  }
}


function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}


/** 读取 glob 插件记录的源文件列表 */
export function globbedFiles(manager: Manager): string[] {
  return readCache(manager.cache, GLOB_FILES_KEY, isStringArray) ?? [];
}


export function globPlugin(): DiscoverPlugin {
  return {
    name: "glob",
    priority: () => PRIORITY.early,
    async discover(m) {
      const root = resolve(m.config.contentDir);
      const found: string[] = [];
      try {
        await walk(root, m.config.extensions, found);
      } catch (err) {
        throw new Error(`无法读取内容目录 ${root}`, { cause: err });
      }
      const files = found.map((f) => relative(root, f).split(sep).join("/")).sort();
      m.cache.set(GLOB_FILES_KEY, files);
      logger.info("plugin", "已收集源文件", { dir: root, count: files.length });
    },
  };
}
