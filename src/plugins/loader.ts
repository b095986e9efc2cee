// 插件加载器：从 plugins/ 与 .stagepress/plugins/ 加载 *.stagepress.{js,ts} 外部插件（信任模型）

import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { BUILTIN_PLUGINS_DIR, USER_PLUGINS_DIR } from "../config/paths.js";
import { PluginLoadError } from "../lifecycle/errors.js";
import { isPlugin, type Plugin } from "../lifecycle/plugin.js";
import { errorMessage, logger } from "../logger/index.js";


const PLUGIN_EXTENSIONS = [".stagepress.js", ".stagepress.ts"];


/** 从模块导出中取插件：default 优先，其次具名导出 plugin */
function pluginFromModule(mod: unknown): unknown {
  if (mod == null || typeof mod !== "object") return undefined;
  const fallback: unknown = Reflect.get(mod, "plugin");
  const main: unknown = Reflect.get(mod, "default");
  return main ?? fallback;
}


/** 加载单个插件文件；失败抛出 PluginLoadError */
export async function loadPluginFile(file: string): Promise<Plugin> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(file).href);
  } catch (err) {
    throw new PluginLoadError(file, `导入失败: ${errorMessage(err)}`, { cause: err });
  }
  const candidate = pluginFromModule(mod);
  if (!isPlugin(candidate)) {
    throw new PluginLoadError(file, "未导出合法插件（需要 name 与至少一个阶段方法）");
  }
  return candidate;
}


/** 目录下的插件文件，按文件名排序；目录不存在时为空 */
async function pluginFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && PLUGIN_EXTENSIONS.some((ext) => e.name.endsWith(ext)))
      .map((e) => e.name)
      .sort()
      .map((name) => join(dir, name));
  } catch (err) {
    logger.debug("plugin", "插件目录不可读，已跳过", { dir, err: errorMessage(err) });
    return [];
  }
}


/** 加载全部外部插件；无效文件记录警告后跳过 */
export async function loadPlugins(dirs: string[] = [BUILTIN_PLUGINS_DIR, USER_PLUGINS_DIR]): Promise<Plugin[]> {
  const plugins: Plugin[] = [];
  for (const dir of dirs) {
    for (const file of await pluginFiles(dir)) {
      try {
        plugins.push(await loadPluginFile(file));
      } catch (err) {
        logger.warn("plugin", "插件加载失败，已跳过", { file, err: errorMessage(err) });
      }
    }
  }
  if (plugins.length > 0) logger.info("plugin", "已加载外部插件", { names: plugins.map((p) => p.name) });
  return plugins;
}
