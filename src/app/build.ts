// 构建入口：读取配置、注册内置与外部插件，运行到指定阶段

import { loadSiteConfig, type SiteConfig } from "../config/index.js";
import { initUserDir } from "../config/paths.js";
import { Manager } from "../lifecycle/manager.js";
import type { Plugin } from "../lifecycle/plugin.js";
import type { Stage } from "../lifecycle/stages.js";
import { logger } from "../logger/index.js";
import { defaultPlugins, loadPlugins, type DefaultPluginOptions } from "../plugins/index.js";


export interface SiteOptions extends DefaultPluginOptions {
  /** stagepress.json 路径 */
  configPath?: string;
  /** 直接给出配置时不读文件 */
  config?: SiteConfig;
  /** 覆盖 config.outputDir */
  outputDir?: string;
  concurrency?: number;
  now?: Date;
  /** 替换内置插件列表 */
  plugins?: Plugin[];
  /** 加载 plugins/ 与 .stagepress/plugins/ 中的外部插件，默认开启 */
  external?: boolean;
  /** 替换外部插件目录 */
  pluginDirs?: string[];
}


export interface BuildOptions extends SiteOptions {
  /** 运行到该阶段为止（含），默认 write */
  until?: Stage;
}


/** 创建已注册插件、尚未运行的 Manager */
export async function createSite(options: SiteOptions = {}): Promise<Manager> {
  const loaded = options.config ?? (await loadSiteConfig(options.configPath));
  const config = options.outputDir ? { ...loaded, outputDir: options.outputDir } : loaded;
  const manager = new Manager({ config, concurrency: options.concurrency, now: options.now });
  manager.register(...(options.plugins ?? defaultPlugins(options)));
  if (options.external !== false) {
    if (!options.pluginDirs) await initUserDir();
    registerExternal(manager, await loadPlugins(options.pluginDirs));
  }
  return manager;
}


/** 注册外部插件；与已注册插件重名的记录警告后跳过 */
export function registerExternal(manager: Manager, plugins: Plugin[]): void {
  for (const plugin of plugins) {
    if (manager.plugins().some((p) => p.name === plugin.name)) {
      logger.warn("plugin", "外部插件与已注册插件重名，已跳过", { name: plugin.name });
      continue;
    }
    manager.register(plugin);
  }
}


export async function runBuild(options: BuildOptions = {}): Promise<Manager> {
  const manager = await createSite(options);
  const until = options.until ?? "write";
  await manager.runTo(until);
  logger.info("app", "构建完成", {
    until,
    items: manager.items().length,
    feeds: manager.feeds().length,
    outputDir: manager.config.outputDir,
  });
  return manager;
}
