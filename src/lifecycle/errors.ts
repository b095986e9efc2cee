// 生命周期错误：StageError 终止整个构建；ResourceError 只作为单个资源记录上的数据

import { errorMessage } from "../logger/index.js";
import type { Stage } from "./stages.js";


/** 插件阶段方法失败：附带插件名与阶段名，构建立即停止 */
export class StageError extends Error {
  readonly plugin: string;
  readonly stage: Stage;

  constructor(plugin: string, stage: Stage, cause: unknown) {
    super(`插件 "${plugin}" 在 ${stage} 阶段失败: ${errorMessage(cause)}`, { cause });
    this.name = "StageError";
    this.plugin = plugin;
    this.stage = stage;
  }
}


/** 单个外部资源失败（如某个 feed URL），写入该资源的记录，不升级为 StageError */
export class ResourceError extends Error {
  readonly resource: string;

  constructor(resource: string, cause: unknown) {
    super(`${resource}: ${errorMessage(cause)}`, { cause });
    this.name = "ResourceError";
    this.resource = resource;
  }
}


/** 外部插件文件无法加载或导出的不是合法插件 */
export class PluginLoadError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: ErrorOptions) {
    super(`插件文件 ${file}: ${message}`, options);
    this.name = "PluginLoadError";
    this.file = file;
  }
}
