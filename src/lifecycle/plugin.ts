// 插件契约：每个阶段一个方法，插件只实现自己参与的阶段；priority 未实现时为 PRIORITY.default

import type { Manager } from "./manager.js";
import type { Stage } from "./stages.js";
import { STAGES } from "./stages.js";


export type StageResult = void | Promise<void>;


export interface Plugin {
  /** 插件名，同时作为 plugins.<name> 配置的键，需唯一 */
  readonly name: string;
  /** 返回在某个阶段的优先级，数值小的先执行 */
  priority?(stage: Stage): number;
  discover?(manager: Manager): StageResult;
  configure?(manager: Manager): StageResult;
  collect?(manager: Manager): StageResult;
  transform?(manager: Manager): StageResult;
  render?(manager: Manager): StageResult;
  write?(manager: Manager): StageResult;
}


/** 各阶段的能力接口：实现对应方法即参与该阶段 */
export type DiscoverPlugin = Plugin & Required<Pick<Plugin, "discover">>;
export type ConfigurePlugin = Plugin & Required<Pick<Plugin, "configure">>;
export type CollectPlugin = Plugin & Required<Pick<Plugin, "collect">>;
export type TransformPlugin = Plugin & Required<Pick<Plugin, "transform">>;
export type RenderPlugin = Plugin & Required<Pick<Plugin, "render">>;
export type WritePlugin = Plugin & Required<Pick<Plugin, "write">>;


/** 插件是否实现了某阶段 */
export function implementsStage(plugin: Plugin, stage: Stage): boolean {
  return typeof plugin[stage] === "function";
}


/** 运行时校验：用于从文件加载的外部插件 */
export function isPlugin(value: unknown): value is Plugin {
  if (value == null || typeof value !== "object") return false;
  if (!("name" in value) || typeof value.name !== "string" || value.name.length === 0) return false;
  if ("priority" in value && value.priority !== undefined && typeof value.priority !== "function") return false;
  let stages = 0;
  for (const stage of STAGES) {
    if (!(stage in value)) continue;
    const hook: unknown = Reflect.get(value, stage);
    if (hook === undefined) continue;
    if (typeof hook !== "function") return false;
    stages++;
  }
  return stages > 0;
}
