export { Manager, isListable } from "./manager.js";
export type { ManagerOptions, FilterOptions } from "./manager.js";
export { StageError, ResourceError, PluginLoadError } from "./errors.js";
export { implementsStage, isPlugin } from "./plugin.js";
export type {
  Plugin,
  StageResult,
  DiscoverPlugin,
  ConfigurePlugin,
  CollectPlugin,
  TransformPlugin,
  RenderPlugin,
  WritePlugin,
} from "./plugin.js";
export { STAGES, PRIORITY, isStage, stageIndex } from "./stages.js";
export type { Stage } from "./stages.js";
