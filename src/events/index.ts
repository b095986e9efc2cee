// 事件总线：进程内单例 EventEmitter，Manager 在阶段与插件开始/结束时广播，CLI 与测试订阅

import { EventEmitter } from "node:events";
import type { Stage } from "../lifecycle/stages.js";


/** 构建进度事件 */
export type BuildEvent =
  | { type: "stage:start"; stage: Stage; plugins: string[] }
  | { type: "stage:done"; stage: Stage; durationMs: number }
  | { type: "plugin:done"; stage: Stage; plugin: string; durationMs: number }
  | { type: "plugin:failed"; stage: Stage; plugin: string; error: string };


/** 全局单例事件总线 */
export const eventBus = new EventEmitter();
eventBus.setMaxListeners(50);


/** 向事件总线广播构建事件 */
export function emitBuildEvent(event: BuildEvent): void {
  eventBus.emit("build", event);
}


/** 订阅构建事件，返回取消订阅函数 */
export function onBuildEvent(fn: (e: BuildEvent) => void): () => void {
  eventBus.on("build", fn);
  return () => eventBus.off("build", fn);
}
