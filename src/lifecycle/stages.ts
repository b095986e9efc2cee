// 构建阶段与优先级：阶段顺序固定，不可配置

/** 全局阶段顺序 */
export const STAGES = ["discover", "configure", "collect", "transform", "render", "write"] as const;

export type Stage = (typeof STAGES)[number];


/** 优先级档位：同一阶段内数值小的先执行，可在档位上加减偏移做细粒度排序 */
export const PRIORITY = {
  first: -1000,
  early: -100,
  default: 0,
  late: 100,
  last: 1000,
} as const;


export function isStage(value: string): value is Stage {
  return STAGES.some((s) => s === value);
}


/** 阶段在全局顺序中的下标 */
export function stageIndex(stage: Stage): number {
  return STAGES.indexOf(stage);
}
