// Manager：按固定阶段顺序、阶段内按优先级串行调度插件，独占条目集合与 feed 列表

import { performance } from "node:perf_hooks";
import { MemoryCache, type Cache } from "../cacher/memory.js";
import { parseSiteConfig, type SiteConfig } from "../config/index.js";
import { emitBuildEvent } from "../events/index.js";
import { sortItems } from "../feed/sort.js";
import type { FilterValue } from "../filter/ast.js";
import { ABSENT, readPath } from "../filter/fields.js";
import { compileFilter, matchAll } from "../filter/index.js";
import { errorMessage, logger } from "../logger/index.js";
import { resolveConcurrency, runConcurrently } from "../pool/index.js";
import type { Feed } from "../types/feed.js";
import { isPublic, type Item } from "../types/item.js";
import { StageError } from "./errors.js";
import { implementsStage, type Plugin } from "./plugin.js";
import { PRIORITY, STAGES, stageIndex, type Stage } from "./stages.js";


export interface ManagerOptions {
  config?: SiteConfig;
  cache?: Cache;
  /** 覆盖 config.concurrency */
  concurrency?: number;
  /** 过滤表达式中 today / now 使用的时钟，默认构造时刻 */
  now?: Date;
}


export interface FilterOptions {
  /** 包含 private、草稿与未发布条目 */
  includePrivate?: boolean;
  /** 在给定条目上筛选，默认整个条目集合 */
  items?: readonly Item[];
}


/** 条目能否进入 feed 与筛选结果：skip 条目永远排除，私有条目按需包含 */
export function isListable(item: Item, includePrivate = false): boolean {
  return !item.skip && (includePrivate || isPublic(item));
}


export class Manager {
  readonly config: SiteConfig;
  readonly cache: Cache;
  readonly now: Date;
  private readonly registered: Plugin[] = [];
  private itemStore: Item[] = [];
  private feedStore: Feed[] = [];
  private poolSize: number;
  private active: Stage | null = null;
  private readonly completed = new Set<Stage>();

  constructor(options: ManagerOptions = {}) {
    this.config = options.config ?? parseSiteConfig({});
    this.cache = options.cache ?? new MemoryCache();
    this.now = options.now ?? new Date();
    this.poolSize = resolveConcurrency(options.concurrency ?? this.config.concurrency);
  }


  /** 注册插件；同名插件重复注册视为配置错误 */
  register(...plugins: Plugin[]): this {
    for (const plugin of plugins) {
      if (this.registered.some((p) => p.name === plugin.name)) {
        throw new Error(`插件名重复: ${plugin.name}`);
      }
      this.registered.push(plugin);
    }
    return this;
  }

  plugins(): readonly Plugin[] {
    return this.registered;
  }


  /** 当前条目集合（即内部数组本身）；整体替换后需调用 replaceItems 写回 */
  items(): Item[] {
    return this.itemStore;
  }

  replaceItems(items: Item[]): void {
    this.itemStore = items;
  }

  /** 追加一个条目，用于 discover / configure 阶段注册源文件条目与合成条目 */
  appendItem(item: Item): void {
    this.itemStore.push(item);
  }

  /** 按 slug 查找条目 */
  item(slug: string): Item | undefined {
    return this.itemStore.find((i) => i.slug === slug);
  }


  feeds(): Feed[] {
    return this.feedStore;
  }

  replaceFeeds(feeds: Feed[]): void {
    this.feedStore = feeds;
  }

  feed(slug: string): Feed | undefined {
    return this.feedStore.find((f) => f.config.slug === slug);
  }


  get concurrency(): number {
    return this.poolSize;
  }

  set concurrency(n: number) {
    this.poolSize = resolveConcurrency(n);
  }


  /** 对条目（默认整个集合）并发执行 fn，全部完成后抛出首个错误 */
  runConcurrently(fn: (item: Item) => void | Promise<void>, items: readonly Item[] = this.itemStore): Promise<void> {
    return runConcurrently(items, (item) => fn(item), { concurrency: this.poolSize });
  }


  /** 按过滤表达式筛选条目，保持原有顺序；空表达式命中全部 */
  filter(expression: string, options: FilterOptions = {}): Item[] {
    const predicate = compileFilter(expression, { now: this.now });
    const candidates = (options.items ?? this.itemStore).filter((item) => isListable(item, options.includePrivate));
    return matchAll(predicate, candidates);
  }


  /**
   * 从筛选、排序后的条目中取出一个字段，字段支持成员路径（如 "series.name"）。
   * 缺失的字段取 undefined；sort 为空时保持条目集合原有顺序。
   */
  map(field: string, filter = "", sort = "", reverse = false, options: FilterOptions = {}): Array<FilterValue | undefined> {
    const matched = this.filter(filter, options);
    const ordered = sort === "" ? matched : sortItems(matched, sort, reverse);
    const path = field.split(".");
    return ordered.map((item) => {
      const value = readPath(item, path);
      return value === ABSENT ? undefined : value;
    });
  }


  /** 插件在某阶段的最终优先级：配置覆盖 > 插件声明 > PRIORITY.default */
  priorityFor(plugin: Plugin, stage: Stage): number {
    const override = this.config.plugins[plugin.name]?.priority?.[stage];
    if (override !== undefined) return override;
    return plugin.priority?.(stage) ?? PRIORITY.default;
  }

  isEnabled(plugin: Plugin): boolean {
    return this.config.plugins[plugin.name]?.enabled !== false;
  }


  /** 某阶段的执行顺序：只含实现该阶段且未禁用的插件，按优先级升序，同优先级保持注册顺序 */
  pluginOrder(stage: Stage): Plugin[] {
    return this.registered
      .map((plugin, index) => ({ plugin, index, priority: this.priorityFor(plugin, stage) }))
      .filter(({ plugin }) => implementsStage(plugin, stage) && this.isEnabled(plugin))
      .sort((a, b) => a.priority - b.priority || a.index - b.index)
      .map(({ plugin }) => plugin);
  }


  /** 正在运行的阶段；阶段结束（成功或失败）后为 null */
  get currentStage(): Stage | null {
    return this.active;
  }

  hasRun(stage: Stage): boolean {
    return this.completed.has(stage);
  }


  /** 运行全部阶段 */
  run(): Promise<void> {
    return this.runTo("write");
  }


  /**
   * 依次运行到 target（含），已完成的阶段不会重复执行。
   * 失败的阶段不算完成：再次调用会从该阶段的第一个插件重新开始，已执行插件对条目的修改不会回滚。
   */
  async runTo(target: Stage): Promise<void> {
    const last = stageIndex(target);
    for (const stage of STAGES.slice(0, last + 1)) {
      if (this.completed.has(stage)) continue;
      await this.runStage(stage);
    }
  }


  /** 清空条目、feed、缓存与阶段进度，可再次运行 */
  reset(): void {
    this.itemStore = [];
    this.feedStore = [];
    this.cache.clear();
    this.completed.clear();
    this.active = null;
  }


  private async runStage(stage: Stage): Promise<void> {
    const order = this.pluginOrder(stage);
    const names = order.map((p) => p.name);
    const stageStart = performance.now();
    this.active = stage;
    logger.info("lifecycle", `阶段开始: ${stage}`, { plugins: names });
    emitBuildEvent({ type: "stage:start", stage, plugins: names });

    try {
      for (const plugin of order) {
        const hook = plugin[stage];
        if (!hook) continue;
        const t0 = performance.now();
        try {
          await hook.call(plugin, this);
        } catch (err) {
          logger.error("lifecycle", `插件执行失败: ${plugin.name}`, { stage, err: errorMessage(err) });
          emitBuildEvent({ type: "plugin:failed", stage, plugin: plugin.name, error: errorMessage(err) });
          throw new StageError(plugin.name, stage, err);
        }
        const durationMs = Math.round(performance.now() - t0);
        logger.debug("plugin", `${plugin.name}.${stage} 完成`, { durationMs, items: this.itemStore.length });
        emitBuildEvent({ type: "plugin:done", stage, plugin: plugin.name, durationMs });
      }
    } finally {
      this.active = null;
    }

    this.completed.add(stage);
    const durationMs = Math.round(performance.now() - stageStart);
    logger.info("lifecycle", `阶段完成: ${stage}`, { durationMs, items: this.itemStore.length, feeds: this.feedStore.length });
    emitBuildEvent({ type: "stage:done", stage, durationMs });
  }
}
