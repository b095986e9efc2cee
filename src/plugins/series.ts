// series：collect 阶段（feeds 之前）按 frontmatter 的 series 字段分组，每组生成一个 series 类型的 feed
// 组内按日期升序、slug 升序排列，prev / next 由 feeds 插件按 feed 顺序设置

import { readCache } from "../cacher/memory.js";
import { sortItems } from "../feed/sort.js";
import type { Manager } from "../lifecycle/manager.js";
import { isListable } from "../lifecycle/manager.js";
import type { CollectPlugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import { logger } from "../logger/index.js";
import { createFeedConfig, isFeedConfig, type FeedConfig } from "../types/feed.js";
import { createSyntheticItem, slugify, type Item } from "../types/item.js";
import { quoteLiteral } from "./autoFeeds.js";


/** 缓存键：series 插件生成的 feed 配置 */
export const SERIES_FEEDS_KEY = "series.configs";


export interface SeriesGroup {
  name: string;
  slug: string;
  /** 映射到同一 slug 的全部系列名 */
  labels: string[];
  /** 按日期升序，日期相同按 slug，无日期的在最后 */
  items: Item[];
}


/** 条目所属系列名；非字符串或空白视为不属于任何系列 */
export function seriesOf(item: Item): string | undefined {
  const raw = item.extra.series;
  return typeof raw === "string" && raw.trim() !== "" ? raw : undefined;
}


/** 按系列名分组，组按 slug 排序；slugify 后为空的系列名被丢弃 */
export function groupSeries(items: readonly Item[], prefix: string): SeriesGroup[] {
  const groups = new Map<string, SeriesGroup>();
  for (const item of items) {
    if (!isListable(item)) continue;
    const name = seriesOf(item);
    if (name === undefined) continue;
    const part = slugify(name);
    if (part === "") continue;
    const slug = `${prefix}/${part}`;
    const group = groups.get(slug) ?? { name: name.trim(), slug, labels: [], items: [] };
    if (!group.labels.includes(name)) group.labels.push(name);
    group.items.push(item);
    groups.set(slug, group);
  }
  return [...groups.values()]
    .sort((a, b) => (a.slug < b.slug ? -1 : a.slug > b.slug ? 1 : 0))
    .map((g) => ({ ...g, labels: g.labels.slice().sort(), items: sortItems(g.items, "date", false) }));
}


/** 组对应的过滤表达式 */
export function seriesFilter(group: SeriesGroup): string {
  return group.labels.map((l) => `series == ${quoteLiteral(l)}`).join(" or ");
}


function isFeedConfigArray(value: unknown): value is FeedConfig[] {
  return Array.isArray(value) && value.every(isFeedConfig);
}


/** 读取 series 插件生成的 feed 配置 */
export function seriesFeedConfigs(manager: Manager): FeedConfig[] {
  return readCache(manager.cache, SERIES_FEEDS_KEY, isFeedConfigArray) ?? [];
}


export function seriesPlugin(): CollectPlugin {
  return {
    name: "series",
    priority: (stage) => (stage === "collect" ? PRIORITY.early : PRIORITY.default),
    collect(m) {
      const config = m.config.series;
      if (!config.enabled) return;
      const groups = groupSeries(m.items(), config.prefix);
      const existing = new Set(m.items().map((i) => i.slug));
      const configs = groups.map((group) => {
        if (!existing.has(group.slug)) {
          m.appendItem(createSyntheticItem({ slug: group.slug, title: group.name, extra: { seriesFeed: group.name } }));
        }
        return createFeedConfig(
          {
            slug: group.slug,
            title: group.name,
            filter: seriesFilter(group),
            sort: "date",
            reverse: false,
            itemsPerPage: 0,
            kind: "series",
            formats: config.formats,
          },
          m.config.feedDefaults,
        );
      });
      m.cache.set(SERIES_FEEDS_KEY, configs);
      logger.info("plugin", "已生成系列 feed", { count: configs.length });
    },
  };
}
