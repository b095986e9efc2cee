// autoFeeds：configure 阶段为每个标签、分类、年份与月份注册合成条目，并生成对应的 feed 配置供 collect 使用

import { readCache } from "../cacher/memory.js";
import type { AutoFeedsConfig } from "../config/index.js";
import type { Manager } from "../lifecycle/manager.js";
import { isListable } from "../lifecycle/manager.js";
import type { ConfigurePlugin } from "../lifecycle/plugin.js";
import { logger } from "../logger/index.js";
import { createFeedConfig, isFeedConfig, type FeedConfig } from "../types/feed.js";
import { createSyntheticItem, slugify, type Item } from "../types/item.js";


/** 缓存键：自动生成的 feed 配置 */
export const AUTO_FEEDS_KEY = "autoFeeds.configs";


export type AutoFeedKind = "tag" | "category" | "archive";


/** 转为过滤表达式中的双引号字符串字面量 */
export function quoteLiteral(s: string): string {
  return `"${s.replace(/\\/g, "\\\\").replace(/"/g, "\\\"")}"`;
}


export interface AutoFeedGroup {
  kind: AutoFeedKind;
  slug: string;
  title: string;
  /** 映射到同一 slug 的全部原始值，如 "Go" 与 "go" */
  labels: string[];
  filter: string;
}


function isoDay(year: number, month: number): string {
  return new Date(Date.UTC(year, month, 1)).toISOString();
}


function archiveFilter(year: number, month?: number): string {
  const from = month === undefined ? isoDay(year, 0) : isoDay(year, month - 1);
  const to = month === undefined ? isoDay(year + 1, 0) : isoDay(year, month);
  return `date >= ${quoteLiteral(from)} and date < ${quoteLiteral(to)}`;
}


/** 按 slug 合并取值；slugify 后为空的值被丢弃 */
function groupValues(kind: "tag" | "category", prefix: string, values: string[]): AutoFeedGroup[] {
  const bySlug = new Map<string, string[]>();
  for (const value of values) {
    const part = slugify(value);
    if (part === "") continue;
    const slug = `${prefix}/${part}`;
    const labels = bySlug.get(slug) ?? [];
    if (!labels.includes(value)) labels.push(value);
    bySlug.set(slug, labels);
  }
  return [...bySlug.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([slug, labels]) => {
      labels.sort();
      const clauses = labels.map((l) => (kind === "tag" ? `${quoteLiteral(l)} in tags` : `category == ${quoteLiteral(l)}`));
      return { kind, slug, title: labels[0], labels, filter: clauses.join(" or ") };
    });
}


function archiveGroups(prefix: string, items: Item[]): AutoFeedGroup[] {
  const months = new Set<string>();
  for (const item of items) {
    if (!item.date) continue;
    const y = item.date.getUTCFullYear();
    const m = item.date.getUTCMonth() + 1;
    months.add(`${y}-${String(m).padStart(2, "0")}`);
  }
  const years = [...new Set([...months].map((ym) => ym.slice(0, 4)))].sort();
  const groups: AutoFeedGroup[] = [];
  for (const year of years) {
    const y = Number(year);
    groups.push({ kind: "archive", slug: `${prefix}/${year}`, title: year, labels: [year], filter: archiveFilter(y) });
    for (const ym of [...months].filter((ym) => ym.startsWith(`${year}-`)).sort()) {
      const month = Number(ym.slice(5));
      groups.push({
        kind: "archive",
        slug: `${prefix}/${year}/${ym.slice(5)}`,
        title: ym,
        labels: [ym],
        filter: archiveFilter(y, month),
      });
    }
  }
  return groups;
}


/** 由当前条目计算全部自动分组（纯函数，顺序可复现） */
export function computeAutoFeedGroups(items: Item[], config: AutoFeedsConfig): AutoFeedGroup[] {
  const listable = items.filter((item) => isListable(item));
  const groups: AutoFeedGroup[] = [];
  if (config.tags) {
    groups.push(...groupValues("tag", config.tagPrefix, listable.flatMap((i) => i.tags)));
  }
  if (config.categories) {
    const categories = listable.map((i) => i.category).filter((c): c is string => c !== undefined && c !== "");
    groups.push(...groupValues("category", config.categoryPrefix, categories));
  }
  if (config.archives) {
    groups.push(...archiveGroups(config.archivePrefix, listable));
  }
  return groups;
}


function isFeedConfigArray(value: unknown): value is FeedConfig[] {
  return Array.isArray(value) && value.every(isFeedConfig);
}


/** 读取 autoFeeds 生成的 feed 配置 */
export function autoFeedConfigs(manager: Manager): FeedConfig[] {
  return readCache(manager.cache, AUTO_FEEDS_KEY, isFeedConfigArray) ?? [];
}


export function autoFeedsPlugin(): ConfigurePlugin {
  return {
    name: "autoFeeds",
    configure(m) {
      const config = m.config.autoFeeds;
      const groups = computeAutoFeedGroups(m.items(), config);
      const existing = new Set(m.items().map((i) => i.slug));
      const configs: FeedConfig[] = [];
      for (const group of groups) {
        if (!existing.has(group.slug)) {
          m.appendItem(
            createSyntheticItem({
              slug: group.slug,
              title: group.title,
              extra: { autoFeed: group.kind, labels: group.labels },
            }),
          );
        }
        configs.push(
          createFeedConfig(
            { slug: group.slug, title: group.title, filter: group.filter, formats: config.formats },
            m.config.feedDefaults,
          ),
        );
      }
      m.cache.set(AUTO_FEEDS_KEY, configs);
      logger.info("plugin", "已生成自动 feed", {
        tags: groups.filter((g) => g.kind === "tag").length,
        categories: groups.filter((g) => g.kind === "category").length,
        archives: groups.filter((g) => g.kind === "archive").length,
      });
    },
  };
}
