// feeds：collect 阶段由配置的 feed 与 autoFeeds 生成的 feed 计算条目视图（过滤 → 排序 → 分页）

import { sortItems } from "../feed/sort.js";
import { compileFilter, matchAll } from "../filter/index.js";
import type { Manager } from "../lifecycle/manager.js";
import { isListable } from "../lifecycle/manager.js";
import type { CollectPlugin } from "../lifecycle/plugin.js";
import { errorMessage, logger } from "../logger/index.js";
import { createFeedConfig, paginate, type Feed, type FeedConfig } from "../types/feed.js";
import type { Item } from "../types/item.js";
import { autoFeedConfigs } from "./autoFeeds.js";
import { seriesFeedConfigs } from "./series.js";


/** 由单个配置计算 feed；过滤表达式语法错误直接抛出 */
export function buildFeed(config: FeedConfig, items: readonly Item[], now: Date): Feed {
  const predicate = compileFilter(config.filter, { now });
  const candidates = items.filter((item) => isListable(item, config.includePrivate));
  const sorted = sortItems(matchAll(predicate, candidates), config.sort, config.reverse);
  return {
    config,
    items: sorted,
    pages: paginate(sorted, config.slug, config.itemsPerPage, config.orphanThreshold),
  };
}


/** series 类型的 feed：按 feed 内顺序设置相邻条目的 prev / next */
function linkSeries(feed: Feed): void {
  feed.items.forEach((item, i) => {
    item.prev = i > 0 ? feed.items[i - 1] : undefined;
    item.next = i < feed.items.length - 1 ? feed.items[i + 1] : undefined;
  });
}


/** 配置中的 feed 在前，其后依次为自动 feed、系列 feed；slug 重复时保留先出现的 */
export function feedConfigsFor(m: Manager): FeedConfig[] {
  const configs = [
    ...m.config.feeds.map((f) => createFeedConfig(f, m.config.feedDefaults)),
    ...autoFeedConfigs(m),
    ...seriesFeedConfigs(m),
  ];
  const seen = new Set<string>();
  return configs.filter((c) => {
    if (seen.has(c.slug)) {
      logger.warn("plugin", "feed slug 重复，已忽略后者", { slug: c.slug });
      return false;
    }
    seen.add(c.slug);
    return true;
  });
}


export function feedsPlugin(): CollectPlugin {
  return {
    name: "feeds",
    collect(m) {
      const configs = feedConfigsFor(m);
      const built = configs.map((config) => {
        try {
          return buildFeed(config, m.items(), m.now);
        } catch (err) {
          logger.error("filter", "feed 过滤表达式有误", { feed: config.slug, filter: config.filter, err: errorMessage(err) });
          throw err;
        }
      });
      for (const feed of built) {
        if (feed.config.kind === "series") linkSeries(feed);
      }
      const slugs = new Set(configs.map((c) => c.slug));
      m.replaceFeeds([...m.feeds().filter((f) => !slugs.has(f.config.slug)), ...built]);
      logger.info("plugin", "已生成 feed", { count: built.length, items: built.reduce((n, f) => n + f.items.length, 0) });
    },
  };
}
