// Feed：由 FeedConfig 在 collect 阶段派生的有序、分页的条目视图

import type { Item } from "./item.js";


/** feed 输出格式开关 */
export interface FeedFormats {
  html: boolean;
  rss: boolean;
  atom: boolean;
  json: boolean;
}


/** series 类型的 feed 会为其中条目设置 prev/next */
export type FeedKind = "blog" | "series";


export interface FeedConfig {
  /** feed 标识，同时决定输出目录 */
  slug: string;
  title: string;
  description: string;
  /** 过滤表达式；空字符串表示全部条目 */
  filter: string;
  /** 排序字段，取值同过滤表达式中的字段 */
  sort: string;
  /** true 为降序 */
  reverse: boolean;
  itemsPerPage: number;
  /** 尾页条目数低于该值时并入上一页 */
  orphanThreshold: number;
  includePrivate: boolean;
  kind: FeedKind;
  formats: FeedFormats;
}


export interface FeedPage<T = Item> {
  /** 从 1 开始 */
  number: number;
  items: T[];
  hasPrev: boolean;
  hasNext: boolean;
  prevUrl: string;
  nextUrl: string;
  totalPages: number;
  totalItems: number;
  itemsPerPage: number;
  /** 所有页的 URL，下标即页码 - 1 */
  pageUrls: string[];
}


export interface Feed {
  config: FeedConfig;
  items: Item[];
  pages: FeedPage[];
}


export const DEFAULT_FEED_FORMATS: FeedFormats = { html: true, rss: true, atom: false, json: false };


/** 创建 feed 配置时可省略的字段 */
export type FeedConfigInit = Partial<Omit<FeedConfig, "formats">> & { formats?: Partial<FeedFormats> };


/** 缺省值与配置合并：itemsPerPage 10、orphanThreshold 3、按 date 降序 */
export function createFeedConfig(init: FeedConfigInit & { slug: string }, defaults: FeedConfigInit = {}): FeedConfig {
  return {
    slug: init.slug,
    title: init.title ?? defaults.title ?? init.slug,
    description: init.description ?? defaults.description ?? "",
    filter: init.filter ?? defaults.filter ?? "",
    sort: init.sort ?? defaults.sort ?? "date",
    reverse: init.reverse ?? defaults.reverse ?? true,
    itemsPerPage: init.itemsPerPage ?? defaults.itemsPerPage ?? 10,
    orphanThreshold: init.orphanThreshold ?? defaults.orphanThreshold ?? 3,
    includePrivate: init.includePrivate ?? defaults.includePrivate ?? false,
    kind: init.kind ?? defaults.kind ?? "blog",
    formats: {
      html: init.formats?.html ?? defaults.formats?.html ?? DEFAULT_FEED_FORMATS.html,
      rss: init.formats?.rss ?? defaults.formats?.rss ?? DEFAULT_FEED_FORMATS.rss,
      atom: init.formats?.atom ?? defaults.formats?.atom ?? DEFAULT_FEED_FORMATS.atom,
      json: init.formats?.json ?? defaults.formats?.json ?? DEFAULT_FEED_FORMATS.json,
    },
  };
}


/** feed 第 n 页的 URL：第一页为 /slug/，其余为 /slug/page/n/ */
export function pageUrl(slug: string, page: number): string {
  const base = slug === "" ? "/" : `/${slug}/`;
  return page <= 1 ? base : `${base}page/${page}/`;
}


/**
 * 分页：itemsPerPage <= 0 表示不分页。
 * 剩余条目不足 orphanThreshold 时并入当前页，避免尾页过短。
 */
export function paginate<T>(items: readonly T[], slug: string, itemsPerPage: number, orphanThreshold: number): FeedPage<T>[] {
  const chunks: T[][] = [];
  if (itemsPerPage <= 0 || items.length <= itemsPerPage) {
    chunks.push(items.slice());
  } else {
    let start = 0;
    while (start < items.length) {
      let end = Math.min(start + itemsPerPage, items.length);
      const remaining = items.length - end;
      if (remaining > 0 && remaining < orphanThreshold) end = items.length;
      chunks.push(items.slice(start, end));
      start = end;
    }
  }
  const totalPages = chunks.length;
  const pageUrls = chunks.map((_, i) => pageUrl(slug, i + 1));
  return chunks.map((chunk, i) => {
    const number = i + 1;
    return {
      number,
      items: chunk,
      hasPrev: number > 1,
      hasNext: number < totalPages,
      prevUrl: number > 1 ? pageUrls[i - 1] : "",
      nextUrl: number < totalPages ? pageUrls[i + 1] : "",
      totalPages,
      totalItems: items.length,
      itemsPerPage,
      pageUrls,
    };
  });
}


/** 运行时校验 FeedConfig（从缓存读取时使用） */
export function isFeedConfig(value: unknown): value is FeedConfig {
  if (typeof value !== "object" || value === null) return false;
  const v: Record<string, unknown> = { ...value };
  return (
    typeof v.slug === "string" &&
    typeof v.title === "string" &&
    typeof v.filter === "string" &&
    typeof v.sort === "string" &&
    typeof v.reverse === "boolean" &&
    typeof v.itemsPerPage === "number" &&
    typeof v.orphanThreshold === "number" &&
    typeof v.formats === "object" &&
    v.formats !== null
  );
}
