// blogroll：configure 注册 blogroll / reader 合成条目；collect 并发抓取外部 feed（文件缓存 + TTL）；
// write 输出 blogroll 页、分页的 reader 页与 JSON。单个 feed 失败只记录在该 feed 的 error 上

import Parser from "rss-parser";
import { z } from "zod";
import { readCache, readCachedJson, writeCachedJson } from "../cacher/index.js";
import type { BlogrollConfig, ExternalFeedConfig } from "../config/index.js";
import { CACHE_DIR } from "../config/paths.js";
import { ResourceError } from "../lifecycle/errors.js";
import type { Manager } from "../lifecycle/manager.js";
import type { Plugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import { errorMessage, logger } from "../logger/index.js";
import { fanOut, withTimeout } from "../pool/index.js";
import { defaultTemplateRenderer, type TemplateRenderer } from "../render/template.js";
import { paginate } from "../types/feed.js";
import { createSyntheticItem, hrefFor } from "../types/item.js";
import { parseDate } from "../utils/date.js";
import { escapeHtml, truncate } from "../utils/html.js";
import { parseDuration } from "../utils/duration.js";
import { outputPathFor, writeOutputFile, writeOutputJson } from "../writer/index.js";


/** 外部 feed 抓取函数：默认使用 rss-parser 的 parseURL */
export type FeedFetcher = (url: string, options: { timeoutMs: number }) => Promise<Parser.Output<Record<string, unknown>>>;


const externalEntrySchema = z.object({
  id: z.string(),
  feedUrl: z.string(),
  feedTitle: z.string(),
  title: z.string(),
  link: z.string(),
  summary: z.string().optional(),
  author: z.string().optional(),
  /** ISO 时间 */
  date: z.string().optional(),
});

const cachedFeedSchema = z.object({
  title: z.string(),
  siteUrl: z.string().optional(),
  description: z.string().optional(),
  entries: z.array(externalEntrySchema),
});


export type ExternalEntry = z.output<typeof externalEntrySchema>;

export type CachedFeed = z.output<typeof cachedFeedSchema>;


/** 一个外部 feed 的抓取结果；失败时 error 有值，entries 可能来自过期缓存 */
const externalFeedSchema = z.object({
  url: z.string(),
  title: z.string(),
  siteUrl: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  tags: z.array(z.string()),
  entries: z.array(externalEntrySchema),
  fromCache: z.boolean(),
  error: z.string().optional(),
});

export type ExternalFeed = z.output<typeof externalFeedSchema>;


export interface BlogrollOptions {
  fetcher?: FeedFetcher;
  templates?: TemplateRenderer;
  /** 文件缓存根目录，默认 config.cacheDir 或 .stagepress/cache */
  cacheDir?: string;
}


const CACHE_NAMESPACE = "blogroll";

export const BLOGROLL_FEEDS_KEY = "blogroll.feeds";
export const BLOGROLL_ENTRIES_KEY = "blogroll.entries";


function isCachedFeed(value: unknown): value is CachedFeed {
  return cachedFeedSchema.safeParse(value).success;
}


function isFeedList(value: unknown): value is ExternalFeed[] {
  return z.array(externalFeedSchema).safeParse(value).success;
}


function isEntryList(value: unknown): value is ExternalEntry[] {
  return z.array(externalEntrySchema).safeParse(value).success;
}


/** collect 阶段得到的外部 feed（已排序）；未运行或已 reset 时为空 */
export function blogrollFeeds(m: Manager): ExternalFeed[] {
  return readCache(m.cache, BLOGROLL_FEEDS_KEY, isFeedList) ?? [];
}


/** 全部外部 feed 的条目（已排序） */
export function blogrollEntries(m: Manager): ExternalEntry[] {
  return readCache(m.cache, BLOGROLL_ENTRIES_KEY, isEntryList) ?? [];
}


export const defaultFeedFetcher: FeedFetcher = (url, { timeoutMs }) => {
  const parser = new Parser({
    timeout: timeoutMs,
    headers: {
      "User-Agent": "stagepress/0.1 (blogroll)",
      "Accept": "application/rss+xml,application/atom+xml,application/xml,text/xml,*/*",
    },
  });
  return parser.parseURL(url);
};


function pickString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}


function toIso(value: string | undefined): string | undefined {
  if (!value) return undefined;
  return parseDate(value)?.toISOString();
}


/** rss-parser 输出 → 可缓存的 feed 快照 */
export function normalizeFeed(url: string, parsed: Parser.Output<Record<string, unknown>>, feed: ExternalFeedConfig, maxEntries: number): CachedFeed {
  const title = feed.title ?? pickString(parsed.title) ?? url;
  const entries = (parsed.items ?? []).slice(0, maxEntries).map((item, index): ExternalEntry => {
    const link = pickString(item.link) ?? "";
    return {
      id: pickString(item.guid) ?? (link || `${url}#${index}`),
      feedUrl: url,
      feedTitle: title,
      title: pickString(item.title) ?? "(无标题)",
      link,
      summary: pickString(item.contentSnippet) ? truncate(item.contentSnippet?.trim() ?? "", 300) : undefined,
      author: pickString(item.creator) ?? pickString(item.author),
      date: toIso(item.isoDate) ?? toIso(item.pubDate),
    };
  });
  return {
    title,
    siteUrl: feed.siteUrl ?? pickString(parsed.link),
    description: feed.description ?? pickString(parsed.description),
    entries,
  };
}


function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}


/** 日期降序（无日期在最后），再按 feed URL、链接、id 排序 */
export function sortEntries(entries: ExternalEntry[]): ExternalEntry[] {
  return entries.slice().sort((a, b) => {
    if (a.date !== b.date) {
      if (!a.date) return 1;
      if (!b.date) return -1;
      const diff = Date.parse(b.date) - Date.parse(a.date);
      if (diff !== 0) return diff;
    }
    return compareText(a.feedUrl, b.feedUrl) || compareText(a.link, b.link) || compareText(a.id, b.id);
  });
}


/** 标题排序（不区分大小写），再按 URL */
export function sortFeeds(feeds: ExternalFeed[]): ExternalFeed[] {
  return feeds.slice().sort((a, b) => compareText(a.title.toLowerCase(), b.title.toLowerCase()) || compareText(a.url, b.url));
}


/** 抓取单个 feed：新鲜缓存优先；抓取失败时退回过期缓存并带上 error，永不 reject */
async function loadFeed(
  feed: ExternalFeedConfig,
  config: BlogrollConfig,
  fetcher: FeedFetcher,
  cacheDir: string,
  now: Date,
): Promise<ExternalFeed> {
  const maxAgeMs = parseDuration(config.cacheDuration) ?? 60 * 60 * 1000;
  const base = { url: feed.url, category: feed.category, tags: feed.tags };
  const fresh = await readCachedJson(cacheDir, CACHE_NAMESPACE, feed.url, isCachedFeed, { maxAgeMs, now });
  if (fresh) return { ...base, ...fresh, fromCache: true };
  try {
    const parsed = await withTimeout(fetcher(feed.url, { timeoutMs: config.timeoutMs }), config.timeoutMs, feed.url);
    const snapshot = normalizeFeed(feed.url, parsed, feed, feed.maxEntries ?? config.maxEntriesPerFeed);
    try {
      await writeCachedJson(cacheDir, CACHE_NAMESPACE, feed.url, snapshot, now);
    } catch (err) {
      logger.warn("cache", "外部 feed 缓存写入失败", { url: feed.url, err: errorMessage(err) });
    }
    return { ...base, ...snapshot, fromCache: false };
  } catch (err) {
    const error = new ResourceError(feed.url, err).message;
    logger.warn("blogroll", "外部 feed 抓取失败", { url: feed.url, err: errorMessage(err) });
    const stale = await readCachedJson(cacheDir, CACHE_NAMESPACE, feed.url, isCachedFeed);
    if (stale) return { ...base, ...stale, fromCache: true, error };
    return { ...base, title: feed.title ?? feed.url, siteUrl: feed.siteUrl, description: feed.description, entries: [], fromCache: false, error };
  }
}


function renderBlogrollBody(feeds: ExternalFeed[]): string {
  const byCategory = new Map<string, ExternalFeed[]>();
  for (const feed of feeds) {
    const key = feed.category ?? "";
    byCategory.set(key, [...(byCategory.get(key) ?? []), feed]);
  }
  const sections = [...byCategory.keys()].sort().map((category) => {
    const list = (byCategory.get(category) ?? []).map((feed) => {
      const link = `<a href="${escapeHtml(feed.siteUrl ?? feed.url)}">${escapeHtml(feed.title)}</a>`;
      const status = feed.error ? ` <span class="error">${escapeHtml(feed.error)}</span>` : "";
      return `<li>${link} <a class="feed" href="${escapeHtml(feed.url)}">feed</a>${status}</li>`;
    });
    const heading = category ? `<h2>${escapeHtml(category)}</h2>\n` : "";
    return `${heading}<ul>\n${list.join("\n")}\n</ul>`;
  });
  return sections.join("\n");
}


function renderReaderBody(entries: ExternalEntry[]): string {
  const list = entries.map((e) => {
    const date = e.date ? ` <time datetime="${escapeHtml(e.date)}">${escapeHtml(e.date.slice(0, 10))}</time>` : "";
    const summary = e.summary ? `\n<p>${escapeHtml(e.summary)}</p>` : "";
    return `<article>\n<h2><a href="${escapeHtml(e.link)}">${escapeHtml(e.title)}</a></h2>\n<p class="source">${escapeHtml(e.feedTitle)}${date}</p>${summary}\n</article>`;
  });
  return list.join("\n");
}


export function blogrollPlugin(options: BlogrollOptions = {}): Plugin {
  const fetcher = options.fetcher ?? defaultFeedFetcher;
  const templates = options.templates ?? defaultTemplateRenderer;

  return {
    name: "blogroll",
    priority(stage) {
      if (stage === "collect") return PRIORITY.late + 10;
      if (stage === "write") return PRIORITY.late + 20;
      return PRIORITY.default;
    },

    configure(m: Manager) {
      const config = m.config.blogroll;
      if (!config.enabled) return;
      m.appendItem(createSyntheticItem({ slug: config.slug, title: "Blogroll", description: "关注的博客与 feed", extra: { blogroll: "blogroll" } }));
      m.appendItem(createSyntheticItem({ slug: config.readerSlug, title: "Reader", description: "关注的博客的最新文章", extra: { blogroll: "reader" } }));
    },

    async collect(m: Manager) {
      const config = m.config.blogroll;
      if (!config.enabled) return;
      const active = config.feeds.filter((f) => f.active);
      const cacheDir = options.cacheDir ?? m.config.cacheDir ?? CACHE_DIR;
      const outcome = await fanOut(
        active.map((feed) => () => loadFeed(feed, config, fetcher, cacheDir, m.now)),
        { concurrency: config.concurrency },
      );
      const records = outcome.results.map((r, i): ExternalFeed =>
        r.status === "fulfilled"
          ? r.value
          : { url: active[i].url, title: active[i].title ?? active[i].url, tags: active[i].tags, category: active[i].category, entries: [], fromCache: false, error: new ResourceError(active[i].url, r.reason).message },
      );
      const feeds = sortFeeds(records);
      const entries = sortEntries(records.flatMap((f) => f.entries));
      m.cache.set(BLOGROLL_FEEDS_KEY, feeds);
      m.cache.set(BLOGROLL_ENTRIES_KEY, entries);
      const failed = records.filter((f) => f.error !== undefined).length;
      logger.info("blogroll", "外部 feed 抓取完成", { total: records.length, failed, entries: entries.length });
      if (config.failWhenAllFeedsFail && records.length > 0 && failed === records.length) {
        throw new Error(`全部 ${records.length} 个外部 feed 抓取失败`);
      }
    },

    async write(m: Manager) {
      const config = m.config.blogroll;
      if (!config.enabled) return;
      const out = m.config.outputDir;
      const feeds = blogrollFeeds(m);
      const entries = blogrollEntries(m);
      const blogrollBody = `<h1>Blogroll</h1>\n${renderBlogrollBody(feeds)}`;
      await writeOutputFile(out, outputPathFor(hrefFor(config.slug)), await templates.renderPage({ site: m.config, title: "Blogroll", body: blogrollBody }));
      const pages = paginate(entries, config.readerSlug, config.itemsPerPage, config.orphanThreshold);
      for (const page of pages) {
        const body = `<h1>Reader</h1>\n${renderReaderBody(page.items)}`;
        const html = await templates.renderPage({ site: m.config, title: "Reader", body, page });
        await writeOutputFile(out, outputPathFor(page.pageUrls[page.number - 1]), html);
      }
      await writeOutputJson(out, "blogroll.json", feeds);
      await writeOutputJson(out, "reader.json", entries);
      logger.info("writer", "已写出 blogroll", { feeds: feeds.length, readerPages: pages.length });
    },
  };
}
