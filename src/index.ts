// 库入口

export * from "./lifecycle/index.js";
export {
  parseFilter,
  compileFilter,
  clearFilterCache,
  matchAll,
  always,
  never,
  and,
  or,
  not,
  FilterExpression,
  FilterSyntaxError,
  tokenize,
  parseExpression,
} from "./filter/index.js";
export type { ItemPredicate, ParseFilterOptions, FilterNode, FilterValue, Token, CompareOp } from "./filter/index.js";
export { MemoryCache, readCache, readCachedJson, writeCachedJson, clearCachedNamespace, cacheKey } from "./cacher/index.js";
export type { Cache, CacheLookup, ReadCacheOptions } from "./cacher/index.js";
export { runConcurrently, fanOut, createLimiter, resolveConcurrency, withTimeout } from "./pool/index.js";
export type { PoolOptions, FanOutResult } from "./pool/index.js";
export { createItem, createSyntheticItem, slugify, hrefFor, isPublic } from "./types/item.js";
export type { Item, ItemInit, ItemLink } from "./types/item.js";
export { createFeedConfig, paginate, pageUrl, DEFAULT_FEED_FORMATS } from "./types/feed.js";
export type { Feed, FeedConfig, FeedConfigInit, FeedFormats, FeedKind, FeedPage } from "./types/feed.js";
export { loadSiteConfig, parseSiteConfig, ConfigError } from "./config/index.js";
export type { SiteConfig, SiteConfigInput } from "./config/index.js";
export { onBuildEvent } from "./events/index.js";
export type { BuildEvent } from "./events/index.js";
export { defaultPlugins, loadPlugins, loadPluginFile } from "./plugins/index.js";
export type { DefaultPluginOptions } from "./plugins/index.js";
export type { MarkdownRenderer } from "./render/markdown.js";
export type { PageContext, TemplateRenderer } from "./render/template.js";
export { createSite, runBuild } from "./app/build.js";
export type { BuildOptions, SiteOptions } from "./app/build.js";
