// 站点配置 schema：zod 校验 stagepress.json，同时给出全部默认值

import { z } from "zod";


const priorityOverridesSchema = z
  .object({
    discover: z.number().int(),
    configure: z.number().int(),
    collect: z.number().int(),
    transform: z.number().int(),
    render: z.number().int(),
    write: z.number().int(),
  })
  .partial()
  .strict();


const feedFormatsSchema = z
  .object({
    html: z.boolean(),
    rss: z.boolean(),
    atom: z.boolean(),
    json: z.boolean(),
  })
  .partial();


/** feed 配置：未给出的字段在 createFeedConfig 中取默认值 */
export const feedConfigSchema = z.object({
  slug: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  filter: z.string().optional(),
  sort: z.string().optional(),
  reverse: z.boolean().optional(),
  itemsPerPage: z.number().int().optional(),
  orphanThreshold: z.number().int().nonnegative().optional(),
  includePrivate: z.boolean().optional(),
  kind: z.enum(["blog", "series"]).optional(),
  formats: feedFormatsSchema.optional(),
});


export const externalFeedSchema = z.object({
  url: z.string().url(),
  title: z.string().optional(),
  siteUrl: z.string().optional(),
  description: z.string().optional(),
  category: z.string().optional(),
  tags: z.array(z.string()).default([]),
  active: z.boolean().default(true),
  maxEntries: z.number().int().positive().optional(),
});


export const blogrollConfigSchema = z.object({
  enabled: z.boolean().default(false),
  slug: z.string().default("blogroll"),
  readerSlug: z.string().default("reader"),
  /** 文件缓存有效期，如 "30m"、"1h" */
  cacheDuration: z.string().default("1h"),
  timeoutMs: z.number().int().positive().default(30_000),
  concurrency: z.number().int().positive().default(5),
  maxEntriesPerFeed: z.number().int().positive().default(50),
  itemsPerPage: z.number().int().positive().default(50),
  orphanThreshold: z.number().int().nonnegative().default(3),
  /** 全部外部 feed 抓取失败时让 collect 阶段失败 */
  failWhenAllFeedsFail: z.boolean().default(false),
  feeds: z.array(externalFeedSchema).default([]),
});


export const autoFeedsConfigSchema = z.object({
  tags: z.boolean().default(true),
  categories: z.boolean().default(true),
  archives: z.boolean().default(true),
  tagPrefix: z.string().default("tags"),
  categoryPrefix: z.string().default("categories"),
  archivePrefix: z.string().default("archive"),
  formats: feedFormatsSchema.optional(),
});


/** frontmatter 中 series 字段自动生成的系列 feed */
export const seriesConfigSchema = z.object({
  enabled: z.boolean().default(true),
  prefix: z.string().default("series"),
  formats: feedFormatsSchema.optional(),
});


export const pluginSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  priority: priorityOverridesSchema.optional(),
  options: z.record(z.unknown()).optional(),
});


export const siteConfigSchema = z.object({
  title: z.string().default("Untitled"),
  description: z.string().default(""),
  url: z.string().url().default("http://localhost/"),
  language: z.string().default("zh-CN"),
  author: z.string().optional(),
  contentDir: z.string().default("content"),
  outputDir: z.string().default("output"),
  extensions: z.array(z.string().startsWith(".")).default([".md"]),
  /** 并发处理的工作池大小，默认主机可用并行度 */
  concurrency: z.number().int().positive().optional(),
  /** 文件缓存目录，默认 .stagepress/cache */
  cacheDir: z.string().optional(),
  /** 构建数据库文件，默认 .stagepress/data/stagepress.db；":memory:" 为内存库 */
  dbFile: z.string().optional(),
  feedDefaults: feedConfigSchema.omit({ slug: true }).default({}),
  feeds: z.array(feedConfigSchema).default([]),
  autoFeeds: autoFeedsConfigSchema.default({}),
  blogroll: blogrollConfigSchema.default({}),
  series: seriesConfigSchema.default({}),
  plugins: z.record(pluginSettingsSchema).default({}),
});


export type SiteConfig = z.output<typeof siteConfigSchema>;

export type SiteConfigInput = z.input<typeof siteConfigSchema>;

export type FeedConfigInput = z.output<typeof feedConfigSchema>;

export type ExternalFeedConfig = z.output<typeof externalFeedSchema>;

export type BlogrollConfig = z.output<typeof blogrollConfigSchema>;

export type AutoFeedsConfig = z.output<typeof autoFeedsConfigSchema>;

export type SeriesConfig = z.output<typeof seriesConfigSchema>;

export type PluginSettings = z.output<typeof pluginSettingsSchema>;
