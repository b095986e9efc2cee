import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Parser from "rss-parser";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { parseSiteConfig } from "../src/config/index.js";
import { Manager, StageError } from "../src/lifecycle/index.js";
import {
  BLOGROLL_FEEDS_KEY,
  blogrollEntries,
  blogrollFeeds,
  blogrollPlugin,
  sortEntries,
  type ExternalFeed,
  type FeedFetcher,
} from "../src/plugins/blogroll.js";


const ALPHA = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Alpha</title>
    <link>https://a.example/</link>
    <description>Alpha blog</description>
    <item>
      <title>A1</title>
      <link>https://a.example/1</link>
      <guid>a-1</guid>
      <pubDate>Mon, 01 Jan 2024 00:00:00 GMT</pubDate>
      <description>first post</description>
    </item>
    <item>
      <title>A2</title>
      <link>https://a.example/2</link>
      <guid>a-2</guid>
      <pubDate>Wed, 03 Jan 2024 00:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

const BETA = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Beta</title>
    <link>https://b.example/</link>
    <item>
      <title>B1</title>
      <link>https://b.example/1</link>
      <pubDate>Tue, 02 Jan 2024 00:00:00 GMT</pubDate>
    </item>
  </channel>
</rss>`;

const FIXTURES: Record<string, string> = {
  "https://a.example/feed.xml": ALPHA,
  "https://b.example/feed.xml": BETA,
};

const FEEDS = [
  { url: "https://a.example/feed.xml", category: "朋友" },
  { url: "https://b.example/feed.xml", title: "B Blog" },
  { url: "https://down.example/feed.xml" },
  { url: "https://inactive.example/feed.xml", active: false },
];


/** 用本地 XML 代替网络请求 */
const localFetcher: FeedFetcher = async (url) => {
  const xml = FIXTURES[url];
  if (xml === undefined) throw new Error("connect refused");
  return new Parser().parseString(xml);
};

const failingFetcher: FeedFetcher = async () => {
  throw new Error("offline");
};


function isFeedList(value: unknown): value is ExternalFeed[] {
  return Array.isArray(value);
}


describe("blogroll 插件", () => {
  const now = new Date("2024-02-01T00:00:00Z");
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "stagepress-blogroll-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function site(fetcher: FeedFetcher, at: Date = now, blogroll: Record<string, unknown> = {}): Manager {
    const config = parseSiteConfig({
      outputDir: join(dir, "output"),
      blogroll: { enabled: true, feeds: FEEDS, ...blogroll },
    });
    return new Manager({ config, now: at }).register(blogrollPlugin({ fetcher, cacheDir: join(dir, "cache") }));
  }

  function feedsOf(m: Manager): ExternalFeed[] {
    const hit = m.cache.get(BLOGROLL_FEEDS_KEY);
    return hit.found && isFeedList(hit.value) ? hit.value : [];
  }

  it("configure 阶段注册 blogroll 与 reader 合成条目", async () => {
    const m = site(localFetcher);
    await m.runTo("configure");
    expect(m.item("blogroll")).toMatchObject({ synthetic: true, skip: true, href: "/blogroll/" });
    expect(m.item("reader")).toMatchObject({ synthetic: true, skip: true });
  });

  it("抓取启用的 feed，失败的 feed 保留记录并带上错误", async () => {
    const m = site(localFetcher);
    await m.runTo("collect");
    const feeds = feedsOf(m);
    expect(feeds.map((f) => f.title)).toEqual(["Alpha", "B Blog", "https://down.example/feed.xml"]);
    expect(feeds[0]).toMatchObject({ url: "https://a.example/feed.xml", siteUrl: "https://a.example/", category: "朋友", fromCache: false });
    expect(feeds[0].error).toBeUndefined();
    expect(feeds[2]).toMatchObject({ entries: [], error: "https://down.example/feed.xml: connect refused" });
  });

  it("外部条目按日期降序合并", async () => {
    const m = site(localFetcher);
    await m.runTo("collect");
    const entries = feedsOf(m).flatMap((f) => f.entries);
    expect(sortEntries(entries).map((e) => e.title)).toEqual(["A2", "B1", "A1"]);
    const a1 = entries.find((e) => e.id === "a-1");
    expect(a1).toMatchObject({ feedTitle: "Alpha", link: "https://a.example/1", summary: "first post", date: "2024-01-01T00:00:00.000Z" });
  });

  it("有效期内使用文件缓存，过期且抓取失败时退回旧缓存", async () => {
    await site(localFetcher).runTo("collect");

    const cached = site(failingFetcher, new Date(now.getTime() + 10 * 60 * 1000));
    await cached.runTo("collect");
    const alpha = feedsOf(cached).find((f) => f.url === "https://a.example/feed.xml");
    expect(alpha).toMatchObject({ fromCache: true, title: "Alpha" });
    expect(alpha?.error).toBeUndefined();

    const stale = site(failingFetcher, new Date(now.getTime() + 2 * 60 * 60 * 1000));
    await stale.runTo("collect");
    const staleAlpha = feedsOf(stale).find((f) => f.url === "https://a.example/feed.xml");
    expect(staleAlpha).toMatchObject({ fromCache: true, error: "https://a.example/feed.xml: offline" });
    expect(staleAlpha?.entries).toHaveLength(2);
  });

  it("单个 feed 超时只影响该 feed", async () => {
    const hanging: FeedFetcher = (url, options) =>
      url.startsWith("https://a.") ? new Promise(() => undefined) : localFetcher(url, options);
    const m = site(hanging, now, { timeoutMs: 20 });
    await m.runTo("collect");
    const feeds = feedsOf(m);
    expect(feeds.find((f) => f.url === "https://a.example/feed.xml")?.error).toBe("https://a.example/feed.xml: https://a.example/feed.xml 超时（20ms）");
    expect(feeds.find((f) => f.url === "https://b.example/feed.xml")?.entries).toHaveLength(1);
  });

  it("全部 feed 失败且开启 failWhenAllFeedsFail 时 collect 失败", async () => {
    const m = site(failingFetcher, now, { failWhenAllFeedsFail: true });
    await expect(m.runTo("collect")).rejects.toBeInstanceOf(StageError);
  });

  it("写出 blogroll 页、reader 页与 JSON", async () => {
    const m = site(localFetcher, now, { itemsPerPage: 2, orphanThreshold: 0 });
    await m.run();
    const out = join(dir, "output");
    const reader = JSON.parse(await readFile(join(out, "reader.json"), "utf-8"));
    expect(reader.map((e: { title: string }) => e.title)).toEqual(["A2", "B1", "A1"]);
    const blogroll = await readFile(join(out, "blogroll", "index.html"), "utf-8");
    expect(blogroll).toContain("<h2>朋友</h2>");
    expect(blogroll).toContain("<a href=\"https://a.example/\">Alpha</a>");
    const page2 = await readFile(join(out, "reader", "page", "2", "index.html"), "utf-8");
    expect(page2).toContain("<a href=\"https://a.example/1\">A1</a>");
    await expect(readFile(join(out, "blogroll.json"), "utf-8")).resolves.toContain("\"url\": \"https://b.example/feed.xml\"");
  });

  it("抓取结果存放在 Manager 缓存中，reset 后清空并可重新抓取", async () => {
    const m = site(localFetcher);
    await m.runTo("collect");
    expect(blogrollFeeds(m)).toHaveLength(3);
    expect(blogrollEntries(m).map((e) => e.title)).toEqual(["A2", "B1", "A1"]);
    m.reset();
    expect(blogrollFeeds(m)).toEqual([]);
    expect(blogrollEntries(m)).toEqual([]);
    await m.runTo("collect");
    expect(blogrollFeeds(m)).toHaveLength(3);
  });

  it("未启用时不做任何事", async () => {
    const m = new Manager().register(blogrollPlugin({ fetcher: failingFetcher, cacheDir: join(dir, "cache") }));
    await m.runTo("collect");
    expect(m.items()).toEqual([]);
    expect(m.cache.has(BLOGROLL_FEEDS_KEY)).toBe(false);
  });
});
