// publishFeeds：write 阶段按 feed 配置的格式输出分页 HTML 列表页、RSS、Atom 与 JSON Feed

import type { SiteConfig } from "../config/index.js";
import { buildJsonFeed } from "../feed/json.js";
import { buildAtomXml, buildRssXml } from "../feed/rss.js";
import type { FeedChannel, FeedEntry } from "../feed/types.js";
import type { WritePlugin } from "../lifecycle/plugin.js";
import { logger } from "../logger/index.js";
import { defaultTemplateRenderer, type TemplateRenderer } from "../render/template.js";
import { pageUrl, type Feed, type FeedPage } from "../types/feed.js";
import type { Item } from "../types/item.js";
import { escapeHtml } from "../utils/html.js";
import { absoluteUrl, feedFileHref, outputPathFor, writeOutputFile, writeOutputJson } from "../writer/index.js";


export function toFeedEntry(item: Item, siteUrl: string): FeedEntry {
  const link = absoluteUrl(siteUrl, item.href);
  return {
    title: item.title ?? item.slug,
    link,
    description: item.description ?? "",
    contentHtml: item.articleHtml || undefined,
    guid: link,
    published: item.date,
    updated: item.modified,
    categories: item.tags.length > 0 ? item.tags : undefined,
  };
}


export function feedChannel(feed: Feed, site: SiteConfig, file: string): FeedChannel {
  return {
    title: feed.config.title,
    link: absoluteUrl(site.url, pageUrl(feed.config.slug, 1)),
    feedUrl: absoluteUrl(site.url, feedFileHref(feed.config.slug, file)),
    description: feed.config.description || site.description,
    language: site.language,
    author: site.author,
  };
}


/** 列表页主体 */
export function renderFeedPage(feed: Feed, page: FeedPage): string {
  const items = page.items.map((item) => {
    const date = item.date ? ` <time datetime="${item.date.toISOString()}">${item.date.toISOString().slice(0, 10)}</time>` : "";
    const summary = item.description ? `\n<p>${escapeHtml(item.description)}</p>` : "";
    return `<li><a href="${escapeHtml(item.href)}">${escapeHtml(item.title ?? item.slug)}</a>${date}${summary}</li>`;
  });
  const intro = feed.config.description ? `\n<p>${escapeHtml(feed.config.description)}</p>` : "";
  return `<h1>${escapeHtml(feed.config.title)}</h1>${intro}\n<ul class="feed">\n${items.join("\n")}\n</ul>`;
}


function alternatesFor(feed: Feed): Array<{ type: string; href: string; title: string }> {
  const alternates: Array<{ type: string; href: string; title: string }> = [];
  const { slug, title, formats } = feed.config;
  if (formats.rss) alternates.push({ type: "application/rss+xml", href: feedFileHref(slug, "rss.xml"), title });
  if (formats.atom) alternates.push({ type: "application/atom+xml", href: feedFileHref(slug, "atom.xml"), title });
  if (formats.json) alternates.push({ type: "application/feed+json", href: feedFileHref(slug, "feed.json"), title });
  return alternates;
}


/** 输出单个 feed，返回写出的文件数；订阅格式只包含第一页的条目 */
export async function publishFeed(feed: Feed, site: SiteConfig, templates: TemplateRenderer): Promise<number> {
  const { slug, formats } = feed.config;
  const out = site.outputDir;
  let written = 0;
  if (formats.html) {
    const alternates = alternatesFor(feed);
    for (const page of feed.pages) {
      const html = await templates.renderPage({
        site,
        title: feed.config.title,
        description: feed.config.description || undefined,
        body: renderFeedPage(feed, page),
        page,
        alternates,
      });
      await writeOutputFile(out, outputPathFor(page.pageUrls[page.number - 1]), html);
      written++;
    }
  }
  const latest = feed.pages[0]?.items ?? [];
  const entries = latest.map((item) => toFeedEntry(item, site.url));
  if (formats.rss) {
    await writeOutputFile(out, outputPathFor(feedFileHref(slug, "rss.xml")), buildRssXml(feedChannel(feed, site, "rss.xml"), entries));
    written++;
  }
  if (formats.atom) {
    await writeOutputFile(out, outputPathFor(feedFileHref(slug, "atom.xml")), buildAtomXml(feedChannel(feed, site, "atom.xml"), entries));
    written++;
  }
  if (formats.json) {
    await writeOutputJson(out, outputPathFor(feedFileHref(slug, "feed.json")), buildJsonFeed(feedChannel(feed, site, "feed.json"), entries));
    written++;
  }
  return written;
}


export function publishFeedsPlugin(templates: TemplateRenderer = defaultTemplateRenderer): WritePlugin {
  return {
    name: "publishFeeds",
    async write(m) {
      let files = 0;
      for (const feed of m.feeds()) {
        files += await publishFeed(feed, m.config, templates);
      }
      logger.info("writer", "已写出 feed", { feeds: m.feeds().length, files });
    },
  };
}
