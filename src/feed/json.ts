// JSON Feed 1.1 输出

import type { FeedChannel, FeedEntry } from "./types.js";


export interface JsonFeedItem {
  id: string;
  url: string;
  title: string;
  summary: string;
  content_html?: string;
  date_published?: string;
  date_modified?: string;
  tags?: string[];
}

export interface JsonFeed {
  version: string;
  title: string;
  home_page_url: string;
  feed_url: string;
  description?: string;
  language?: string;
  authors?: Array<{ name: string }>;
  items: JsonFeedItem[];
}


export function buildJsonFeed(channel: FeedChannel, entries: FeedEntry[]): JsonFeed {
  return {
    version: "https://jsonfeed.org/version/1.1",
    title: channel.title,
    home_page_url: channel.link,
    feed_url: channel.feedUrl,
    description: channel.description || undefined,
    language: channel.language,
    authors: channel.author ? [{ name: channel.author }] : undefined,
    items: entries.map((e) => ({
      id: e.guid ?? e.link,
      url: e.link,
      title: e.title,
      summary: e.description,
      content_html: e.contentHtml,
      date_published: e.published?.toISOString(),
      date_modified: e.updated?.toISOString(),
      tags: e.categories && e.categories.length > 0 ? e.categories : undefined,
    })),
  };
}
