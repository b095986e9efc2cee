// 将频道 + 条目构建为 RSS 2.0 / Atom 1.0 XML

import { escapeXml } from "../utils/html.js";
import type { FeedChannel, FeedEntry } from "./types.js";


function cdata(s: string): string {
  return `<![CDATA[${s.replace(/\]\]>/g, "]]]]><![CDATA[>")}]]>`;
}


function textOrCdata(s: string): string {
  return s.includes("<") || s.includes(">") ? cdata(s) : escapeXml(s);
}


/** 频道的最近更新时间：显式给出，或取条目中最新的日期 */
function latestDate(channel: FeedChannel, entries: FeedEntry[]): Date | undefined {
  if (channel.updated) return channel.updated;
  let latest: Date | undefined;
  for (const e of entries) {
    const d = e.updated ?? e.published;
    if (d && (!latest || d.getTime() > latest.getTime())) latest = d;
  }
  return latest;
}


function buildRssItem(entry: FeedEntry): string {
  const guid = entry.guid ?? entry.link;
  let buf = `    <item>\n      <title>${escapeXml(entry.title)}</title>\n      <link>${escapeXml(entry.link)}</link>\n`;
  buf += `      <description>${textOrCdata(entry.description)}</description>\n`;
  if (entry.published) buf += `      <pubDate>${entry.published.toUTCString()}</pubDate>\n`;
  for (const c of entry.categories ?? []) buf += `      <category>${escapeXml(c)}</category>\n`;
  buf += `      <guid isPermaLink="${guid === entry.link}">${escapeXml(guid)}</guid>\n`;
  buf += `    </item>\n`;
  return buf;
}


export function buildRssXml(channel: FeedChannel, entries: FeedEntry[]): string {
  const updated = latestDate(channel, entries);
  const lastBuild = updated ? `    <lastBuildDate>${updated.toUTCString()}</lastBuildDate>\n` : "";
  const items = entries.map(buildRssItem).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">
  <channel>
    <title>${escapeXml(channel.title)}</title>
    <link>${escapeXml(channel.link)}</link>
    <description>${escapeXml(channel.description ?? "")}</description>
    <language>${escapeXml(channel.language ?? "zh-CN")}</language>
    <atom:link href="${escapeXml(channel.feedUrl)}" rel="self" type="application/rss+xml"/>
${lastBuild}
${items}  </channel>
</rss>
`;
}


function buildAtomEntry(entry: FeedEntry, fallbackUpdated: Date): string {
  const id = entry.guid ?? entry.link;
  const updated = entry.updated ?? entry.published ?? fallbackUpdated;
  let buf = `  <entry>\n    <title>${escapeXml(entry.title)}</title>\n    <link href="${escapeXml(entry.link)}"/>\n`;
  buf += `    <id>${escapeXml(id)}</id>\n    <updated>${updated.toISOString()}</updated>\n`;
  if (entry.published) buf += `    <published>${entry.published.toISOString()}</published>\n`;
  for (const c of entry.categories ?? []) buf += `    <category term="${escapeXml(c)}"/>\n`;
  buf += `    <summary type="html">${escapeXml(entry.description)}</summary>\n`;
  if (entry.contentHtml) buf += `    <content type="html">${escapeXml(entry.contentHtml)}</content>\n`;
  buf += `  </entry>\n`;
  return buf;
}


/** Atom 要求 updated 必填：频道与条目都没有日期时使用 UNIX 纪元，保证输出可复现 */
export function buildAtomXml(channel: FeedChannel, entries: FeedEntry[]): string {
  const updated = latestDate(channel, entries) ?? new Date(0);
  const author = channel.author ? `  <author><name>${escapeXml(channel.author)}</name></author>\n` : "";
  const body = entries.map((e) => buildAtomEntry(e, updated)).join("");
  return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>${escapeXml(channel.title)}</title>
  <subtitle>${escapeXml(channel.description ?? "")}</subtitle>
  <link href="${escapeXml(channel.link)}"/>
  <link href="${escapeXml(channel.feedUrl)}" rel="self"/>
  <id>${escapeXml(channel.link)}</id>
  <updated>${updated.toISOString()}</updated>
${author}${body}</feed>
`;
}
