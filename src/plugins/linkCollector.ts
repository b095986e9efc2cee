// linkCollector：render 阶段最后解析 articleHtml 中的 <a href>，填充 outlinks，并为站内目标条目登记 inlinks

import { parse } from "node-html-parser";
import type { Plugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import type { Item, ItemLink } from "../types/item.js";


const SKIPPED_SCHEMES = /^(mailto|tel|javascript|data):/i;


/** 站点 URL 的基路径，始终以 / 结尾 */
function basePath(site: URL): string {
  return site.pathname.endsWith("/") ? site.pathname : `${site.pathname}/`;
}


/**
 * 把链接解析为站内 href（/slug/ 形式）；站外链接返回 null。
 * 相对链接以源条目页面为基准。
 */
export function resolveInternalHref(href: string, from: Item, siteUrl: string): string | null {
  const site = new URL(siteUrl);
  const base = basePath(site);
  let path: string;
  try {
    const target = new URL(href, new URL(from.href.replace(/^\/+/, ""), new URL(base, site)));
    if (target.origin !== site.origin || !target.pathname.startsWith(base)) return null;
    path = decodeURIComponent(target.pathname.slice(base.length - 1));
  } catch {
    // 无法解析的 URL 或非法百分号编码
    return null;
  }
  if (/\.[a-z0-9]+$/i.test(path)) return path;
  return path.endsWith("/") ? path : `${path}/`;
}


/** 从一个条目的 articleHtml 中收集链接 */
export function collectLinks(item: Item, siteUrl: string, byHref: ReadonlyMap<string, Item>): ItemLink[] {
  if (item.articleHtml === "") return [];
  const root = parse(item.articleHtml);
  const links: ItemLink[] = [];
  for (const a of root.querySelectorAll("a[href]")) {
    const href = a.getAttribute("href")?.trim() ?? "";
    if (href === "" || href.startsWith("#") || SKIPPED_SCHEMES.test(href)) continue;
    const text = a.text.trim() || undefined;
    const internalHref = resolveInternalHref(href, item, siteUrl);
    if (internalHref === null) {
      links.push({ sourceSlug: item.slug, href, text, internal: false });
      continue;
    }
    const target = byHref.get(internalHref);
    links.push({ sourceSlug: item.slug, targetSlug: target?.slug, href, text, internal: true });
  }
  return links;
}


export function linkCollectorPlugin(): Plugin {
  return {
    name: "linkCollector",
    priority: (stage) => (stage === "render" ? PRIORITY.late + 10 : PRIORITY.default),
    render(m) {
      const items = m.items();
      const byHref = new Map(items.map((item) => [item.href, item]));
      const bySlug = new Map(items.map((item) => [item.slug, item]));
      for (const item of items) {
        item.outlinks = [];
        item.inlinks = [];
      }
      for (const item of items) {
        if (item.skip) continue;
        item.outlinks = collectLinks(item, m.config.url, byHref);
        for (const link of item.outlinks) {
          if (link.targetSlug === undefined || link.targetSlug === item.slug) continue;
          bySlug.get(link.targetSlug)?.inlinks.push(link);
        }
      }
    },
  };
}
