// layout：render 阶段（markdown 之后）把 articleHtml 套进页面模板，得到完整 html

import type { Manager } from "../lifecycle/manager.js";
import type { Plugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import { defaultTemplateRenderer, type TemplateRenderer } from "../render/template.js";
import type { Item } from "../types/item.js";
import { escapeHtml } from "../utils/html.js";
import { feedFileHref } from "../writer/index.js";


function seriesNav(item: Item): string {
  if (!item.prev && !item.next) return "";
  const prev = item.prev ? `<a rel="prev" href="${escapeHtml(item.prev.href)}">${escapeHtml(item.prev.title ?? item.prev.slug)}</a>` : "";
  const next = item.next ? `<a rel="next" href="${escapeHtml(item.next.href)}">${escapeHtml(item.next.title ?? item.next.slug)}</a>` : "";
  return `\n<nav class="series">${prev}${next}</nav>`;
}


/** 条目页主体：标题、日期、标签、正文 */
export function renderArticle(item: Item): string {
  const title = `<h1>${escapeHtml(item.title ?? item.slug)}</h1>`;
  const date = item.date ? `\n<time datetime="${item.date.toISOString()}">${item.date.toISOString().slice(0, 10)}</time>` : "";
  const tags = item.tags.length > 0 ? `\n<ul class="tags">${item.tags.map((t) => `<li>${escapeHtml(t)}</li>`).join("")}</ul>` : "";
  return `<article>\n${title}${date}${tags}\n${item.articleHtml}\n</article>${seriesNav(item)}`;
}


/** 站点级 feed（配置文件中声明且输出 RSS 的）作为页面的 alternate 链接 */
function siteAlternates(m: Manager): Array<{ type: string; href: string; title: string }> {
  const configured = new Set(m.config.feeds.map((f) => f.slug));
  return m
    .feeds()
    .filter((f) => configured.has(f.config.slug) && f.config.formats.rss)
    .map((f) => ({ type: "application/rss+xml", href: feedFileHref(f.config.slug, "rss.xml"), title: f.config.title }));
}


export function layoutPlugin(templates: TemplateRenderer = defaultTemplateRenderer): Plugin {
  return {
    name: "layout",
    priority: (stage) => (stage === "render" ? PRIORITY.late : PRIORITY.default),
    render(m) {
      const alternates = siteAlternates(m);
      const targets = m.items().filter((item) => !item.skip);
      return m.runConcurrently(async (item) => {
        item.html = await templates.renderPage({
          site: m.config,
          title: item.title ?? item.slug,
          description: item.description,
          body: renderArticle(item),
          item,
          alternates,
        });
      }, targets);
    },
  };
}
