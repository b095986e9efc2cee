// 模板渲染协作者：layout、publishFeeds、blogroll 通过 TemplateRenderer 生成完整页面

import type { SiteConfig } from "../config/index.js";
import type { FeedPage } from "../types/feed.js";
import type { Item } from "../types/item.js";
import { escapeHtml } from "../utils/html.js";


export interface PageContext {
  site: SiteConfig;
  title: string;
  description?: string;
  /** 已渲染的页面主体 HTML */
  body: string;
  item?: Item;
  /** 列表页的分页信息（feed、reader） */
  page?: Pick<FeedPage<unknown>, "number" | "totalPages" | "prevUrl" | "nextUrl">;
  /** 页面可发现的 feed 地址 */
  alternates?: Array<{ type: string; href: string; title: string }>;
}


export interface TemplateRenderer {
  renderPage(ctx: PageContext): string | Promise<string>;
}


function pageTitle(ctx: PageContext): string {
  return ctx.title && ctx.title !== ctx.site.title ? `${ctx.title} | ${ctx.site.title}` : ctx.site.title;
}


function pagination(page: PageContext["page"]): string {
  if (!page || page.totalPages <= 1) return "";
  const prev = page.prevUrl ? `<a rel="prev" href="${escapeHtml(page.prevUrl)}">上一页</a>` : "";
  const next = page.nextUrl ? `<a rel="next" href="${escapeHtml(page.nextUrl)}">下一页</a>` : "";
  return `\n<nav class="pagination">${prev}<span>${page.number} / ${page.totalPages}</span>${next}</nav>`;
}


/** 默认页面外壳 */
export function renderDefaultPage(ctx: PageContext): string {
  const head = [
    "<meta charset=\"utf-8\">",
    "<meta name=\"viewport\" content=\"width=device-width, initial-scale=1\">",
    `<title>${escapeHtml(pageTitle(ctx))}</title>`,
  ];
  if (ctx.description) head.push(`<meta name="description" content="${escapeHtml(ctx.description)}">`);
  for (const alt of ctx.alternates ?? []) {
    head.push(`<link rel="alternate" type="${escapeHtml(alt.type)}" title="${escapeHtml(alt.title)}" href="${escapeHtml(alt.href)}">`);
  }
  return `<!DOCTYPE html>
<html lang="${escapeHtml(ctx.site.language)}">
<head>
${head.join("\n")}
</head>
<body>
<main>
${ctx.body}${pagination(ctx.page)}
</main>
</body>
</html>
`;
}


export const defaultTemplateRenderer: TemplateRenderer = {
  renderPage: renderDefaultPage,
};
