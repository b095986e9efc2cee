// sitemap 插件：write 阶段输出 sitemap.xml，列出全部可公开的条目页面
// 放在 plugins/ 或 .stagepress/plugins/ 下即被自动加载

import type { Plugin } from "../src/lifecycle/plugin.js";
import { PRIORITY } from "../src/lifecycle/stages.js";
import { isListable } from "../src/lifecycle/manager.js";
import type { Item } from "../src/types/item.js";
import { escapeXml } from "../src/utils/html.js";
import { absoluteUrl, writeOutputFile } from "../src/writer/index.js";


export function buildSitemap(siteUrl: string, items: readonly Item[]): string {
  const urls = items
    .filter((item) => isListable(item))
    .map((item) => {
      const lastmod = item.modified ?? item.date;
      const mod = lastmod ? `\n    <lastmod>${lastmod.toISOString().slice(0, 10)}</lastmod>` : "";
      return `  <url>\n    <loc>${escapeXml(absoluteUrl(siteUrl, item.href))}</loc>${mod}\n  </url>`;
    });
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
${urls.join("\n")}
</urlset>
`;
}


const sitemap: Plugin = {
  name: "sitemap",
  priority: (stage) => (stage === "write" ? PRIORITY.late : PRIORITY.default),
  async write(m) {
    await writeOutputFile(m.config.outputDir, "sitemap.xml", buildSitemap(m.config.url, m.items()));
  },
};

export default sitemap;
