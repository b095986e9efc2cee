// redirects：write 阶段为 extra.aliases 中的每个旧地址写一个 meta refresh 跳转页

import type { WritePlugin } from "../lifecycle/plugin.js";
import { logger } from "../logger/index.js";
import { hrefFor, slugify, type Item } from "../types/item.js";
import { escapeHtml } from "../utils/html.js";
import { absoluteUrl, outputPathFor, writeOutputFile } from "../writer/index.js";


export function redirectPage(targetUrl: string): string {
  const url = escapeHtml(targetUrl);
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<title>Redirecting…</title>
<link rel="canonical" href="${url}">
<meta http-equiv="refresh" content="0; url=${url}">
</head>
<body>
<p><a href="${url}">${url}</a></p>
</body>
</html>
`;
}


/** 条目的别名 slug；load 插件已把 aliases 规范为字符串数组 */
export function aliasesOf(item: Item): string[] {
  const raw = item.extra.aliases;
  if (!Array.isArray(raw)) return [];
  return raw.filter((a): a is string => typeof a === "string").map((a) => slugify(a)).filter((a) => a !== "");
}


export function redirectsPlugin(): WritePlugin {
  return {
    name: "redirects",
    async write(m) {
      const taken = new Set(m.items().map((i) => i.slug));
      let count = 0;
      for (const item of m.items()) {
        if (item.skip || item.draft) continue;
        for (const alias of aliasesOf(item)) {
          if (taken.has(alias)) {
            logger.warn("writer", "别名与已有条目冲突，已跳过", { item: item.slug, alias });
            continue;
          }
          taken.add(alias);
          await writeOutputFile(m.config.outputDir, outputPathFor(hrefFor(alias)), redirectPage(absoluteUrl(m.config.url, item.href)));
          count++;
        }
      }
      logger.info("writer", "已写出跳转页", { count });
    },
  };
}
