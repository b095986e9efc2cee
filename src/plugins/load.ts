// load：读取源文件、解析 frontmatter，每个文件创建一个条目（按路径排序追加，保证顺序可复现）

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { Manager } from "../lifecycle/manager.js";
import type { DiscoverPlugin } from "../lifecycle/plugin.js";
import { logger } from "../logger/index.js";
import { runConcurrently } from "../pool/index.js";
import { createItem, slugify, type Item } from "../types/item.js";
import { parseDate } from "../utils/date.js";
import { parseFrontmatter, type FrontmatterValue } from "../utils/frontmatter.js";
import { globbedFiles } from "./glob.js";


/** 直接映射到条目属性的 frontmatter 键，其余进入 extra */
const RESERVED_KEYS = new Set([
  "slug",
  "title",
  "description",
  "tags",
  "category",
  "date",
  "modified",
  "updated",
  "published",
  "draft",
  "private",
  "skip",
]);


function asString(v: FrontmatterValue | undefined): string | undefined {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return undefined;
}


function asBool(v: FrontmatterValue | undefined, fallback: boolean): boolean {
  return typeof v === "boolean" ? v : fallback;
}


function asList(v: FrontmatterValue | undefined): string[] {
  if (Array.isArray(v)) return v.filter((s) => s.length > 0);
  if (typeof v === "string") return v.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  return [];
}


function asDate(v: FrontmatterValue | undefined, path: string, key: string): Date | undefined {
  const s = asString(v);
  if (s === undefined) return undefined;
  const d = parseDate(s);
  if (d === undefined) {
    logger.warn("plugin", "日期无法解析，已忽略", { path, key, value: s });
    return undefined;
  }
  return d;
}


/** 由相对路径推导 slug：去扩展名，index 文件取所在目录 */
export function slugFromPath(path: string): string {
  const withoutExt = path.replace(/\.[^/.]+$/, "");
  const trimmed = withoutExt.replace(/(^|\/)index$/, "");
  return slugify(trimmed);
}


/** 由源文件内容构建条目 */
export function buildItem(path: string, raw: string): Item {
  const { data, body } = parseFrontmatter(raw);
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (!RESERVED_KEYS.has(key)) extra[key] = value;
  }
  if ("aliases" in extra) extra.aliases = asList(data.aliases);
  const explicitSlug = asString(data.slug);
  return createItem({
    slug: explicitSlug !== undefined ? slugify(explicitSlug) : slugFromPath(path),
    path,
    title: asString(data.title),
    description: asString(data.description),
    content: body,
    tags: asList(data.tags),
    category: asString(data.category),
    date: asDate(data.date, path, "date"),
    modified: asDate(data.modified ?? data.updated, path, "modified"),
    published: asBool(data.published, true),
    draft: asBool(data.draft, false),
    private: asBool(data.private, false),
    skip: asBool(data.skip, false),
    extra,
  });
}


export function loadPlugin(): DiscoverPlugin {
  return {
    name: "load",
    async discover(m: Manager) {
      const root = resolve(m.config.contentDir);
      const files = globbedFiles(m);
      const loaded: Item[] = new Array(files.length);
      await runConcurrently(
        files,
        async (path, index) => {
          const raw = await readFile(join(root, path), "utf-8");
          loaded[index] = buildItem(path, raw);
        },
        { concurrency: m.concurrency },
      );
      const seen = new Map<string, string>();
      for (const item of loaded) {
        const prev = seen.get(item.slug);
        if (prev) throw new Error(`slug 冲突: "${item.slug}" 同时来自 ${prev} 与 ${item.path}`);
        seen.set(item.slug, item.path);
        m.appendItem(item);
      }
      logger.info("plugin", "已加载条目", { count: loaded.length });
    },
  };
}
