// manifest：write 阶段最后把本次构建与条目内容哈希写入构建数据库，报告新增与变更

import { createHash } from "node:crypto";
import type Database from "better-sqlite3";
import { finishBuild, getDb, openDatabase, recordItems, startBuild, type ItemDiff, type ItemRecord } from "../db/index.js";
import type { Plugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import { errorMessage, logger } from "../logger/index.js";
import type { Item } from "../types/item.js";


export const MANIFEST_DIFF_KEY = "manifest.diff";


/** 条目内容哈希：输出页面优先，未渲染时取原始正文 */
export function itemHash(item: Item): string {
  return createHash("sha256").update(item.html || item.content).digest("hex");
}


export function itemRecords(items: readonly Item[]): ItemRecord[] {
  return items.filter((item) => !item.skip).map((item) => ({ slug: item.slug, href: item.href, hash: itemHash(item) }));
}


/** 登记一次构建并写入条目哈希；写入失败时构建标记为 failed 后抛出 */
export function recordBuild(db: Database.Database, items: readonly Item[], startedAt: Date): ItemDiff {
  const buildId = startBuild(db, startedAt);
  const records = itemRecords(items);
  let diff: ItemDiff;
  try {
    diff = recordItems(db, records, startedAt);
  } catch (err) {
    finishBuild(db, buildId, { status: "failed", itemCount: records.length, error: errorMessage(err) });
    throw err;
  }
  finishBuild(db, buildId, { status: "success", itemCount: records.length });
  logger.info("db", "构建记录已写入", { buildId, added: diff.added.length, changed: diff.changed.length, unchanged: diff.unchanged });
  return diff;
}


export interface ManifestOptions {
  /** 自定义数据库（测试传入 openDatabase(":memory:")） */
  db?: Database.Database;
}


export function manifestPlugin(options: ManifestOptions = {}): Plugin {
  return {
    name: "manifest",
    priority: (stage) => (stage === "write" ? PRIORITY.last : PRIORITY.default),
    async write(m) {
      const owned = !options.db && m.config.dbFile ? openDatabase(m.config.dbFile) : undefined;
      const db = options.db ?? owned ?? (await getDb());
      try {
        const diff = recordBuild(db, m.items(), m.now);
        m.cache.set(MANIFEST_DIFF_KEY, diff);
      } finally {
        owned?.close();
      }
    },
  };
}
