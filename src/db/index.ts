// 构建数据库：管理 SQLite 连接、schema 初始化，记录构建历史、条目哈希与日志

import Database from "better-sqlite3";
import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { DATA_DIR } from "../config/paths.js";
import type { LogEntry } from "../logger/types.js";


let _db: Database.Database | null = null;


/** 获取（或初始化）全局数据库单例，数据库位于 .stagepress/data/stagepress.db */
export async function getDb(): Promise<Database.Database> {
  if (_db) return _db;
  await mkdir(DATA_DIR, { recursive: true });
  _db = openDatabase(join(DATA_DIR, "stagepress.db"));
  return _db;
}


/** 打开指定文件的数据库并建表；传入 ":memory:" 得到内存库 */
export function openDatabase(file: string): Database.Database {
  const db = new Database(file);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  initSchema(db);
  return db;
}


/** 关闭全局单例（CLI 退出前调用） */
export function closeDb(): void {
  _db?.close();
  _db = null;
}


/** 建表：builds 构建历史、items 条目哈希、logs 日志 */
function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS builds (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at  TEXT NOT NULL,
      finished_at TEXT,
      item_count  INTEGER NOT NULL DEFAULT 0,
      status      TEXT NOT NULL,
      error       TEXT
    );
    CREATE TABLE IF NOT EXISTS items (
      slug        TEXT PRIMARY KEY,
      href        TEXT NOT NULL,
      hash        TEXT NOT NULL,
      updated_at  TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS logs (
      id          INTEGER PRIMARY KEY AUTOINCREMENT,
      level       TEXT NOT NULL,
      category    TEXT NOT NULL,
      message     TEXT NOT NULL,
      payload     TEXT,
      created_at  TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_logs_created ON logs(created_at);
    CREATE INDEX IF NOT EXISTS idx_logs_level   ON logs(level);
  `);
}


export type BuildStatus = "running" | "success" | "failed";

export interface BuildRow {
  id: number;
  started_at: string;
  finished_at: string | null;
  item_count: number;
  status: BuildStatus;
  error: string | null;
}


/** 登记一次构建，返回构建 ID */
export function startBuild(db: Database.Database, startedAt: Date = new Date()): number {
  const info = db
    .prepare("INSERT INTO builds (started_at, status) VALUES (?, 'running')")
    .run(startedAt.toISOString());
  return Number(info.lastInsertRowid);
}


/** 结束构建：写入状态、条目数与错误信息 */
export function finishBuild(
  db: Database.Database,
  id: number,
  result: { status: Exclude<BuildStatus, "running">; itemCount: number; error?: string },
): void {
  db.prepare(`
    UPDATE builds
    SET finished_at = @finishedAt, status = @status, item_count = @itemCount, error = @error
    WHERE id = @id
  `).run({
    id,
    finishedAt: new Date().toISOString(),
    status: result.status,
    itemCount: result.itemCount,
    error: result.error ?? null,
  });
}


/** 最近的构建记录，新的在前 */
export function listBuilds(db: Database.Database, limit = 10): BuildRow[] {
  return db
    .prepare<[number], BuildRow>("SELECT * FROM builds ORDER BY id DESC LIMIT ?")
    .all(limit);
}


export interface ItemRecord {
  slug: string;
  href: string;
  hash: string;
}

export interface ItemDiff {
  added: string[];
  changed: string[];
  unchanged: number;
}


/** 批量写入条目哈希，与上次构建对比得出新增与变更的 slug */
export function recordItems(db: Database.Database, records: ItemRecord[], now: Date = new Date()): ItemDiff {
  const select = db.prepare<[string], { hash: string }>("SELECT hash FROM items WHERE slug = ?");
  const upsert = db.prepare(`
    INSERT INTO items (slug, href, hash, updated_at)
    VALUES (@slug, @href, @hash, @updatedAt)
    ON CONFLICT(slug) DO UPDATE SET href = excluded.href, hash = excluded.hash, updated_at = excluded.updated_at
    WHERE items.hash <> excluded.hash OR items.href <> excluded.href
  `);
  const diff: ItemDiff = { added: [], changed: [], unchanged: 0 };
  const updatedAt = now.toISOString();
  const run = db.transaction((rows: ItemRecord[]) => {
    for (const row of rows) {
      const prev = select.get(row.slug);
      if (!prev) diff.added.push(row.slug);
      else if (prev.hash !== row.hash) diff.changed.push(row.slug);
      else diff.unchanged++;
      upsert.run({ ...row, updatedAt });
    }
  });
  run(records);
  return diff;
}


/** 写入一条日志（供 logger 落库） */
export async function insertLog(entry: LogEntry): Promise<void> {
  const db = await getDb();
  db.prepare(`
    INSERT INTO logs (level, category, message, payload, created_at)
    VALUES (@level, @category, @message, @payload, @createdAt)
  `).run({
    level: entry.level,
    category: entry.category,
    message: entry.message,
    payload: entry.payload ? JSON.stringify(entry.payload) : null,
    createdAt: entry.created_at,
  });
}


export interface LogRow {
  id: number;
  level: string;
  category: string;
  message: string;
  payload: string | null;
  created_at: string;
}


/** 查询最近日志，可按级别与分类过滤 */
export function queryLogs(db: Database.Database, opts: { level?: string; category?: string; limit?: number } = {}): LogRow[] {
  const where: string[] = [];
  const params: Record<string, string | number> = { limit: opts.limit ?? 100 };
  if (opts.level) {
    where.push("level = @level");
    params.level = opts.level;
  }
  if (opts.category) {
    where.push("category = @category");
    params.category = opts.category;
  }
  const clause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
  return db
    .prepare<Record<string, string | number>, LogRow>(`SELECT * FROM logs ${clause} ORDER BY id DESC LIMIT @limit`)
    .all(params);
}
