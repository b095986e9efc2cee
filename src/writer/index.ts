// 产物写出：href → 输出文件路径，写文件前创建目录

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, normalize, resolve, sep } from "node:path";


/** "/a/b/" → "a/b/index.html"；"/" → "index.html"；带扩展名的 href 原样使用 */
export function outputPathFor(href: string): string {
  const clean = href.replace(/^\/+/, "");
  if (clean === "") return "index.html";
  if (clean.endsWith("/")) return `${clean}index.html`;
  if (/\.[a-z0-9]+$/i.test(clean)) return clean;
  return `${clean}/index.html`;
}


/** 写入输出目录下的相对路径；拒绝跳出输出目录的路径 */
export async function writeOutputFile(outputDir: string, relPath: string, content: string): Promise<string> {
  const root = resolve(outputDir);
  const target = resolve(root, normalize(relPath));
  if (target !== root && !target.startsWith(root + sep)) {
    throw new Error(`输出路径越界: ${relPath}`);
  }
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, "utf-8");
  return target;
}


/** 写入 JSON（两空格缩进，末尾换行） */
export function writeOutputJson(outputDir: string, relPath: string, data: unknown): Promise<string> {
  return writeOutputFile(outputDir, relPath, JSON.stringify(data, null, 2) + "\n");
}


/** href 拼接到站点 URL（站点可位于子路径下）；已是绝对地址的 href 原样返回 */
export function absoluteUrl(siteUrl: string, href: string): string {
  if (/^[a-z][a-z0-9+.-]*:/i.test(href)) return href;
  const base = siteUrl.endsWith("/") ? siteUrl : `${siteUrl}/`;
  return new URL(href.replace(/^\/+/, ""), base).href;
}



/** feed 目录下文件的 href：feedFileHref("blog", "rss.xml") → "/blog/rss.xml" */
export function feedFileHref(slug: string, file: string): string {
  return slug === "" ? `/${file}` : `/${slug}/${file}`;
}
