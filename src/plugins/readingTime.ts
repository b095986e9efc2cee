// readingTime：统计字数并估算阅读时长，写入 extra

import type { TransformPlugin } from "../lifecycle/plugin.js";
import { stripMarkdown } from "../utils/html.js";


/** 每分钟阅读字数 */
export const WORDS_PER_MINUTE = 200;

const CJK = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uac00-\ud7af]/g;


/** 字数：中日韩字符逐字计数，其余按空白分词 */
export function countWords(markdown: string): number {
  const text = stripMarkdown(markdown);
  const cjk = text.match(CJK)?.length ?? 0;
  const words = text.replace(CJK, " ").match(/\S+/g)?.length ?? 0;
  return cjk + words;
}


export function readingMinutes(wordCount: number): number {
  return Math.max(1, Math.ceil(wordCount / WORDS_PER_MINUTE));
}


export function readingTimePlugin(): TransformPlugin {
  return {
    name: "readingTime",
    transform(m) {
      for (const item of m.items()) {
        if (item.skip) continue;
        const wordCount = countWords(item.content);
        const minutes = readingMinutes(wordCount);
        item.extra.wordCount = wordCount;
        item.extra.readingTime = minutes;
        item.extra.readingTimeText = `约 ${minutes} 分钟`;
      }
    },
  };
}
