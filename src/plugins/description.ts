// description：transform 阶段为没有摘要的条目从正文生成纯文本摘要

import type { TransformPlugin } from "../lifecycle/plugin.js";
import { stripMarkdown, truncate } from "../utils/html.js";


export const DESCRIPTION_MAX_LENGTH = 160;


export function descriptionPlugin(maxLength = DESCRIPTION_MAX_LENGTH): TransformPlugin {
  return {
    name: "description",
    transform(m) {
      for (const item of m.items()) {
        if (item.skip || item.description) continue;
        const text = stripMarkdown(item.content);
        if (text !== "") item.description = truncate(text, maxLength);
      }
    },
  };
}
