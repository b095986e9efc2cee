// publishHtml：write 阶段把条目页面写到输出目录

import type { WritePlugin } from "../lifecycle/plugin.js";
import { logger } from "../logger/index.js";
import { outputPathFor, writeOutputFile } from "../writer/index.js";


export function publishHtmlPlugin(): WritePlugin {
  return {
    name: "publishHtml",
    async write(m) {
      const targets = m.items().filter((item) => !item.skip && !item.draft);
      await m.runConcurrently(async (item) => {
        await writeOutputFile(m.config.outputDir, outputPathFor(item.href), item.html);
      }, targets);
      logger.info("writer", "已写出条目页面", { count: targets.length, outputDir: m.config.outputDir });
    },
  };
}
