// 命令行定义：build / list / stages

import { Command, InvalidArgumentError, Option } from "commander";
import { ConfigError } from "../config/errors.js";
import { FilterSyntaxError } from "../filter/errors.js";
import { StageError } from "../lifecycle/errors.js";
import { STAGES, isStage, type Stage } from "../lifecycle/stages.js";
import { errorMessage } from "../logger/index.js";
import { createSite, runBuild } from "./build.js";


interface BuildCommandOptions {
  config?: string;
  output?: string;
  concurrency?: number;
  until?: string;
}

interface ListCommandOptions {
  config?: string;
  filter?: string;
  includePrivate?: boolean;
}


function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError("需要正整数");
  return n;
}


function parseStage(value: string | undefined): Stage | undefined {
  if (value === undefined) return undefined;
  if (!isStage(value)) throw new InvalidArgumentError(`未知阶段: ${value}`);
  return value;
}


/** 已知错误输出一行说明；其余错误附带堆栈 */
export function describeError(err: unknown): string {
  if (err instanceof StageError) return `构建失败：插件 ${err.plugin}（${err.stage} 阶段）: ${errorMessage(err.cause)}`;
  if (err instanceof ConfigError || err instanceof FilterSyntaxError) return err.message;
  return err instanceof Error && err.stack ? err.stack : errorMessage(err);
}


export function createProgram(): Command {
  const program = new Command();
  program.name("stagepress").description("分阶段、插件驱动的静态站点构建器").version("0.1.0");

  program
    .command("build")
    .description("运行全部阶段并写出站点")
    .option("-c, --config <path>", "站点配置文件")
    .option("-o, --output <dir>", "输出目录")
    .option("--concurrency <n>", "并发数", parsePositiveInt)
    .addOption(new Option("--until <stage>", "运行到该阶段为止").choices([...STAGES]))
    .action(async (options: BuildCommandOptions) => {
      await runBuild({
        configPath: options.config,
        outputDir: options.output,
        concurrency: options.concurrency,
        until: parseStage(options.until),
      });
    });

  program
    .command("list")
    .description("运行到 collect 阶段，列出命中过滤表达式的条目 slug")
    .option("-c, --config <path>", "站点配置文件")
    .option("-f, --filter <expr>", "过滤表达式", "")
    .option("--include-private", "包含私有、草稿与未发布条目", false)
    .action(async (options: ListCommandOptions) => {
      const manager = await createSite({ configPath: options.config });
      await manager.runTo("collect");
      for (const item of manager.filter(options.filter ?? "", { includePrivate: options.includePrivate })) {
        console.log(item.slug);
      }
    });

  program
    .command("stages")
    .description("列出阶段顺序与每个阶段的插件执行顺序")
    .option("-c, --config <path>", "站点配置文件")
    .action(async (options: { config?: string }) => {
      const manager = await createSite({ configPath: options.config });
      for (const stage of STAGES) {
        const names = manager.pluginOrder(stage).map((p) => `${p.name}(${manager.priorityFor(p, stage)})`);
        console.log(`${stage}: ${names.join(", ")}`);
      }
    });

  return program;
}

