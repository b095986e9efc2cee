import { describe, it, expect } from "vitest";
import { describeError, createProgram } from "../src/app/cli.js";
import { ConfigError } from "../src/config/index.js";
import { parseFilter } from "../src/filter/index.js";
import { StageError } from "../src/lifecycle/index.js";


describe("命令行", () => {
  it("注册 build / list / stages 命令", () => {
    const program = createProgram();
    expect(program.name()).toBe("stagepress");
    expect(program.commands.map((c) => c.name())).toEqual(["build", "list", "stages"]);
  });

  it("build 的选项", () => {
    const build = createProgram().commands.find((c) => c.name() === "build");
    expect(build?.options.map((o) => o.long)).toEqual(["--config", "--output", "--concurrency", "--until"]);
  });
});


describe("错误输出", () => {
  it("StageError 输出插件与阶段", () => {
    const err = new StageError("feeds", "collect", new Error("boom"));
    expect(describeError(err)).toBe("构建失败：插件 feeds（collect 阶段）: boom");
  });

  it("配置错误原样输出消息", () => {
    const err = new ConfigError("站点配置不合法", ["title: Expected string, received number"]);
    expect(describeError(err)).toBe("站点配置不合法\n  - title: Expected string, received number");
  });

  it("过滤表达式语法错误原样输出消息", () => {
    let caught: unknown;
    try {
      parseFilter("title ==");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(Error);
    expect(describeError(caught)).toBe(caught instanceof Error ? caught.message : "");
  });

  it("其他错误附带堆栈，非 Error 转为字符串", () => {
    const err = new Error("unexpected");
    expect(describeError(err)).toBe(err.stack);
    expect(describeError("plain")).toBe("plain");
  });
});
