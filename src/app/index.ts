#!/usr/bin/env node
// 命令行入口

import "dotenv/config";
import { closeDb } from "../db/index.js";
import { logger } from "../logger/index.js";
import { createProgram, describeError } from "./cli.js";


void createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error("app", describeError(err));
    process.exitCode = 1;
  })
  .finally(closeDb);
