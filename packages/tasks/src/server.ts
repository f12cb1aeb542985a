#!/usr/bin/env node
/**
 * Task list MCP server.
 * Reads configuration from the environment and serves the task tools over stdio.
 */

import { createLogger, runServer } from "@tasklist/core";
import { loadConfig } from "./config.js";
import { createContext, type TaskListContext } from "./context.js";
import { registerTaskTools } from "./tools/registerTools.js";

const log = createLogger("tasks");

runServer<TaskListContext>({
  config: {
    name: "tasklist:tasks",
    version: "0.1.0",
  },
  createServices: () => {
    const config = loadConfig();
    if (!config.ok) {
      throw new Error(config.error);
    }
    log.info(`Using ${config.value.filePath} (match by ${config.value.identity})`);
    return createContext(config.value, { logger: log });
  },
  registerTools: registerTaskTools,
  onStartup: ({ tasks }) => {
    const report = tasks.load();
    if (report.message) {
      log.warn(report.message);
    }
  },
});
