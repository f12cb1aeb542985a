/**
 * task_backup and task_stats tools - Manage the task file.
 */

import { errorResponse, resultToResponse, successResponse } from "@tasklist/core";
import type { ToolRegistrar } from "./types.js";

export const registerTaskBackup: ToolRegistrar = (server, { store }) => {
  server.registerTool(
    "task_backup",
    {
      title: "Back up tasks",
      description: "Copy the task file to a new timestamped backup. Returns the backup path.",
      inputSchema: {},
    },
    async () =>
      resultToResponse(store.backup(), (backupPath) => ({
        text: `Backup written to ${backupPath}`,
        data: { backupPath },
      }))
  );
};

export const registerTaskStats: ToolRegistrar = (server, { store, tasks }) => {
  server.registerTool(
    "task_stats",
    {
      title: "Task file statistics",
      description: "Show the task file's location, size and timestamps, and task counts per view.",
      inputSchema: {},
    },
    async () => {
      const stats = store.stats();
      if (!stats) {
        return errorResponse(`Task file not available: ${store.filePath}`);
      }
      const summary = tasks.summary();
      const text = [
        `File: ${store.filePath}`,
        `Size: ${stats.size} bytes`,
        `Modified: ${stats.modifiedAt.toISOString()}`,
        `Created: ${stats.createdAt.toISOString()}`,
        `Tasks: ${summary.all} (${summary.active} active, ${summary.overdue} overdue, ${summary.completed} completed)`,
      ].join("\n");
      return successResponse(text, {
        file: store.filePath,
        size: stats.size,
        modifiedAt: stats.modifiedAt.toISOString(),
        createdAt: stats.createdAt.toISOString(),
        summary,
      });
    }
  );
};
