/**
 * Server configuration from environment variables.
 *
 * TASKLIST_FILE      path of the task file (default: tasks.json in the working directory)
 * TASKLIST_MATCH_BY  "title" (default) or "id": how deletions match tasks
 */

import { resolve } from "node:path";
import { z } from "zod";
import { Ok, Err, type Result } from "@tasklist/core";
import type { TaskIdentity } from "./core/model.js";

export interface TaskListConfig {
  filePath: string;
  identity: TaskIdentity;
}

const EnvSchema = z.object({
  TASKLIST_FILE: z.string().trim().min(1).default("tasks.json"),
  TASKLIST_MATCH_BY: z.enum(["title", "id"]).default("title"),
});

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): Result<TaskListConfig, string> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return Err(`Invalid configuration: ${issues}`);
  }
  return Ok({
    filePath: resolve(cwd, parsed.data.TASKLIST_FILE),
    identity: parsed.data.TASKLIST_MATCH_BY,
  });
}
