import { describe, it, expect } from "vitest";
import { createLogger } from "../src/logger.js";

describe("createLogger", () => {
  const capture = () => {
    const lines: string[] = [];
    return { lines, sink: (line: string) => lines.push(line) };
  };

  it("prefixes info lines with the tag", () => {
    const { lines, sink } = capture();
    createLogger("tasks", sink).info("Loaded 3 tasks");
    expect(lines).toEqual(["[tasks] Loaded 3 tasks"]);
  });

  it("marks warnings", () => {
    const { lines, sink } = capture();
    createLogger("tasks", sink).warn("Skipping record 2");
    expect(lines).toEqual(["[tasks] Warning: Skipping record 2"]);
  });

  it("appends the cause message to errors", () => {
    const { lines, sink } = capture();
    const log = createLogger("tasks", sink);
    log.error("Could not save", new Error("EACCES"));
    log.error("Could not save", "read-only");
    log.error("Could not save");
    expect(lines).toEqual([
      "[tasks] Error: Could not save: EACCES",
      "[tasks] Error: Could not save: read-only",
      "[tasks] Error: Could not save",
    ]);
  });
});
