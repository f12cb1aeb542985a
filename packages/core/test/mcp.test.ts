import { describe, it, expect } from "vitest";
import { errorResponse, successResponse, resultToResponse } from "../src/mcp.js";
import { Ok, Err, type Result } from "../src/result.js";

describe("MCP utilities", () => {
  describe("errorResponse", () => {
    it("creates an error response with message", () => {
      expect(errorResponse("Task not found: 7")).toEqual({
        content: [{ type: "text", text: "Error: Task not found: 7" }],
        structuredContent: { success: false, error: "Task not found: 7" },
        isError: true,
      });
    });
  });

  describe("successResponse", () => {
    it("creates a success response with text only", () => {
      expect(successResponse("Saved")).toEqual({
        content: [{ type: "text", text: "Saved" }],
        structuredContent: { success: true },
      });
    });

    it("merges structured data", () => {
      expect(successResponse("Found 2 tasks", { total: 2 })).toEqual({
        content: [{ type: "text", text: "Found 2 tasks" }],
        structuredContent: { total: 2, success: true },
      });
    });

    it("does not mark the response as an error", () => {
      expect(successResponse("ok").isError).toBeUndefined();
    });
  });

  describe("resultToResponse", () => {
    const format = (n: number) => ({ text: `Value: ${n}`, data: { value: n } });

    it("formats an Ok result", () => {
      const result: Result<number, string> = Ok(42);
      expect(resultToResponse(result, format)).toEqual({
        content: [{ type: "text", text: "Value: 42" }],
        structuredContent: { value: 42, success: true },
      });
    });

    it("turns a string error into an error response", () => {
      const result: Result<number, string> = Err("Title is required");
      expect(resultToResponse(result, format)).toEqual(errorResponse("Title is required"));
    });

    it("uses the message of an Error", () => {
      const result: Result<number, Error> = Err(new Error("disk full"));
      expect(resultToResponse(result, format).content[0].text).toBe("Error: disk full");
    });
  });
});
