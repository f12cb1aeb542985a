import { describe, it, expect } from "vitest";
import * as core from "../src/index.js";

describe("package entry", () => {
  it("exposes runServer as the only server lifecycle entry point", () => {
    expect(typeof core.runServer).toBe("function");
    expect(Object.keys(core).filter((name) => /server/i.test(name)).sort()).toEqual(["McpServer", "runServer"]);
  });
});
