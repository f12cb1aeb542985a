import { describe, it, expect } from "vitest";
import { Ok, Err, map, mapErr, andThen, unwrapOr, tryCatch, type Result } from "../src/result.js";

describe("Result", () => {
  const okNum = (n: number): Result<number, string> => Ok(n);
  const errNum = (e: string): Result<number, string> => Err(e);

  describe("Ok / Err", () => {
    it("creates a successful result", () => {
      const result: Result<number, string> = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it("creates an error result", () => {
      const result: Result<number, string> = Err("failed");
      expect(result).toEqual({ ok: false, error: "failed" });
    });
  });

  describe("map", () => {
    it("transforms the value of an Ok", () => {
      const result = map(okNum(2), (n) => n * 10);
      expect(result).toEqual({ ok: true, value: 20 });
    });

    it("leaves an Err untouched", () => {
      const result = map(errNum("nope"), (n) => n * 10);
      expect(result).toEqual({ ok: false, error: "nope" });
    });
  });

  describe("mapErr", () => {
    it("transforms the error of an Err", () => {
      const failed: Result<void, Error> = Err(new Error("disk full"));
      const result = mapErr(failed, (e) => e.message);
      expect(result).toEqual({ ok: false, error: "disk full" });
    });

    it("leaves an Ok untouched", () => {
      const fine: Result<string, Error> = Ok("fine");
      const result = mapErr(fine, (e) => e.message);
      expect(result).toEqual({ ok: true, value: "fine" });
    });
  });

  describe("andThen", () => {
    const half = (n: number): Result<number, string> =>
      n % 2 === 0 ? Ok(n / 2) : Err(`${n} is odd`);

    it("chains successful steps", () => {
      expect(andThen(okNum(8), half)).toEqual({ ok: true, value: 4 });
    });

    it("stops at the first failure", () => {
      expect(andThen(okNum(3), half)).toEqual({ ok: false, error: "3 is odd" });
    });

    it("does not call the function for an Err", () => {
      let called = false;
      andThen(errNum("early"), (n) => {
        called = true;
        return Ok(n);
      });
      expect(called).toBe(false);
    });
  });

  describe("unwrapOr", () => {
    it("returns the value of an Ok", () => {
      expect(unwrapOr(okNum(5), 0)).toBe(5);
    });

    it("returns the default for an Err", () => {
      expect(unwrapOr(errNum("x"), 0)).toBe(0);
    });
  });

  describe("tryCatch", () => {
    it("wraps a returned value", () => {
      expect(tryCatch((): unknown => JSON.parse("[1]"))).toEqual({ ok: true, value: [1] });
    });

    it("captures a thrown Error", () => {
      const result = tryCatch((): unknown => JSON.parse("{"));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(SyntaxError);
      }
    });

    it("wraps non-Error throwables", () => {
      const result = tryCatch(() => {
        throw "plain string";
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(Error);
        expect(result.error.message).toBe("plain string");
      }
    });
  });
});
