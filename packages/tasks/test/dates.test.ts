import { describe, it, expect } from "vitest";
import {
  parseIsoDate,
  parseDeadlineInput,
  formatIsoDate,
  formatCreatedDate,
  formatBackupStamp,
  formatDeadline,
} from "../src/core/dates.js";

describe("dates", () => {
  describe("parseIsoDate", () => {
    it("accepts a valid calendar date", () => {
      expect(parseIsoDate("2024-03-15")).toBe("2024-03-15");
      expect(parseIsoDate("2024-02-29")).toBe("2024-02-29");
    });

    it("rejects impossible dates", () => {
      expect(parseIsoDate("2023-02-29")).toBeNull();
      expect(parseIsoDate("2024-13-01")).toBeNull();
      expect(parseIsoDate("2024-04-31")).toBeNull();
    });

    it("rejects other formats", () => {
      expect(parseIsoDate("15.03.2024")).toBeNull();
      expect(parseIsoDate("2024-3-15")).toBeNull();
      expect(parseIsoDate("tomorrow")).toBeNull();
      expect(parseIsoDate("")).toBeNull();
    });
  });

  describe("parseDeadlineInput", () => {
    it("treats blank text as no deadline", () => {
      expect(parseDeadlineInput("")).toEqual({ ok: true, value: null });
      expect(parseDeadlineInput("   ")).toEqual({ ok: true, value: null });
      expect(parseDeadlineInput(null)).toEqual({ ok: true, value: null });
      expect(parseDeadlineInput(undefined)).toEqual({ ok: true, value: null });
    });

    it("parses DD.MM.YYYY", () => {
      expect(parseDeadlineInput("15.03.2024")).toEqual({ ok: true, value: "2024-03-15" });
      expect(parseDeadlineInput(" 1.4.2024 ")).toEqual({ ok: true, value: "2024-04-01" });
    });

    it("parses YYYY-MM-DD", () => {
      expect(parseDeadlineInput("2024-03-15")).toEqual({ ok: true, value: "2024-03-15" });
    });

    it("reports malformed text", () => {
      expect(parseDeadlineInput("31.02.2024")).toEqual({
        ok: false,
        error: 'Invalid date "31.02.2024". Use DD.MM.YYYY',
      });
      expect(parseDeadlineInput("next week")).toEqual({
        ok: false,
        error: 'Invalid date "next week". Use DD.MM.YYYY',
      });
    });
  });

  describe("formatting", () => {
    const moment = new Date(2024, 2, 5, 9, 7, 3);

    it("formats the local calendar date", () => {
      expect(formatIsoDate(moment)).toBe("2024-03-05");
    });

    it("formats the creation timestamp to the minute", () => {
      expect(formatCreatedDate(moment)).toBe("2024-03-05 09:07");
    });

    it("formats a backup stamp", () => {
      expect(formatBackupStamp(moment)).toBe("20240305_090703");
    });

    it("formats deadlines for display", () => {
      expect(formatDeadline("2024-03-05")).toBe("05.03.2024");
      expect(formatDeadline(null)).toBe("Not set");
    });
  });
});
