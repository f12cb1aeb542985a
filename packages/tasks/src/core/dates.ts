/**
 * Calendar-date helpers.
 * Deadlines are held as YYYY-MM-DD strings, which compare correctly as text.
 */

import { Ok, Err, type Result } from "@tasklist/core";

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DOTTED_DATE_RE = /^(\d{1,2})\.(\d{1,2})\.(\d{4})$/;

const pad = (n: number, width = 2): string => String(n).padStart(width, "0");

function toIsoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1) return null;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) return null;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse a stored YYYY-MM-DD deadline. Returns null for anything malformed.
 */
export function parseIsoDate(text: string): string | null {
  const m = ISO_DATE_RE.exec(text.trim());
  if (!m) return null;
  return toIsoDate(Number(m[1]), Number(m[2]), Number(m[3]));
}

/**
 * Parse deadline text typed by a user.
 * Accepts DD.MM.YYYY or YYYY-MM-DD; blank means no deadline.
 */
export function parseDeadlineInput(text: string | null | undefined): Result<string | null, string> {
  const trimmed = (text ?? "").trim();
  if (trimmed === "") return Ok(null);

  const dotted = DOTTED_DATE_RE.exec(trimmed);
  const iso = dotted
    ? toIsoDate(Number(dotted[3]), Number(dotted[2]), Number(dotted[1]))
    : parseIsoDate(trimmed);

  if (iso === null) {
    return Err(`Invalid date "${trimmed}". Use DD.MM.YYYY`);
  }
  return Ok(iso);
}

/** Local calendar date of `d` as YYYY-MM-DD */
export function formatIsoDate(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

/** Local time of `d` as "YYYY-MM-DD HH:mm" */
export function formatCreatedDate(d: Date): string {
  return `${formatIsoDate(d)} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/** Local time of `d` as YYYYMMDD_HHMMSS, safe for file names */
export function formatBackupStamp(d: Date): string {
  const date = `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}`;
  const time = `${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`;
  return `${date}_${time}`;
}

/**
 * Deadline for display: DD.MM.YYYY, or "Not set".
 */
export function formatDeadline(deadline: string | null): string {
  if (deadline === null) return "Not set";
  const m = ISO_DATE_RE.exec(deadline);
  if (!m) return deadline;
  return `${m[3]}.${m[2]}.${m[1]}`;
}
