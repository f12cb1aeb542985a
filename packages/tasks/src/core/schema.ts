/**
 * Zod schemas for the task file.
 * Reading is lenient: only a string title is required. Other fields of the
 * wrong type are coerced so the record survives the next save.
 */

import { z } from "zod";

export const StoredRecordSchema = z.object({
  id: z.unknown().transform((id) => (typeof id === "number" && Number.isInteger(id) ? id : null)),
  title: z.string(),
  description: z.unknown().transform((text) => (typeof text === "string" ? text : "")),
  deadline: z.unknown().transform((value) => (typeof value === "string" ? value : null)),
  completed: z.unknown().transform((flag) => Boolean(flag)),
  created_date: z.unknown().transform((value) => (typeof value === "string" ? value : undefined)),
});

/**
 * A record as read from disk, before the manager fills in a missing creation time.
 */
export type StoredRecord = z.output<typeof StoredRecordSchema>;
