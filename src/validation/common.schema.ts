// ============================================================================
// COMMON VALIDATION SCHEMAS
// Reusable schema components
// ============================================================================

import { z } from "zod";
import { isCalendarDate } from "../utils/dates.js";

// ----------------------------------------------------------------------------
// PRIMITIVE SCHEMAS
// ----------------------------------------------------------------------------

export const dateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be in YYYY-MM-DD format")
  .refine(isCalendarDate, "Date does not exist in the calendar");

export const languageSchema = z.enum(["de", "en"]);

/** Language code expected by CapCorn: 0 = German, 1 = English */
export const capcornLanguageSchema = z.union([z.literal(0), z.literal(1)]);

// ----------------------------------------------------------------------------
// PARTY
// ----------------------------------------------------------------------------

export const MAX_CHILDREN_PER_ROOM = 8;
export const MAX_ROOMS_PER_SEARCH = 10;

export const childSchema = z.object({
  age: z.number().int().min(1).max(17),
});

export const childrenSchema = z
  .array(childSchema)
  .max(MAX_CHILDREN_PER_ROOM, `Maximum ${MAX_CHILDREN_PER_ROOM} children per room`)
  .default([]);

export const roomPartySchema = z.object({
  adults: z.number().int().min(1),
  children: childrenSchema,
});
