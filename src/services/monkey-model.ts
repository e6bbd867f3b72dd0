/**
 * Monkey record model.
 *
 * Validation, normalization and (de)serialization of the flat record. Model
 * values are transient: the active store owns the durable copy.
 */

import { z } from "zod";
import {
  AGE_CAPPED_SPECIES,
  CAPPED_MAX_AGE_YEARS,
  MAX_AGE_YEARS,
  NAME_MAX_LENGTH,
  NAME_MIN_LENGTH,
  SPECIES,
  isSpecies,
} from "../types/monkey.js";
import type {
  Monkey,
  MonkeyFields,
  UpdateMonkeyInput,
} from "../types/monkey.js";
import { ValidationError } from "../errors.js";
import { generateMonkeyId } from "./ids.js";

const NAME_REQUIRED = "name is required";
const NAME_LENGTH = `name must be ${NAME_MIN_LENGTH}-${NAME_MAX_LENGTH} characters`;
const SPECIES_INVALID = `species must be one of: ${SPECIES.join(", ")}`;
const AGE_INTEGER = "age_years must be an integer";
const AGE_RANGE = `age_years must be between 0 and ${MAX_AGE_YEARS}`;
const AGE_CAPPED = `${AGE_CAPPED_SPECIES} age must be <= ${CAPPED_MAX_AGE_YEARS}`;
const FRUIT_REQUIRED = "favourite_fruit is required";
const CHECKUP_INVALID = "last_checkup_at must be iso8601";

/** Fields a caller may change, in wire order */
const EDITABLE_FIELDS = [
  "name",
  "species",
  "age_years",
  "favourite_fruit",
  "last_checkup_at",
] as const;

// =============================================================================
// Timestamps
// =============================================================================

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-](\d{2}):?(\d{2}))?)?$/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = year % 4 === 0 && (year % 100 !== 0 || year % 400 === 0);
  if (month === 2 && leap) return 29;
  return DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Check that a string is an ISO-8601 date or date-time with in-range fields.
 * Accepts a trailing "Z" or a numeric UTC offset.
 */
export function isIsoDateTime(value: string): boolean {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) return false;

  const [, year, month, day, hour, minute, second, offsetHour, offsetMinute] = match.map(
    (part) => (part === undefined ? 0 : Number(part))
  );
  if (year === undefined || month === undefined || day === undefined) return false;

  if (year < 1 || month < 1 || month > 12) return false;
  if (day < 1 || day > daysInMonth(year, month)) return false;
  if ((hour ?? 0) > 23 || (minute ?? 0) > 59 || (second ?? 0) > 59) return false;
  if ((offsetHour ?? 0) > 23 || (offsetMinute ?? 0) > 59) return false;
  return true;
}

/**
 * ISO-8601 UTC timestamp with second precision, e.g. "2024-05-01T09:30:00Z".
 */
export function isoNow(now: Date = new Date()): string {
  return `${now.toISOString().slice(0, 19)}Z`;
}

/**
 * Timestamp for a mutation that never moves backwards past `previous`.
 */
export function nextTimestamp(previous: string | undefined, now: Date = new Date()): string {
  const candidate = isoNow(now);
  if (previous === undefined) return candidate;
  const previousMs = Date.parse(previous);
  if (!Number.isNaN(previousMs) && previousMs > Date.parse(candidate)) {
    return previous;
  }
  return candidate;
}

// =============================================================================
// Schemas
// =============================================================================

const nameSchema = z
  .string({ required_error: NAME_REQUIRED, invalid_type_error: NAME_REQUIRED })
  .trim()
  .min(NAME_MIN_LENGTH, { message: NAME_LENGTH })
  .max(NAME_MAX_LENGTH, { message: NAME_LENGTH });

const speciesSchema = z
  .string({ required_error: SPECIES_INVALID, invalid_type_error: SPECIES_INVALID })
  .trim()
  .toLowerCase()
  .refine(isSpecies, { message: SPECIES_INVALID });

const ageSchema = z
  .number({ required_error: AGE_INTEGER, invalid_type_error: AGE_INTEGER })
  .int({ message: AGE_INTEGER })
  .min(0, { message: AGE_RANGE })
  .max(MAX_AGE_YEARS, { message: AGE_RANGE });

const fruitSchema = z.string({
  required_error: FRUIT_REQUIRED,
  invalid_type_error: FRUIT_REQUIRED,
});

const checkupSchema = z
  .string({ invalid_type_error: CHECKUP_INVALID })
  .nullish()
  .refine((value) => !value || isIsoDateTime(value), { message: CHECKUP_INVALID })
  .transform((value) => (value ? value : null));

const fieldShape = {
  name: nameSchema,
  species: speciesSchema,
  age_years: ageSchema,
  favourite_fruit: fruitSchema,
  last_checkup_at: checkupSchema,
};

function ageCapRule(fields: { species: string; age_years: number }, ctx: z.RefinementCtx): void {
  if (fields.species === AGE_CAPPED_SPECIES && fields.age_years > CAPPED_MAX_AGE_YEARS) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["age_years"], message: AGE_CAPPED });
  }
}

const fieldsSchema = z
  .object(fieldShape, { invalid_type_error: "record must be an object" })
  .superRefine(ageCapRule);

function timestampSchema(field: string) {
  return z
    .string({ invalid_type_error: `${field} must be iso8601` })
    .refine(isIsoDateTime, { message: `${field} must be iso8601` })
    .optional();
}

/** Persisted form: identity and timestamps may be missing on hand-written data */
const storedSchema = z
  .object(
    {
      monkey_id: z
        .string({ invalid_type_error: "monkey_id must be a string" })
        .min(1, { message: "monkey_id must not be empty" })
        .optional(),
      ...fieldShape,
      created_at: timestampSchema("created_at"),
      updated_at: timestampSchema("updated_at"),
    },
    { invalid_type_error: "record must be an object" }
  )
  .superRefine(ageCapRule);

function toValidationError(error: z.ZodError): ValidationError {
  const issue = error.issues[0];
  const head = issue?.path[0];
  const field = head === undefined ? "record" : String(head);
  return new ValidationError(field, issue?.message ?? "invalid record");
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Validate and normalize user-editable fields.
 *
 * @throws ValidationError naming the first invalid field
 */
export function validateMonkeyFields(input: unknown): MonkeyFields {
  const result = fieldsSchema.safeParse(input);
  if (!result.success) throw toValidationError(result.error);
  return result.data;
}

/**
 * Build a new record from validated fields.
 */
export function createMonkey(fields: MonkeyFields, now: Date = new Date()): Monkey {
  const timestamp = isoNow(now);
  return {
    monkey_id: generateMonkeyId(),
    ...pickFields(fields),
    created_at: timestamp,
    updated_at: timestamp,
  };
}

/**
 * Rebuild a record from its serialized mapping, re-running every validator.
 * Identity and timestamps are generated when the mapping lacks them.
 */
export function parseMonkey(data: unknown): Monkey {
  const result = storedSchema.safeParse(data);
  if (!result.success) throw toValidationError(result.error);

  const stored = result.data;
  const timestamp = isoNow();
  return {
    monkey_id: stored.monkey_id ?? generateMonkeyId(),
    ...pickFields(stored),
    created_at: stored.created_at ?? timestamp,
    updated_at: stored.updated_at ?? stored.created_at ?? timestamp,
  };
}

/**
 * Merge a partial update into a fresh, fully revalidated copy.
 *
 * Absent, null and empty-string values keep the prior value. Identity and
 * `created_at` are carried over; `updated_at` is refreshed.
 */
export function applyMonkeyUpdates(
  record: Monkey,
  updates: UpdateMonkeyInput,
  now: Date = new Date()
): Monkey {
  const merged: Record<string, unknown> = pickFields(record);
  for (const key of EDITABLE_FIELDS) {
    const value = updates[key];
    if (value === undefined || value === null || value === "") continue;
    merged[key] = value;
  }

  const fields = validateMonkeyFields(merged);
  return {
    monkey_id: record.monkey_id,
    ...pickFields(fields),
    created_at: record.created_at,
    updated_at: nextTimestamp(record.updated_at, now),
  };
}

/**
 * Flat mapping in wire field order.
 */
export function serializeMonkey(record: Monkey): Monkey {
  return {
    monkey_id: record.monkey_id,
    name: record.name.trim(),
    species: record.species,
    age_years: record.age_years,
    favourite_fruit: record.favourite_fruit,
    last_checkup_at: record.last_checkup_at,
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}

function pickFields(source: MonkeyFields): MonkeyFields {
  return {
    name: source.name,
    species: source.species,
    age_years: source.age_years,
    favourite_fruit: source.favourite_fruit,
    last_checkup_at: source.last_checkup_at,
  };
}
