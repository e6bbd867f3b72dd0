/**
 * Storage Base
 *
 * Helpers shared by every backend: the persisted record shape, patch
 * application and the filter/search predicates that define the contract.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { isSpecies } from "../types/monkey.js";
import type { Monkey, MonkeyFilters, MonkeyPatch } from "../types/monkey.js";
import { nextTimestamp } from "../services/monkey-model.js";

/** Default file locations, relative to the working directory */
export const DEFAULT_JSON_PATH = path.join("data", "monkeys.json");
export const DEFAULT_SQLITE_PATH = path.join("data", "monkeys.db");

/**
 * Structural shape of a stored record. Business rules (age caps, name
 * length) are the model's concern and are not re-checked on read. A
 * hand-written record without `updated_at` takes its creation time.
 */
export const storedMonkeySchema = z
  .object({
    monkey_id: z.string().min(1),
    name: z.string(),
    species: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .refine(isSpecies),
    age_years: z.number(),
    favourite_fruit: z.string().default(""),
    last_checkup_at: z
      .string()
      .nullish()
      .transform((value) => value ?? null),
    created_at: z.string(),
    updated_at: z.string().optional(),
  })
  .transform(({ updated_at, ...record }) => ({
    ...record,
    updated_at: updated_at ?? record.created_at,
  }));

/**
 * Decode one stored record, or null when it lacks the record shape.
 */
export function decodeStoredMonkey(value: unknown): Monkey | null {
  const result = storedMonkeySchema.safeParse(value);
  return result.success ? result.data : null;
}

/**
 * Check for a Node.js filesystem error with a code.
 */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Ensure a file and its parent directories exist, seeding it when absent.
 */
export function ensureFile(filePath: string, initialContent: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  try {
    fs.writeFileSync(filePath, initialContent, { encoding: "utf-8", flag: "wx" });
  } catch (err) {
    if (isErrnoException(err) && err.code === "EEXIST") return;
    throw err;
  }
}

/**
 * Trimmed, lowercased search term; empty for null/undefined.
 */
export function normalizeTerm(value: string | null | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

/**
 * Apply list filters to one record.
 */
export function matchesFilters(record: Monkey, filters: MonkeyFilters = {}): boolean {
  const name = normalizeTerm(filters.name);
  const species = normalizeTerm(filters.species);
  if (name && !record.name.toLowerCase().includes(name)) return false;
  if (species && record.species.toLowerCase() !== species) return false;
  return true;
}

/**
 * Search predicate over name and species. The query must already be normalized.
 */
export function matchesQuery(record: Monkey, query: string): boolean {
  if (!query) return false;
  return record.name.toLowerCase().includes(query) || record.species.toLowerCase().includes(query);
}

/**
 * Exact case-insensitive (name, species) match.
 */
export function matchesNameSpecies(record: Monkey, name: string, species: string): boolean {
  return (
    normalizeTerm(record.name) === normalizeTerm(name) &&
    normalizeTerm(record.species) === normalizeTerm(species)
  );
}

/**
 * Overwrite stored fields with non-null patch values.
 */
export function applyPatch(existing: Monkey, patch: MonkeyPatch, now: Date = new Date()): Monkey {
  return {
    monkey_id: existing.monkey_id,
    name: patch.name ?? existing.name,
    species: patch.species ?? existing.species,
    age_years: patch.age_years ?? existing.age_years,
    favourite_fruit: patch.favourite_fruit ?? existing.favourite_fruit,
    last_checkup_at: patch.last_checkup_at ?? existing.last_checkup_at,
    created_at: existing.created_at,
    updated_at: patch.updated_at ?? nextTimestamp(existing.updated_at, now),
  };
}
