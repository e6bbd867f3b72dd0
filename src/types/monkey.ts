/**
 * Monkey record types.
 *
 * The flat record below is both the wire format (import/export files) and
 * the persisted form of every storage backend.
 */

/** Recognized species, stored lowercase */
export const SPECIES = ["capuchin", "macaque", "marmoset", "howler"] as const;

export type Species = (typeof SPECIES)[number];

/** Species whose age is capped below the general maximum */
export const AGE_CAPPED_SPECIES: Species = "marmoset";

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 40;
export const MAX_AGE_YEARS = 45;
export const CAPPED_MAX_AGE_YEARS = 22;

/**
 * A persisted monkey.
 */
export interface Monkey {
  /** Opaque identifier, e.g. "monkey_1a2b3c4d" */
  monkey_id: string;

  /** Trimmed display name, 2-40 characters */
  name: string;

  species: Species;

  /** Whole years, 0-45 (0-22 for marmosets) */
  age_years: number;

  favourite_fruit: string;

  /** ISO-8601 date-time, validated but stored exactly as given */
  last_checkup_at: string | null;

  /** Creation timestamp, ISO-8601 UTC with second precision */
  created_at: string;

  /** Last mutation timestamp, ISO-8601 UTC with second precision */
  updated_at: string;
}

/** Field names in wire order */
export const MONKEY_FIELDS = [
  "monkey_id",
  "name",
  "species",
  "age_years",
  "favourite_fruit",
  "last_checkup_at",
  "created_at",
  "updated_at",
] as const satisfies readonly (keyof Monkey)[];

/**
 * User-editable fields after validation.
 */
export type MonkeyFields = Omit<Monkey, "monkey_id" | "created_at" | "updated_at">;

/**
 * Input for creating a monkey. Species is matched case-insensitively.
 * Identity and timestamps are generated unless given, as on import.
 */
export interface CreateMonkeyInput {
  monkey_id?: string | undefined;
  name: string;
  species: string;
  age_years: number;
  favourite_fruit: string;
  last_checkup_at?: string | null | undefined;
  created_at?: string | undefined;
  updated_at?: string | undefined;
}

type EditableKey = Exclude<keyof CreateMonkeyInput, "monkey_id" | "created_at" | "updated_at">;

/**
 * Partial update input. Absent, null and empty values are ignored.
 */
export type UpdateMonkeyInput = {
  [K in EditableKey]?: CreateMonkeyInput[K] | null | undefined;
};

/**
 * Store-level patch. Identity and creation time cannot be patched.
 */
export type MonkeyPatch = {
  [K in keyof MonkeyFields | "updated_at"]?: Monkey[K] | null | undefined;
};

/**
 * Listing filters. Blank values are ignored.
 */
export interface MonkeyFilters {
  /** Case-insensitive substring of the name */
  name?: string | null | undefined;

  /** Case-insensitive exact species */
  species?: string | null | undefined;
}

/**
 * Check whether a string is a recognized (lowercase) species.
 */
export function isSpecies(value: string): value is Species {
  return SPECIES.some((species) => species === value);
}
