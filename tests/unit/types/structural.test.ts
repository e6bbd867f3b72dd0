/**
 * Structural tests for type exports and constants.
 */

import { describe, it, expect } from "vitest";
import {
  AGE_CAPPED_SPECIES,
  CAPPED_MAX_AGE_YEARS,
  MAX_AGE_YEARS,
  MONKEY_FIELDS,
  NAME_MAX_LENGTH,
  NAME_MIN_LENGTH,
  SPECIES,
  isSpecies,
} from "../../../src/types/index.js";
import type { Monkey, MonkeyPatch } from "../../../src/types/index.js";

describe("species", () => {
  it("lists the four supported species", () => {
    expect(SPECIES).toEqual(["capuchin", "macaque", "marmoset", "howler"]);
  });

  it("has no duplicates", () => {
    expect(new Set(SPECIES).size).toBe(SPECIES.length);
  });

  it("caps a species that is in the list", () => {
    expect(SPECIES).toContain(AGE_CAPPED_SPECIES);
  });

  it("recognizes lowercase names only", () => {
    expect(isSpecies("howler")).toBe(true);
    expect(isSpecies("Howler")).toBe(false);
    expect(isSpecies("gorilla")).toBe(false);
  });
});

describe("limits", () => {
  it("keeps the capped age within the general range", () => {
    expect(CAPPED_MAX_AGE_YEARS).toBeLessThan(MAX_AGE_YEARS);
  });

  it("has a sensible name length window", () => {
    expect(NAME_MIN_LENGTH).toBe(2);
    expect(NAME_MAX_LENGTH).toBe(40);
  });
});

describe("record shape", () => {
  it("lists every record field once, identity first", () => {
    expect(MONKEY_FIELDS[0]).toBe("monkey_id");
    expect(new Set(MONKEY_FIELDS).size).toBe(8);
  });

  it("compiles a full record and a partial patch", () => {
    const record: Monkey = {
      monkey_id: "monkey_00000000",
      name: "luna",
      species: "marmoset",
      age_years: 2,
      favourite_fruit: "mango",
      last_checkup_at: null,
      created_at: "2024-01-01T00:00:00Z",
      updated_at: "2024-01-01T00:00:00Z",
    };
    const patch: MonkeyPatch = { age_years: 3, name: null };
    expect(Object.keys(record)).toEqual([...MONKEY_FIELDS]);
    expect(patch.age_years).toBe(3);
  });
});
