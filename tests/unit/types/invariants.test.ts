/**
 * Property-based tests for model invariants.
 *
 * Ordered from least obvious to most obvious invariants.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { ValidationError } from "../../../src/errors.js";
import { MAX_AGE_YEARS, SPECIES } from "../../../src/types/index.js";
import {
  applyMonkeyUpdates,
  createMonkey,
  nextTimestamp,
  parseMonkey,
  serializeMonkey,
  validateMonkeyFields,
} from "../../../src/services/monkey-model.js";
import { applyPatch, matchesFilters, matchesNameSpecies } from "../../../src/storage/base.js";
import { arbMonkeyFields, arbName, arbSpecies, arbTimestamp, maxAgeFor } from "./generators.js";

const NOW = new Date("2024-06-01T00:00:00Z");

// =============================================================================
// 1. ALGEBRAIC INVARIANTS (Least Obvious)
// =============================================================================

describe("Algebraic Invariants", () => {
  it("validation is idempotent", () => {
    fc.assert(
      fc.property(arbMonkeyFields, (fields) => {
        const once = validateMonkeyFields(fields);
        expect(validateMonkeyFields(once)).toEqual(once);
      })
    );
  });

  it("parse after serialize is the identity", () => {
    fc.assert(
      fc.property(arbMonkeyFields, (fields) => {
        const record = createMonkey(fields, NOW);
        expect(parseMonkey(serializeMonkey(record))).toEqual(record);
      })
    );
  });

  it("an empty patch only moves updated_at", () => {
    fc.assert(
      fc.property(arbMonkeyFields, arbTimestamp, (fields, stamp) => {
        const record = createMonkey(fields, NOW);
        expect(applyPatch(record, { updated_at: stamp })).toEqual({ ...record, updated_at: stamp });
      })
    );
  });
});

// =============================================================================
// 2. TEMPORAL INVARIANTS
// =============================================================================

describe("Temporal Invariants", () => {
  it("nextTimestamp is never earlier than either input", () => {
    fc.assert(
      fc.property(arbTimestamp, arbTimestamp, (previous, now) => {
        const next = Date.parse(nextTimestamp(previous, new Date(now)));
        expect(next).toBeGreaterThanOrEqual(Date.parse(previous));
        expect(next).toBeGreaterThanOrEqual(Date.parse(now));
      })
    );
  });

  it("updates keep identity and creation time", () => {
    fc.assert(
      fc.property(arbMonkeyFields, arbName, arbTimestamp, (fields, name, later) => {
        const record = createMonkey(fields, NOW);
        const updated = applyMonkeyUpdates(record, { name }, new Date(later));
        expect(updated.monkey_id).toBe(record.monkey_id);
        expect(updated.created_at).toBe(record.created_at);
        expect(Date.parse(updated.updated_at)).toBeGreaterThanOrEqual(Date.parse(record.updated_at));
      })
    );
  });
});

// =============================================================================
// 3. RANGE INVARIANTS
// =============================================================================

describe("Range Invariants", () => {
  it("accepts every age within the species limit", () => {
    fc.assert(
      fc.property(
        arbSpecies.chain((species) =>
          fc.tuple(fc.constant(species), fc.integer({ min: 0, max: maxAgeFor(species) }))
        ),
        ([species, age]) => {
          const fields = validateMonkeyFields({ name: "luna", species, age_years: age, favourite_fruit: "fig" });
          expect(fields.age_years).toBe(age);
        }
      )
    );
  });

  it("rejects every age above the species limit", () => {
    fc.assert(
      fc.property(
        arbSpecies.chain((species) =>
          fc.tuple(fc.constant(species), fc.integer({ min: maxAgeFor(species) + 1, max: 500 }))
        ),
        ([species, age]) => {
          expect(() =>
            validateMonkeyFields({ name: "luna", species, age_years: age, favourite_fruit: "fig" })
          ).toThrow(ValidationError);
        }
      )
    );
  });

  it("rejects every negative age", () => {
    fc.assert(
      fc.property(arbSpecies, fc.integer({ min: -500, max: -1 }), (species, age) => {
        expect(() =>
          validateMonkeyFields({ name: "luna", species, age_years: age, favourite_fruit: "fig" })
        ).toThrow("age_years must be between 0 and 45");
      })
    );
  });

  it("never lets the general limit exceed 45", () => {
    for (const species of SPECIES) {
      expect(maxAgeFor(species)).toBeLessThanOrEqual(MAX_AGE_YEARS);
    }
  });
});

// =============================================================================
// 4. MATCHING INVARIANTS (Most Obvious)
// =============================================================================

describe("Matching Invariants", () => {
  it("name and species matching ignores case and padding", () => {
    fc.assert(
      fc.property(arbMonkeyFields, (fields) => {
        const record = createMonkey(fields, NOW);
        expect(matchesNameSpecies(record, ` ${fields.name.toUpperCase()} `, fields.species.toUpperCase())).toBe(
          true
        );
      })
    );
  });

  it("every record matches empty filters and its own species", () => {
    fc.assert(
      fc.property(arbMonkeyFields, (fields) => {
        const record = createMonkey(fields, NOW);
        expect(matchesFilters(record, {})).toBe(true);
        expect(matchesFilters(record, { name: "  ", species: "" })).toBe(true);
        expect(matchesFilters(record, { species: fields.species.toUpperCase() })).toBe(true);
      })
    );
  });
});
