/**
 * Registry service on every backend: validation, uniqueness and updates.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ConflictError, ValidationError, isDuplicateNameConflict } from "../../../src/errors.js";
import { MonkeyRegistry } from "../../../src/services/registry.js";
import { BACKENDS } from "../../support/fixtures.js";

describe.each(BACKENDS)("MonkeyRegistry on $name", ({ name: backend, open }) => {
  let registry: MonkeyRegistry;
  let cleanup: () => Promise<void>;

  beforeEach(() => {
    const opened = open();
    registry = new MonkeyRegistry(opened.store);
    cleanup = opened.cleanup;

    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(new Date("2024-01-01T00:00:00Z"));
  });

  afterEach(async () => {
    vi.useRealTimers();
    await cleanup();
  });

  it("exposes the store backend", () => {
    expect(registry.backend).toBe(backend);
  });

  it("keeps (name, species) unique across species-scoped lookups", async () => {
    const first = await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    expect(first.monkey_id).toMatch(/^monkey_[0-9a-f]{8}$/);

    await expect(
      registry.create({ name: "luna", species: "marmoset", age_years: 3, favourite_fruit: "banana" })
    ).rejects.toThrow(ConflictError);
    await registry.create({ name: "luna", species: "macaque", age_years: 3, favourite_fruit: "banana" });

    expect(await registry.search("marmo")).toEqual([first]);
    expect(await registry.list({ species: "marmoset" })).toEqual([first]);

    await registry.delete(first.monkey_id);
    expect(await registry.get(first.monkey_id)).toBeNull();
  });

  it("walks a record through its lifecycle", async () => {
    const luna = await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    expect(luna).toMatchObject({ name: "luna", species: "marmoset", age_years: 2, last_checkup_at: null });
    expect(luna.created_at).toBe("2024-01-01T00:00:00Z");

    await expect(
      registry.create({ name: "LUNA", species: "Marmoset", age_years: 3, favourite_fruit: "fig" })
    ).rejects.toThrow("duplicate name within species is not allowed");

    const other = await registry.create({ name: "Luna", species: "macaque", age_years: 3, favourite_fruit: "fig" });
    expect(other.species).toBe("macaque");

    vi.setSystemTime(new Date("2024-02-01T00:00:00Z"));
    const updated = await registry.update(luna.monkey_id, { age_years: 3 });
    expect(updated).toEqual({ ...luna, age_years: 3, updated_at: "2024-02-01T00:00:00Z" });

    expect((await registry.search("mar")).map((m) => m.monkey_id)).toEqual([luna.monkey_id]);
    expect(await registry.delete(luna.monkey_id)).toBe(true);
    expect(await registry.get(luna.monkey_id)).toBeNull();
  });

  it("persists nothing when validation fails", async () => {
    await expect(
      registry.create({ name: "luna", species: "marmoset", age_years: 30, favourite_fruit: "mango" })
    ).rejects.toThrow(ValidationError);
    expect(await registry.list()).toEqual([]);
  });

  it("rejects an update that collides with another record", async () => {
    await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    const nova = await registry.create({ name: "nova", species: "marmoset", age_years: 4, favourite_fruit: "kiwi" });

    const err = await registry.update(nova.monkey_id, { name: "Luna" }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConflictError);
    expect(isDuplicateNameConflict(err)).toBe(true);
    expect(await registry.get(nova.monkey_id)).toEqual(nova);
  });

  it("lets a record keep its own name", async () => {
    const luna = await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    const updated = await registry.update(luna.monkey_id, { name: "LUNA", favourite_fruit: "papaya" });
    expect(updated).toMatchObject({ name: "LUNA", favourite_fruit: "papaya" });
  });

  it("rejects an invalid update and keeps the stored record", async () => {
    const luna = await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    await expect(registry.update(luna.monkey_id, { age_years: 23 })).rejects.toThrow(
      "marmoset age must be <= 22"
    );
    expect(await registry.get(luna.monkey_id)).toEqual(luna);
  });

  it("returns null when updating an unknown id", async () => {
    expect(await registry.update("monkey_ffffffff", { age_years: 3 })).toBeNull();
  });

  it("finds records by name and species", async () => {
    const luna = await registry.create({ name: "luna", species: "marmoset", age_years: 2, favourite_fruit: "mango" });
    expect(await registry.findByNameSpecies("Luna", "MARMOSET")).toEqual(luna);
    expect(await registry.list({ species: "marmoset" })).toEqual([luna]);
  });
});
