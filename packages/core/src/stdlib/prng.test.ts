import { describe, it, expect } from "vitest";
import { SeededRng, createRng } from "./prng.js";

// ─── Tests ─────────────────────────────────────────────────────────

describe("prng", () => {
  it("createRng returns a SeededRng", () => {
    expect(createRng(7)).toBeInstanceOf(SeededRng);
  });

  describe("determinism", () => {
    it("produces the same sequence for the same seed", () => {
      const first = createRng(12345);
      const second = createRng(12345);

      const a = Array.from({ length: 50 }, () => first.next());
      const b = Array.from({ length: 50 }, () => second.next());

      expect(a).toEqual(b);
    });

    it("produces different sequences for different seeds", () => {
      const first = createRng(1);
      const second = createRng(2);

      const a = Array.from({ length: 20 }, () => first.next());
      const b = Array.from({ length: 20 }, () => second.next());

      expect(a).not.toEqual(b);
    });
  });

  describe("next", () => {
    it("returns values in [0, 1)", () => {
      const rng = createRng(42);
      for (let i = 0; i < 5_000; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe("pick", () => {
    it("reaches every item", () => {
      const rng = createRng(3);
      const seen = new Set<string>();
      for (let i = 0; i < 1_000; i++) {
        const item = rng.pick(["a", "b", "c", "d"]);
        if (item !== undefined) seen.add(item);
      }
      expect([...seen].sort()).toEqual(["a", "b", "c", "d"]);
    });

    it("returns the only item", () => {
      expect(createRng(9).pick([42])).toBe(42);
    });

    it("returns undefined for no items", () => {
      expect(createRng(1).pick([])).toBeUndefined();
    });
  });
});
