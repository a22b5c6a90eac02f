import { describe, it, expect } from "vitest";
import { SeededRNG } from "./seeded-rng";

describe("SeededRNG", () => {
  it("produces the Park–Miller sequence for seed 1", () => {
    const rng = new SeededRNG(1);
    // s1 = 16807, s2 = 16807^2 mod (2^31 - 1) = 282475249
    expect(rng.next()).toBeCloseTo(16806 / 2147483646, 15);
    expect(rng.next()).toBeCloseTo(282475248 / 2147483646, 15);
  });

  it("maps seed 0 onto a non-degenerate state", () => {
    const zero = new SeededRNG(0);
    const one = new SeededRNG(1);
    expect(zero.next()).toBe(one.next());
  });

  it("repeats the same draws for the same seed", () => {
    const a = new SeededRNG(42);
    const b = new SeededRNG(42);
    const drawsA = Array.from({ length: 20 }, () => a.float(0, 100));
    const drawsB = Array.from({ length: 20 }, () => b.float(0, 100));
    expect(drawsA).toEqual(drawsB);
  });

  it("keeps int draws inside the inclusive bounds", () => {
    const rng = new SeededRNG(7);
    for (let i = 0; i < 2000; i++) {
      const v = rng.int(18, 65);
      expect(v).toBeGreaterThanOrEqual(18);
      expect(v).toBeLessThanOrEqual(65);
      expect(Number.isInteger(v)).toBe(true);
    }
  });

  it("never returns a zero-weight category", () => {
    const rng = new SeededRNG(99);
    for (let i = 0; i < 500; i++) {
      expect(rng.weighted(["a", "b", "c"], [0.5, 0, 0.5])).not.toBe("b");
    }
  });

  it("samples distinct elements without replacement", () => {
    const rng = new SeededRNG(3);
    const pool = Array.from({ length: 50 }, (_, i) => i);
    const picked = rng.sample(pool, 15);
    expect(picked).toHaveLength(15);
    expect(new Set(picked).size).toBe(15);
    expect(pool).toEqual(Array.from({ length: 50 }, (_, i) => i));
  });

  it("caps the sample size at the pool length", () => {
    const rng = new SeededRNG(3);
    expect(rng.sample(["x", "y"], 5).sort()).toEqual(["x", "y"]);
    expect(rng.sample(["x", "y"], -1)).toEqual([]);
  });
});
