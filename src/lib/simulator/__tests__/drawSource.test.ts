import { describe, it, expect } from "vitest";
import { SeededDrawSource, drawAt, mix32 } from "../drawSource.js";

describe("SeededDrawSource", () => {
  it("produces the same sequence for the same seed", () => {
    const a = new SeededDrawSource(1337);
    const b = new SeededDrawSource(1337);
    const seqA = Array.from({ length: 50 }, () => a.next());
    const seqB = Array.from({ length: 50 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("is a pure function of (seed, draw index)", () => {
    const src = new SeededDrawSource(42);
    for (let i = 0; i < 10; i++) {
      expect(src.next()).toBe(drawAt(42, i));
    }
    expect(src.count).toBe(10);
  });

  it("returns unsigned 32-bit integers", () => {
    const src = new SeededDrawSource(7);
    for (let i = 0; i < 1000; i++) {
      const v = src.next();
      expect(Number.isInteger(v)).toBe(true);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(2 ** 32);
    }
  });

  it("uses the full 32-bit range", () => {
    const src = new SeededDrawSource(7);
    let high = 0;
    for (let i = 0; i < 1000; i++) {
      if (src.next() >= 2 ** 31) high++;
    }
    expect(high).toBeGreaterThan(400);
    expect(high).toBeLessThan(600);
  });

  it("differs between seeds", () => {
    const a = new SeededDrawSource(1);
    const b = new SeededDrawSource(2);
    const seqA = Array.from({ length: 8 }, () => a.next());
    const seqB = Array.from({ length: 8 }, () => b.next());
    expect(seqA).not.toEqual(seqB);
  });

  it("keeps the low 32 bits of wide seeds", () => {
    expect(new SeededDrawSource(2 ** 32 + 5).next()).toBe(new SeededDrawSource(5).next());
  });

  it("starts with a zero count", () => {
    expect(new SeededDrawSource(0).count).toBe(0);
  });
});

describe("mix32", () => {
  it("maps zero to zero and stays unsigned", () => {
    expect(mix32(0)).toBe(0);
    expect(mix32(-1)).toBeGreaterThanOrEqual(0);
  });
});
