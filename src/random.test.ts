import { describe, expect, it } from "vitest";
import { SeededRandom } from "./random";

function take(random: SeededRandom, n: number): number[] {
  return Array.from({ length: n }, () => random.next());
}

describe("SeededRandom", () => {
  it("repeats the same sequence for the same seed", () => {
    expect(take(new SeededRandom(42), 10)).toEqual(
      take(new SeededRandom(42), 10)
    );
  });

  it("gives a different sequence for a different seed", () => {
    expect(take(new SeededRandom(1), 10)).not.toEqual(
      take(new SeededRandom(2), 10)
    );
  });

  it("stays within [0, 1)", () => {
    for (const value of take(new SeededRandom(7), 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("keeps nextInt within [0, max)", () => {
    const random = new SeededRandom(-5);
    for (let i = 0; i < 1000; i++) {
      const value = random.nextInt(3);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(3);
    }
  });

  it("does not share state between instances", () => {
    const a = new SeededRandom(42);
    const b = new SeededRandom(42);
    a.next();
    a.next();
    expect(b.next()).toBe(new SeededRandom(42).next());
  });
});
