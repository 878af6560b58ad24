import { describe, it, expect } from "@jest/globals";
import { computeCutoff, MS_PER_HOUR } from "../../../src/triage/cutoff";

describe("computeCutoff", () => {
  const now = 1_700_000_000_000;

  it("returns now for a zero-hour window", () => {
    expect(computeCutoff(now, 0)).toBe(now);
  });

  it("subtracts whole hours in milliseconds", () => {
    expect(computeCutoff(now, 1)).toBe(now - 3_600_000);
    expect(computeCutoff(now, 6)).toBe(now - 6 * MS_PER_HOUR);
  });

  it("moves further back as the window grows", () => {
    let previous = computeCutoff(now, 0);
    for (let hours = 1; hours <= 48; hours++) {
      const cutoff = computeCutoff(now, hours);
      expect(cutoff).toBeLessThan(previous);
      previous = cutoff;
    }
  });
});
