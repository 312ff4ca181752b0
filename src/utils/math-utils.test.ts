import { describe, expect, it } from "vitest";
import {
  compareStrings,
  linearSlope,
  mean,
  median,
  roundHalfEven,
  standardDeviation,
} from "./math-utils";

describe("roundHalfEven", () => {
  it("rounds ties to the even neighbour", () => {
    expect(roundHalfEven(2.5, 0)).toBe(2);
    expect(roundHalfEven(3.5, 0)).toBe(4);
    expect(roundHalfEven(0.125, 2)).toBe(0.12);
    expect(roundHalfEven(0.135, 2)).toBe(0.14);
  });

  it("rounds non-ties to the nearest value", () => {
    expect(roundHalfEven((1 / 3) * 100)).toBe(33.33);
    expect(roundHalfEven((2 / 3) * 100)).toBe(66.67);
    expect(roundHalfEven(-66.666666)).toBe(-66.67);
  });
});

describe("statistics", () => {
  it("computes mean, median and population standard deviation", () => {
    expect(mean([2, 4, 6])).toBe(4);
    expect(mean([])).toBe(0);
    expect(median([5, 1, 3])).toBe(3);
    expect(median([4, 1, 3, 2])).toBe(2.5);
    expect(standardDeviation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it("computes the least-squares slope", () => {
    expect(linearSlope([2, 4, 6, 8, 10])).toBe(2);
    expect(linearSlope([7])).toBe(0);
  });

  it("orders strings by code unit", () => {
    expect(["beta", "Alpha", "alpha"].sort(compareStrings)).toEqual([
      "Alpha",
      "alpha",
      "beta",
    ]);
  });
});
