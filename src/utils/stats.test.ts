import { max, mean, median, min, percentile, sampleStdDev } from "./stats.js";

describe("percentile", () => {
  it("interpolates linearly between order statistics", () => {
    expect(percentile([1, 2, 3, 4, 5], 95)).toBeCloseTo(4.8, 10);
  });

  it("does not depend on input order", () => {
    expect(percentile([5, 1, 4, 2, 3], 95)).toBeCloseTo(4.8, 10);
  });

  it("returns exact order statistics at whole ranks", () => {
    expect(percentile([10, 20, 30], 50)).toBe(20);
    expect(percentile([10, 20, 30], 0)).toBe(10);
    expect(percentile([10, 20, 30], 100)).toBe(30);
  });

  it("returns the only value for a single sample", () => {
    expect(percentile([2.5], 95)).toBe(2.5);
  });

  it("returns 0 for an empty sample", () => {
    expect(percentile([], 95)).toBe(0);
  });
});

describe("summary statistics", () => {
  const values = [2, 4, 4, 4, 5, 5, 7, 9];

  it("computes mean, min and max", () => {
    expect(mean(values)).toBe(5);
    expect(min(values)).toBe(2);
    expect(max(values)).toBe(9);
  });

  it("takes the middle pair average for even-length medians", () => {
    expect(median(values)).toBe(4.5);
    expect(median([3, 1, 2])).toBe(2);
  });

  it("uses the n - 1 denominator for standard deviation", () => {
    // squared deviations sum to 32; 32 / 7
    expect(sampleStdDev(values)).toBeCloseTo(Math.sqrt(32 / 7), 10);
  });

  it("reports 0 deviation below two samples", () => {
    expect(sampleStdDev([3])).toBe(0);
    expect(sampleStdDev([])).toBe(0);
  });

  it("returns 0 for every statistic of an empty sample", () => {
    expect(mean([])).toBe(0);
    expect(median([])).toBe(0);
    expect(min([])).toBe(0);
    expect(max([])).toBe(0);
  });
});
