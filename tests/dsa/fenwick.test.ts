import { describe, expect, it } from "vitest";

import { Fenwick } from "@/lib/dsa/fenwick";

describe("Fenwick", () => {
  it("answers prefix and range sums", () => {
    const fenwick = Fenwick.fromValues([1, 0, 2, 3]);

    expect(fenwick.sum(2)).toBe(3);
    expect(fenwick.rangeSum(1, 3)).toBe(5);
    expect(fenwick.rangeSum(3, 1)).toBe(0);
  });

  it("overwrites a position with set", () => {
    const fenwick = Fenwick.fromValues([1, 0, 2, 3]);
    fenwick.set(0, 5);

    expect(fenwick.get(0)).toBe(5);
    expect(fenwick.sum(3)).toBe(10);
  });

  it("ignores out-of-range updates", () => {
    const fenwick = new Fenwick(2);
    fenwick.add(5, 1);
    fenwick.add(-1, 1);

    expect(fenwick.sum(1)).toBe(0);
    expect(new Fenwick(0).rangeSum(0, 3)).toBe(0);
  });
});
