/** Fixed-size binary indexed tree over integer counts. */
export class Fenwick {
  private readonly n: number;

  private readonly tree: number[];

  private readonly data: number[];

  constructor(n: number) {
    this.n = Math.max(0, Math.floor(n));
    this.tree = new Array<number>(this.n + 1).fill(0);
    this.data = new Array<number>(this.n).fill(0);
  }

  static fromValues(values: readonly number[]): Fenwick {
    const fenwick = new Fenwick(values.length);
    values.forEach((value, idx) => fenwick.add(idx, value));
    return fenwick;
  }

  get size() {
    return this.n;
  }

  get(i: number): number {
    return this.data[i] ?? 0;
  }

  add(i: number, delta: number) {
    const idx = Math.floor(i);
    if (idx < 0 || idx >= this.n || delta === 0) return;
    this.data[idx] += delta;

    let bitIndex = idx + 1;
    while (bitIndex <= this.n) {
      this.tree[bitIndex] += delta;
      bitIndex += bitIndex & -bitIndex;
    }
  }

  set(i: number, value: number) {
    const idx = Math.floor(i);
    if (idx < 0 || idx >= this.n) return;
    this.add(idx, value - this.data[idx]);
  }

  /** Sum of positions 0..i inclusive. */
  sum(i: number): number {
    if (this.n === 0) return 0;
    const idx = Math.min(Math.floor(i), this.n - 1);
    if (idx < 0) return 0;

    let total = 0;
    let bitIndex = idx + 1;
    while (bitIndex > 0) {
      total += this.tree[bitIndex];
      bitIndex -= bitIndex & -bitIndex;
    }
    return total;
  }

  rangeSum(l: number, r: number): number {
    if (this.n === 0) return 0;
    const left = Math.max(0, Math.min(Math.floor(l), this.n - 1));
    const right = Math.max(0, Math.min(Math.floor(r), this.n - 1));
    if (left > right) return 0;
    return this.sum(right) - this.sum(left - 1);
  }
}
