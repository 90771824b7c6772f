/**
 * Longest runs of set (1) and clear (0) positions, per segment tree node.
 */
export interface RunNode {
  len: number;
  prefSet: number;
  sufSet: number;
  bestSet: number;
  prefClear: number;
  sufClear: number;
  bestClear: number;
}

const EMPTY_NODE: RunNode = {
  len: 0,
  prefSet: 0,
  sufSet: 0,
  bestSet: 0,
  prefClear: 0,
  sufClear: 0,
  bestClear: 0,
};

function emptyNode(): RunNode {
  return { ...EMPTY_NODE };
}

function makeLeaf(bit: 0 | 1): RunNode {
  const clear = bit === 0 ? 1 : 0;
  return {
    len: 1,
    prefSet: bit,
    sufSet: bit,
    bestSet: bit,
    prefClear: clear,
    sufClear: clear,
    bestClear: clear,
  };
}

export function mergeRunNodes(left: RunNode, right: RunNode): RunNode {
  if (left.len === 0) return { ...right };
  if (right.len === 0) return { ...left };

  return {
    len: left.len + right.len,
    prefSet: left.prefSet === left.len ? left.len + right.prefSet : left.prefSet,
    sufSet: right.sufSet === right.len ? right.len + left.sufSet : right.sufSet,
    bestSet: Math.max(left.bestSet, right.bestSet, left.sufSet + right.prefSet),
    prefClear: left.prefClear === left.len ? left.len + right.prefClear : left.prefClear,
    sufClear: right.sufClear === right.len ? right.len + left.sufClear : right.sufClear,
    bestClear: Math.max(left.bestClear, right.bestClear, left.sufClear + right.prefClear),
  };
}

function nextPowerOfTwo(value: number): number {
  let next = 1;
  while (next < value) next <<= 1;
  return next;
}

function toBit(value: boolean | number): 0 | 1 {
  return value === true || (typeof value === "number" && value > 0) ? 1 : 0;
}

export class SegStreak {
  private readonly n: number;

  private readonly size: number;

  private readonly tree: RunNode[];

  private readonly data: Array<0 | 1>;

  constructor(values: ReadonlyArray<boolean | number>) {
    this.data = values.map(toBit);
    this.n = this.data.length;
    this.size = nextPowerOfTwo(Math.max(1, this.n));
    this.tree = Array.from({ length: this.size * 2 }, () => emptyNode());
    for (let index = 0; index < this.n; index += 1) {
      this.tree[this.size + index] = makeLeaf(this.data[index]);
    }
    for (let index = this.size - 1; index >= 1; index -= 1) {
      this.tree[index] = mergeRunNodes(this.tree[index * 2], this.tree[index * 2 + 1]);
    }
  }

  get length(): number {
    return this.n;
  }

  update(pos: number, value: boolean | number): void {
    const index = Math.floor(pos);
    if (index < 0 || index >= this.n) return;

    const bit = toBit(value);
    if (this.data[index] === bit) return;

    this.data[index] = bit;
    let treeIndex = this.size + index;
    this.tree[treeIndex] = makeLeaf(bit);
    treeIndex >>= 1;

    while (treeIndex >= 1) {
      this.tree[treeIndex] = mergeRunNodes(this.tree[treeIndex * 2], this.tree[treeIndex * 2 + 1]);
      treeIndex >>= 1;
    }
  }

  query(l: number, r: number): RunNode {
    if (this.n === 0) return emptyNode();

    const left = Math.max(0, Math.min(Math.floor(l), this.n - 1));
    const right = Math.max(0, Math.min(Math.floor(r), this.n - 1));
    if (left > right) return emptyNode();

    let queryLeft = left + this.size;
    let queryRight = right + this.size;
    let leftResult = emptyNode();
    let rightResult = emptyNode();

    while (queryLeft <= queryRight) {
      if (queryLeft & 1) {
        leftResult = mergeRunNodes(leftResult, this.tree[queryLeft]);
        queryLeft += 1;
      }
      if (!(queryRight & 1)) {
        rightResult = mergeRunNodes(this.tree[queryRight], rightResult);
        queryRight -= 1;
      }
      queryLeft >>= 1;
      queryRight >>= 1;
    }

    return mergeRunNodes(leftResult, rightResult);
  }
}
