import type { Comparator, TopKSelector } from "../heap.js";

/** Binary heap whose root is the item ordered first by `before`. */
class BinaryHeap<T> {
  private readonly data: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  get size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  /** Swaps the root for `item`; cheaper than pop + push. */
  replaceTop(item: T): void {
    if (this.data.length === 0) {
      this.data.push(item);
      return;
    }
    this.data[0] = item;
    this.siftDown(0);
  }

  toArray(): T[] {
    return this.data.slice();
  }

  private siftUp(i: number): void {
    const a = this.data;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(a[i]!, a[p]!)) return;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    for (;;) {
      const l = i * 2 + 1;
      const r = l + 1;
      let first = i;

      if (l < n && this.before(a[l]!, a[first]!)) first = l;
      if (r < n && this.before(a[r]!, a[first]!)) first = r;
      if (first === i) return;

      this.swap(i, first);
      i = first;
    }
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    const tmp = a[i]!;
    a[i] = a[j]!;
    a[j] = tmp;
  }
}

/**
 * Keeps a fixed-size heap of the best K items.
 *
 * "Best" follows the comparator's order, so the heap root is the *worst of
 * the best*: the item ordered last among those kept.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = new BinaryHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) heap.replaceTop(item);
    }

    return heap.toArray().sort(comparator);
  }
}
