type Entry<T> = {
  priority: number;
  seq: number;
  value: T;
};

/**
 * Binary min-heap keyed on priority. Entries with equal priority come out in
 * the order they were pushed.
 */
export class PriorityQueue<T> {
  private heap: Entry<T>[] = [];
  private seq = 0;

  get size(): number {
    return this.heap.length;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  push(value: T, priority: number): void {
    this.heap.push({ priority, seq: this.seq++, value });
    this.siftUp(this.heap.length - 1);
  }

  /** The most urgent entry, or undefined when empty. */
  pop(): { value: T; priority: number } | undefined {
    const top = this.heap[0];
    if (top === undefined) return undefined;
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.siftDown(0);
    }
    return { value: top.value, priority: top.priority };
  }

  peek(): { value: T; priority: number } | undefined {
    const top = this.heap[0];
    return top && { value: top.value, priority: top.priority };
  }

  /** Values in pop order, without disturbing the heap. */
  toArray(): T[] {
    return [...this.heap].sort(compare).map((e) => e.value);
  }

  private siftUp(index: number): void {
    let i = index;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (compare(this.heap[i], this.heap[parent]) >= 0) break;
      this.swap(i, parent);
      i = parent;
    }
  }

  private siftDown(index: number): void {
    const n = this.heap.length;
    let i = index;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < n && compare(this.heap[left], this.heap[smallest]) < 0) smallest = left;
      if (right < n && compare(this.heap[right], this.heap[smallest]) < 0) smallest = right;
      if (smallest === i) return;
      this.swap(i, smallest);
      i = smallest;
    }
  }

  private swap(a: number, b: number): void {
    const tmp = this.heap[a];
    this.heap[a] = this.heap[b];
    this.heap[b] = tmp;
  }
}

function compare<T>(a: Entry<T>, b: Entry<T>): number {
  return a.priority - b.priority || a.seq - b.seq;
}
