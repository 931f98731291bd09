interface HeapEntry<T> {
  item: T;
  priority: number;
  // insertion counter, keeps equal priorities in FIFO order
  seq: number;
}

/**
 * Binary min-heap keyed by a numeric priority.
 *
 * `put` never updates an existing entry: inserting the same item twice leaves
 * two entries behind. Callers that want decrease-key keep their own cost table
 * and skip stale entries when they come out.
 */
export class PriorityQueue<T> {
  private heap: HeapEntry<T>[] = [];
  private counter = 0;

  put(item: T, priority: number): void {
    this.heap.push({ item, priority, seq: this.counter++ });
    this.bubbleUp(this.heap.length - 1);
  }

  /**
   * Remove and return the item with the lowest priority, or undefined when empty
   */
  pop(): T | undefined {
    const root = this.heap[0];
    if (root === undefined) return undefined;

    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return root.item;
  }

  peekPriority(): number | undefined {
    return this.heap[0]?.priority;
  }

  empty(): boolean {
    return this.heap.length === 0;
  }

  get length(): number {
    return this.heap.length;
  }

  private less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.seq < b.seq);
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.less(this.heap[index], this.heap[parentIndex])) break;

      [this.heap[parentIndex], this.heap[index]] = [this.heap[index], this.heap[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    const size = this.heap.length;
    while (true) {
      const left = 2 * index + 1;
      const right = left + 1;
      let smallest = index;

      if (left < size && this.less(this.heap[left], this.heap[smallest])) {
        smallest = left;
      }
      if (right < size && this.less(this.heap[right], this.heap[smallest])) {
        smallest = right;
      }
      if (smallest === index) break;

      [this.heap[smallest], this.heap[index]] = [this.heap[index], this.heap[smallest]];
      index = smallest;
    }
  }
}
