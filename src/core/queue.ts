/**
 * FIFO queue with O(1) amortized enqueue and dequeue.
 *
 * Backs both breadth-first traversals; their visiting order (and so the
 * tie-broken ladder) follows from the strict FIFO order kept here.
 *
 * @example
 * ```typescript
 * const queue = Queue.from(['cat', 'cot']);
 * queue.enqueue('cog');
 * queue.dequeue(); // 'cat'
 * ```
 */
export class Queue<T> {
  private items: T[] = [];
  private head = 0;

  get length(): number {
    return this.items.length - this.head;
  }

  get isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined when empty.
   */
  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;

    const item = this.items[this.head];
    this.head++;

    // Drop the consumed prefix once it dominates the backing array
    if (this.head > 1024 && this.head > this.items.length / 2) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  static from<T>(items: Iterable<T>): Queue<T> {
    const queue = new Queue<T>();
    for (const item of items) {
      queue.enqueue(item);
    }
    return queue;
  }
}
