/**
 * Array-backed FIFO queue with O(1) amortized dequeue.
 *
 * The head index advances instead of shifting; storage is compacted once the
 * consumed prefix outgrows the live part.
 */
export class FifoQueue<T> {
  private items: T[] = [];
  private head = 0;

  constructor(initial: Iterable<T> = []) {
    for (const item of initial) this.items.push(item);
  }

  get length(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined;

    const item = this.items[this.head];
    this.head += 1;

    if (this.head > 32 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  peek(): T | undefined {
    return this.head < this.items.length ? this.items[this.head] : undefined;
  }
}
