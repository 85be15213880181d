/**
 * Bounded FIFO with many producers and one consumer.
 * `push` waits while the queue is full, `pop` waits while it is empty.
 */

interface Waiter<T> {
  resolve: (value: T) => void;
}

export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly consumers: Waiter<T>[] = [];
  private readonly producers: Array<Waiter<void>> = [];
  private discarding = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  async push(item: T): Promise<void> {
    if (this.discarding) return;

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer.resolve(item);
      return;
    }
    while (this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.producers.push({ resolve }));
      if (this.discarding) return;
    }
    this.items.push(item);
  }

  async pop(): Promise<T> {
    if (this.items.length > 0) {
      const item = this.items[0];
      this.items.shift();
      this.producers.shift()?.resolve();
      return item;
    }
    return new Promise<T>((resolve) => this.consumers.push({ resolve }));
  }

  /**
   * Stop accepting items: the buffer is dropped and every waiting or future
   * producer returns immediately
   */
  discard(): void {
    this.discarding = true;
    this.items.length = 0;
    for (const producer of this.producers.splice(0)) {
      producer.resolve();
    }
  }

  get isDiscarding(): boolean {
    return this.discarding;
  }
}
