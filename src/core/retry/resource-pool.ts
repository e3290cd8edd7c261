/**
 * Fixed set of interchangeable resources (DNS resolvers, endpoints) handed
 * out round-robin: the n-th call to `next()` returns `items[n % size]`.
 */
export class ResourcePool<T> {
  private readonly items: readonly T[];
  private cursor = 0;

  constructor(items: readonly T[]) {
    if (items.length === 0) {
      throw new Error("A resource pool needs at least one resource");
    }
    this.items = [...items];
  }

  get size(): number {
    return this.items.length;
  }

  next(): T {
    const item = this.items[this.cursor % this.items.length];
    this.cursor++;
    return item;
  }

  /** Starts the rotation over from the first resource. */
  reset(): void {
    this.cursor = 0;
  }
}
