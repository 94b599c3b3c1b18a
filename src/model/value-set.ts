/**
 * Insertion-ordered set of value objects, deduplicated by `equals` rather
 * than by reference.
 */

export interface ValueObject<T> {
  equals(other: T): boolean;
  hashCode(): number;
}

export class ValueSet<T extends ValueObject<T>> implements Iterable<T> {
  private items: T[] = [];
  private buckets: Map<number, T[]> = new Map();

  constructor(items: Iterable<T> = []) {
    for (const item of items) {
      this.add(item);
    }
  }

  get size(): number {
    return this.items.length;
  }

  has(item: T): boolean {
    return this.find(item) !== undefined;
  }

  /** The stored element equal to `item`, if any. */
  find(item: T): T | undefined {
    const bucket = this.buckets.get(item.hashCode());
    return bucket?.find((candidate) => candidate.equals(item));
  }

  /** Returns whether the set changed. */
  add(item: T): boolean {
    const hash = item.hashCode();
    const bucket = this.buckets.get(hash);
    if (bucket === undefined) {
      this.buckets.set(hash, [item]);
    } else if (bucket.some((candidate) => candidate.equals(item))) {
      return false;
    } else {
      bucket.push(item);
    }
    this.items.push(item);
    return true;
  }

  /** Returns whether the set changed. */
  delete(item: T): boolean {
    const hash = item.hashCode();
    const bucket = this.buckets.get(hash);
    const inBucket = bucket?.findIndex((candidate) => candidate.equals(item)) ?? -1;
    if (bucket === undefined || inBucket < 0) {
      return false;
    }
    bucket.splice(inBucket, 1);
    if (bucket.length === 0) {
      this.buckets.delete(hash);
    }
    this.items.splice(
      this.items.findIndex((candidate) => candidate.equals(item)),
      1
    );
    return true;
  }

  clear(): void {
    this.items = [];
    this.buckets = new Map();
  }

  /** Same elements, in any order. */
  sameElements(other: Iterable<T>): boolean {
    const otherItems = [...other];
    return otherItems.length === this.items.length && otherItems.every((item) => this.has(item));
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
