import NamedEventQueue from './named-event-queue';

/**
 * A named event queue backed by an **unbounded** array. Items leave the queue in insertion order
 * and are never dropped by the queue itself.
 */
export default class ArrayBackedNamedEventQueue<T> implements NamedEventQueue<T> {
  private readonly items: T[] = [];

  constructor(public readonly name: string) {}

  get length(): number {
    return this.items.length;
  }

  push(...items: T[]): void {
    this.items.push(...items);
  }

  shift(): T | undefined {
    return this.items.shift();
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.items[Symbol.iterator]();
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }
}
