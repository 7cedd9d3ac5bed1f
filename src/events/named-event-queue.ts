/** A FIFO queue of pending items that can be named. */
export default interface NamedEventQueue<T> {
  readonly length: number;

  readonly name: string;

  /** Add element(s) to the end of the queue */
  push(...items: T[]): void;

  /** Removes and returns the element at the head of the queue, if any */
  shift(): T | undefined;

  [Symbol.iterator](): IterableIterator<T>;

  /** Returns true if the queue is empty */
  isEmpty(): boolean;
}
