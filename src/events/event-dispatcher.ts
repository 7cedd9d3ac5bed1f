export default interface EventDispatcher {
  /** Enqueues a payload for eventual delivery to the destination. Never throws. */
  schedule(destination: string, payload: string): void;
  /** Allows delivery again and immediately flushes anything queued while disabled. */
  enable(): void;
  /** Stops delivery; queued and newly scheduled items are kept until {@link enable} is called. */
  disable(): void;
  /**
   * Delivers everything currently queued. The returned promise resolves once the drain has
   * finished or, while disabled, once any drain in progress has stopped.
   */
  flush(): Promise<void>;
}
