import { logger } from '../application-logger';
import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_MAX_WAIT_MS, DEFAULT_QUEUE_NAME } from '../constants';

import ArrayBackedNamedEventQueue from './array-backed-named-event-queue';
import { DeliveryFailureStrategy, FailureAction, dropOnFailure } from './delivery-failure-strategy';
import EventDispatcher from './event-dispatcher';
import FetchTransport, { FetchTransportOptions } from './fetch-transport';
import NamedEventQueue from './named-event-queue';
import NetworkStatusListener from './network-status-listener';
import QueueItem from './queue-item';
import Transport, { DeliveryResult } from './transport';

export type BufferedDispatcherConfig = {
  // number of queued items that triggers an immediate flush
  maxBatchSize: number;
  // number of milliseconds to wait after the last scheduled item before flushing
  maxWaitMs: number;
};

export type BufferedDispatcherOptions = {
  queue?: NamedEventQueue<QueueItem>;
  failureStrategy?: DeliveryFailureStrategy;
  // when provided, delivery is disabled while offline and re-enabled when back online
  networkStatusListener?: NetworkStatusListener;
};

export const DEFAULT_BUFFERED_DISPATCHER_CONFIG: BufferedDispatcherConfig = {
  maxBatchSize: DEFAULT_MAX_BATCH_SIZE,
  maxWaitMs: DEFAULT_MAX_WAIT_MS,
};

/**
 * An {@link EventDispatcher} that buffers scheduled items and delivers them through a
 * {@link Transport} once `maxBatchSize` items are queued or `maxWaitMs` has passed since the last
 * schedule call, whichever comes first.
 *
 * Delivery can be paused with {@link disable}; items keep accumulating and are sent in one pass on
 * {@link enable}. A drain checks the enabled flag before every item, so disabling mid-drain stops
 * delivery after the send in flight. Only one drain runs at a time and at most one flush timer is
 * armed.
 */
export default class BufferedDispatcher implements EventDispatcher {
  private readonly queue: NamedEventQueue<QueueItem>;
  private readonly failureStrategy: DeliveryFailureStrategy;
  private readonly maxBatchSize: number;
  private readonly maxWaitMs: number;
  // failed attempts per item, for items a strategy chose to requeue
  private readonly failedAttempts = new WeakMap<QueueItem, number>();
  private requeued: QueueItem[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private enabled = true;
  private draining = false;
  private currentDrain: Promise<void> = Promise.resolve();

  constructor(
    private readonly transport: Transport,
    config: Partial<BufferedDispatcherConfig> = {},
    options: BufferedDispatcherOptions = {},
  ) {
    const { maxBatchSize, maxWaitMs } = { ...DEFAULT_BUFFERED_DISPATCHER_CONFIG, ...config };
    this.ensureConfigFields(maxBatchSize, maxWaitMs);
    this.maxBatchSize = maxBatchSize;
    this.maxWaitMs = maxWaitMs;
    this.queue = options.queue ?? new ArrayBackedNamedEventQueue<QueueItem>(DEFAULT_QUEUE_NAME);
    this.failureStrategy = options.failureStrategy ?? dropOnFailure;

    const { networkStatusListener } = options;
    if (networkStatusListener) {
      if (networkStatusListener.isOffline()) {
        this.enabled = false;
      }
      networkStatusListener.onNetworkStatusChange((isOffline) => {
        logger.info(`[BufferedDispatcher] Network status change, isOffline=${isOffline}.`);
        if (isOffline) {
          this.disable();
        } else {
          this.enable();
        }
      });
    }
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isFlushing(): boolean {
    return this.draining;
  }

  schedule(destination: string, payload: string): void {
    this.queue.push({ destination, payload });

    if (!this.enabled) {
      // kept until delivery is enabled again
      return;
    }
    if (this.draining) {
      // the running drain takes the item before it finishes
      return;
    }
    // >= because items may have accumulated while disabled
    if (this.queue.length >= this.maxBatchSize) {
      this.flushInBackground();
    } else {
      this.armTimer();
    }
  }

  enable(): void {
    if (!this.enabled) {
      logger.info(`[BufferedDispatcher] Delivery enabled, ${this.queue.length} items queued.`);
    }
    this.enabled = true;
    this.flushInBackground();
  }

  disable(): void {
    if (this.enabled) {
      logger.info('[BufferedDispatcher] Delivery disabled.');
    }
    this.enabled = false;
    this.cancelTimer();
  }

  flush(): Promise<void> {
    this.cancelTimer();
    if (!this.enabled) {
      // a drain in progress stops before its next item
      return this.currentDrain;
    }
    if (this.draining) {
      return this.currentDrain;
    }
    this.currentDrain = this.drainQueue();
    return this.currentDrain;
  }

  private flushInBackground(): void {
    // drainQueue never rejects
    void this.flush();
  }

  private async drainQueue(): Promise<void> {
    this.draining = true;
    let delivered = 0;
    try {
      while (this.enabled) {
        const item = this.queue.shift();
        if (item === undefined) {
          break;
        }
        await this.deliver(item);
        delivered++;
      }
      logger.debug(`[BufferedDispatcher] Drained ${delivered} items.`);
    } catch (err) {
      logger.error({ err }, `[BufferedDispatcher] Drain stopped after ${delivered} items`);
    } finally {
      this.draining = false;
      if (this.requeued.length > 0) {
        this.queue.push(...this.requeued);
        this.requeued = [];
      }
      // whatever is left waits for the next trigger
      if (this.enabled && !this.queue.isEmpty()) {
        this.armTimer();
      }
    }
  }

  private async deliver(item: QueueItem): Promise<void> {
    let result: DeliveryResult;
    try {
      result = await this.transport.send(item.destination, item.payload);
    } catch (err) {
      result = { success: false, error: err instanceof Error ? err : new Error(String(err)) };
    }
    if (result.success) {
      this.failedAttempts.delete(item);
      return;
    }

    const attempts = (this.failedAttempts.get(item) ?? 0) + 1;
    let action: FailureAction;
    try {
      action = this.failureStrategy.onDeliveryFailure(item, result.error, attempts);
    } catch (err) {
      logger.error(
        { err },
        `[BufferedDispatcher] Failure strategy threw, dropping item for ${item.destination}.`,
      );
      action = FailureAction.Drop;
    }
    if (action === FailureAction.Requeue) {
      this.failedAttempts.set(item, attempts);
      this.requeued.push(item);
    } else {
      this.failedAttempts.delete(item);
    }
  }

  private armTimer(): void {
    this.cancelTimer();
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      this.flushInBackground();
    }, this.maxWaitMs);
  }

  private cancelTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }

  private ensureConfigFields(maxBatchSize: number, maxWaitMs: number) {
    if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
      throw new Error(
        'Invalid maxBatchSize in BufferedDispatcherConfig, expected a positive integer',
      );
    }
    if (!Number.isInteger(maxWaitMs) || maxWaitMs < 1) {
      throw new Error('Invalid maxWaitMs in BufferedDispatcherConfig, expected a positive integer');
    }
  }
}

/**
 * Creates a new {@link BufferedDispatcher}. Items are POSTed with a {@link FetchTransport} unless
 * another transport is provided.
 */
export function newBufferedDispatcher(
  config: Partial<BufferedDispatcherConfig> = DEFAULT_BUFFERED_DISPATCHER_CONFIG,
  options: BufferedDispatcherOptions & {
    transport?: Transport;
    transportOptions?: FetchTransportOptions;
  } = {},
): BufferedDispatcher {
  const { transport, transportOptions, ...dispatcherOptions } = options;
  return new BufferedDispatcher(
    transport ?? new FetchTransport(transportOptions),
    config,
    dispatcherOptions,
  );
}
