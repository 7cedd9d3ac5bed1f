import { logger } from '../application-logger';

import QueueItem from './queue-item';

export enum FailureAction {
  Drop = 'drop',
  Requeue = 'requeue',
}

/** Decides what happens to an item whose delivery failed. */
export interface DeliveryFailureStrategy {
  /**
   * @param attempts - number of failed deliveries of this item so far, including this one
   */
  onDeliveryFailure(item: QueueItem, error: Error, attempts: number): FailureAction;
}

/** At-most-once delivery: a failed item is discarded. This is the dispatcher default. */
export const dropOnFailure: DeliveryFailureStrategy = {
  onDeliveryFailure(item: QueueItem, error: Error): FailureAction {
    logger.warn(
      { err: error },
      `[BufferedDispatcher] Dropping item for ${item.destination} after failed delivery.`,
    );
    return FailureAction.Drop;
  },
};

/**
 * Returns failed items to the queue so a later flush tries them again, giving up after
 * `maxAttempts` failures. Opting into this turns delivery into at-least-once for items that
 * eventually succeed.
 */
export class RequeueOnFailure implements DeliveryFailureStrategy {
  constructor(private readonly maxAttempts: number) {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error('maxAttempts must be a positive integer');
    }
  }

  onDeliveryFailure(item: QueueItem, error: Error, attempts: number): FailureAction {
    if (attempts < this.maxAttempts) {
      logger.info(
        `[BufferedDispatcher] Requeueing item for ${item.destination} (attempt ${attempts}/${this.maxAttempts}).`,
      );
      return FailureAction.Requeue;
    }
    logger.warn(
      { err: error },
      `[BufferedDispatcher] Failed to deliver item for ${item.destination} after ${attempts} tries, bailing`,
    );
    return FailureAction.Drop;
  }
}
