/** A pending outbound request: the payload is sent as-is to the destination. */
type QueueItem = {
  readonly destination: string;
  readonly payload: string;
};

export default QueueItem;
