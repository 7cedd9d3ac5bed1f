export type DeliveryResult = { success: true } | { success: false; error: Error };

/**
 * Performs a single outbound send. Implementations should enforce their own timeout; the
 * dispatcher only looks at whether the send succeeded.
 */
export default interface Transport {
  send(destination: string, payload: string): Promise<DeliveryResult>;
}
