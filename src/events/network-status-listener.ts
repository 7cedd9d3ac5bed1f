/**
 * Source of connectivity changes. A dispatcher wired to one pauses delivery while the device is
 * offline and sends the accumulated backlog once it is back online.
 */
export default interface NetworkStatusListener {
  /** Whether the device currently has no network connection */
  isOffline(): boolean;

  /** Registers a callback invoked with the new offline state on every change */
  onNetworkStatusChange(callback: (isOffline: boolean) => void): void;
}
