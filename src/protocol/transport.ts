/** Handle returned by `RingTransport.subscribe()`; pass it back to `unsubscribe()`. */
export interface Subscription {
  readonly id: number;
}

export type FrameHandler = (frame: Buffer) => void;

/**
 * Byte-oriented view of one GATT write/notify characteristic pair.
 * Implemented by the BLE handlers; faked in-process by tests.
 */
export interface RingTransport {
  write(data: Buffer): Promise<void>;
  /** Start delivering notifications to `handler`, one call per frame, in arrival order. */
  subscribe(handler: FrameHandler): Promise<Subscription>;
  unsubscribe(subscription: Subscription): Promise<void>;
}
