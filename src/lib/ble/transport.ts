/**
 * One discovered projector
 */
export interface DeviceHandle {
  /** Advertised local name */
  name: string;
  /** BLE address, or the platform peripheral id where the address is hidden */
  address: string;
  /** Negotiated ATT MTU, null until connected or when the stack does not report it */
  mtu: number | null;
  writeCharacteristicUUID: string;
  notifyCharacteristicUUID: string | null;
}

export type NotificationListener = (data: Buffer) => void;

/**
 * Connected link to the projector's data characteristic
 *
 * A resolved `write` only means the link layer took the bytes. The
 * projector never confirms that it processed them.
 */
export interface Transport {
  /** Largest payload a single `write` accepts */
  readonly writeSize: number;

  /**
   * Issue one bounded write
   * @throws WriteError on timeout or disconnect
   */
  write(data: Buffer): Promise<void>;

  /**
   * Subscribe to notification values
   * @returns Unsubscribe function
   */
  onNotification(listener: NotificationListener): () => void;

  /**
   * Release the connection; safe to call more than once
   */
  disconnect(): Promise<void>;
}

/**
 * Transport that can find and connect to the projector itself
 */
export interface ConnectableTransport extends Transport {
  /**
   * Scan for the configured device and connect to it
   * @throws CancelledError when `signal` aborts before the link is up
   */
  open(signal?: AbortSignal): Promise<DeviceHandle>;
}
