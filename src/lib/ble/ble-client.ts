import { EventEmitter } from "node:events";
EventEmitter.defaultMaxListeners = 20;

import noble from "@abandonware/noble";
import type { Peripheral, Characteristic } from "@abandonware/noble";
import type { BLEConfig } from "../protocol/index.ts";
import { ATT_HEADER_SIZE } from "../protocol/index.ts";
import type {
  ConnectableTransport,
  DeviceHandle,
  NotificationListener,
} from "./transport.ts";
import {
  bufferAdvertisements,
  normalizeUUID,
  waitForAdvertisement,
  type ScanFilter,
} from "./scanner.ts";
import {
  CancelledError,
  ConfigurationError,
  ConnectionError,
  SketcherError,
  WriteError,
} from "../utils/errors.ts";
import { withTimeout } from "../utils/timeout.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * noble-backed connection to the projector
 *
 * The projector accepts any initiator: there is no pairing, bonding or
 * session handshake, and nothing on the device signals that a client has
 * connected.
 */
export class BleTransport implements ConnectableTransport {
  private discovered = new Map<string, Peripheral>();
  private peripheral: Peripheral | null = null;
  private handle: DeviceHandle | null = null;
  private writeCharacteristic: Characteristic | null = null;
  private notifyCharacteristic: Characteristic | null = null;
  private listeners = new Set<NotificationListener>();
  private isInitialized = false;

  private readonly onData = (data: Buffer) => {
    logger.debug(`[RECV] ${data.length} bytes: ${data.toString("hex")}`);
    for (const listener of this.listeners) {
      listener(data);
    }
  };

  constructor(private bleConfig: BLEConfig) {}

  /**
   * Usable bytes per write: MTU minus the ATT header when the MTU is known
   */
  public get writeSize(): number {
    const mtu = this.handle?.mtu;
    if (mtu && mtu > ATT_HEADER_SIZE) {
      return mtu - ATT_HEADER_SIZE;
    }
    return this.bleConfig.defaultWriteSize;
  }

  /**
   * Wait for the Bluetooth adapter to reach the powered on state
   */
  private async initBluetooth(): Promise<void> {
    if (this.isInitialized) {
      return;
    }

    if (noble._state === "poweredOn") {
      this.isInitialized = true;
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        noble.removeListener("stateChange", checkState);
        reject(new ConnectionError("Bluetooth adapter initialization timeout"));
      }, this.bleConfig.connectTimeout * 1000);

      const settle = (error: ConnectionError | null) => {
        clearTimeout(timeout);
        noble.removeListener("stateChange", checkState);
        if (error) {
          reject(error);
        } else {
          this.isInitialized = true;
          resolve();
        }
      };

      const checkState = (state: string) => {
        if (state === "poweredOn") {
          settle(null);
        } else if (state === "poweredOff") {
          settle(new ConnectionError("Bluetooth adapter is not powered on"));
        } else if (state === "unsupported") {
          settle(new ConnectionError("Bluetooth is not supported on this device"));
        } else if (state === "unauthorized") {
          settle(new ConnectionError("Bluetooth access not authorized"));
        }
      };

      noble.on("stateChange", checkState);
    });
  }

  /**
   * Passively scan until an advertisement matches the filter
   *
   * @throws DeviceNotFoundError when nothing matches within the timeout
   * @throws CancelledError when `signal` aborts first
   */
  public async scan(
    filter: ScanFilter = {
      name: this.bleConfig.deviceName,
      address: this.bleConfig.deviceAddress,
    },
    timeoutMs: number = this.bleConfig.scanTimeout * 1000,
    signal?: AbortSignal,
  ): Promise<DeviceHandle> {
    await this.initBluetooth();

    logger.info(
      filter.address
        ? `Scanning for device ${filter.address}...`
        : `Scanning for '${filter.name}'...`,
      LogEventType.SCAN_START,
    );

    // Subscribed before scanning starts; duplicates are reported only once
    const buffer = bufferAdvertisements();
    const onDiscover = (peripheral: Peripheral) => {
      const address = peripheral.address || peripheral.id;
      this.discovered.set(address.toLowerCase(), peripheral);
      buffer.push({
        name: peripheral.advertisement.localName ?? "",
        address,
        rssi: peripheral.rssi,
      });
    };
    noble.on("discover", onDiscover);

    try {
      try {
        await noble.startScanningAsync([], false);
      } catch (error) {
        throw new ConnectionError(`Scan could not start: ${error}`);
      }

      const advertisement = await waitForAdvertisement(
        buffer.source,
        filter,
        timeoutMs,
        signal,
      );
      logger.info(
        `Found device: ${advertisement.name} (${advertisement.address})`,
        LogEventType.DEVICE_FOUND,
        advertisement,
      );
      return {
        name: advertisement.name,
        address: advertisement.address,
        mtu: null,
        writeCharacteristicUUID: this.bleConfig.writeCharacteristicUUID,
        notifyCharacteristicUUID: this.bleConfig.notifyCharacteristicUUID,
      };
    } finally {
      noble.removeListener("discover", onDiscover);
      await this.stopScanning();
    }
  }

  /**
   * Open an unauthenticated GATT connection to a scanned device
   *
   * @throws ConnectionError when the link cannot be established or the
   * write characteristic is missing (wrong model or firmware)
   */
  public async connect(handle: DeviceHandle): Promise<void> {
    const peripheral = this.discovered.get(handle.address.toLowerCase());
    if (!peripheral) {
      throw new ConnectionError(
        `Device ${handle.address} has not been discovered by a scan`,
      );
    }
    if (this.peripheral) {
      throw new ConnectionError("Already connected to a device");
    }

    try {
      await this.initBluetooth();

      logger.info("Connecting to device...", LogEventType.CONNECT_START);
      this.peripheral = peripheral;
      await withTimeout(
        peripheral.connectAsync(),
        this.bleConfig.connectTimeout * 1000,
        () =>
          new ConnectionError(
            `Connection timed out after ${this.bleConfig.connectTimeout}s`,
          ),
      );
      logger.info("Connected to device", LogEventType.CONNECTED);

      peripheral.once("disconnect", () => {
        logger.info("Device disconnected", LogEventType.DISCONNECTED);
        this.resetConnectionState();
      });

      await this.discoverCharacteristics(peripheral, handle);

      if (this.notifyCharacteristic) {
        await this.notifyCharacteristic.subscribeAsync();
        this.notifyCharacteristic.on("data", this.onData);
      }

      const mtu =
        "mtu" in peripheral && typeof peripheral.mtu === "number"
          ? peripheral.mtu
          : null;
      this.handle = { ...handle, mtu };
      logger.info(
        `Ready: MTU ${this.handle.mtu ?? "unknown"}, write size ${this.writeSize} bytes`,
      );
    } catch (error) {
      await this.disconnect();
      if (error instanceof SketcherError) {
        throw error;
      }
      throw new ConnectionError(`Connection failed: ${error}`);
    }
  }

  /**
   * Scan with the configured filter and connect to the first match
   *
   * Aborting `signal` stops the scan at once; during connect it takes
   * effect when the link is up, which is then closed again.
   * @returns Handle of the connected device
   */
  public async open(signal?: AbortSignal): Promise<DeviceHandle> {
    const handle = await this.scan(
      { name: this.bleConfig.deviceName, address: this.bleConfig.deviceAddress },
      this.bleConfig.scanTimeout * 1000,
      signal,
    );
    if (signal?.aborted) {
      throw new CancelledError("Connection cancelled");
    }

    await this.connect(handle);
    if (signal?.aborted) {
      await this.disconnect();
      throw new CancelledError("Connection cancelled");
    }
    return this.handle ?? handle;
  }

  /**
   * Locate the write (and optional notify) characteristic by UUID
   */
  private async discoverCharacteristics(
    peripheral: Peripheral,
    handle: DeviceHandle,
  ): Promise<void> {
    const { services, characteristics } =
      await peripheral.discoverAllServicesAndCharacteristicsAsync();

    const serviceUuid = normalizeUUID(this.bleConfig.serviceUUID);
    if (!services.some((service) => normalizeUUID(service.uuid) === serviceUuid)) {
      logger.warning(
        `Service ${this.bleConfig.serviceUUID} not found; looking for the characteristic anyway`,
      );
    }

    const writeUuid = normalizeUUID(handle.writeCharacteristicUUID);
    const notifyUuid = handle.notifyCharacteristicUUID
      ? normalizeUUID(handle.notifyCharacteristicUUID)
      : null;

    logger.debug(`Looking for write UUID: ${writeUuid}`);

    for (const char of characteristics) {
      const uuid = normalizeUUID(char.uuid);
      logger.debug(`  Characteristic: ${char.uuid} [${char.properties.join(", ")}]`);

      if (uuid === writeUuid) {
        this.writeCharacteristic = char;
        logger.debug(
          `Found write characteristic: ${char.uuid}`,
          LogEventType.DISCOVER_CHAR,
          { type: "write", uuid: char.uuid },
        );
      }
      if (notifyUuid && uuid === notifyUuid && char.properties.includes("notify")) {
        this.notifyCharacteristic = char;
      }
    }

    if (!this.writeCharacteristic) {
      throw new ConnectionError(
        `Write characteristic ${handle.writeCharacteristicUUID} not found; is this a smART Sketcher 2.0?`,
      );
    }
    if (!this.notifyCharacteristic) {
      logger.warning("Notify characteristic not found; device responses will not be shown");
    }
  }

  /**
   * Issue one write; resolves once the link layer has taken the bytes
   *
   * @throws WriteError on timeout or when the device is not connected
   */
  public async write(data: Buffer): Promise<void> {
    const characteristic = this.writeCharacteristic;
    if (!characteristic) {
      throw new WriteError("Device not connected");
    }
    if (data.length > this.writeSize) {
      throw new ConfigurationError(
        `Write of ${data.length} bytes exceeds write size of ${this.writeSize}`,
      );
    }

    const withoutResponse = characteristic.properties.includes(
      "writeWithoutResponse",
    );
    try {
      await withTimeout(
        characteristic.writeAsync(data, withoutResponse),
        this.bleConfig.writeTimeout * 1000,
        () => new WriteError(`Write timed out after ${this.bleConfig.writeTimeout}s`),
      );
    } catch (error) {
      if (error instanceof WriteError) {
        throw error;
      }
      throw new WriteError(`Write failed: ${error}`);
    }
  }

  public onNotification(listener: NotificationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Release the device so the next client can reach it
   */
  public async disconnect(): Promise<void> {
    const notify = this.notifyCharacteristic;
    const peripheral = this.peripheral;
    this.resetConnectionState();
    this.listeners.clear();

    if (notify) {
      notify.removeListener("data", this.onData);
      await notify
        .unsubscribeAsync()
        .catch((error: unknown) => logger.debug(`Unsubscribe failed: ${error}`));
    }
    if (peripheral) {
      peripheral.removeAllListeners("disconnect");
      await peripheral
        .disconnectAsync()
        .catch((error: unknown) => logger.warning(`Error during disconnect: ${error}`));
      logger.info("Disconnected", LogEventType.DISCONNECTED);
    }
    await this.stopScanning();
  }

  private resetConnectionState(): void {
    this.peripheral = null;
    this.handle = null;
    this.writeCharacteristic = null;
    this.notifyCharacteristic = null;
  }

  private async stopScanning(): Promise<void> {
    await noble
      .stopScanningAsync()
      .catch((error: unknown) => logger.debug(`Stop scanning failed: ${error}`));
  }
}
