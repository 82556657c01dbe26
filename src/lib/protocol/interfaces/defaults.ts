import type { BLEConfig, ProtocolConfig, ImageConfig } from "./config.ts";
import {
  DATA_CHARACTERISTIC_UUID,
  DEVICE_HEIGHT,
  DEVICE_NAME_FILTER,
  DEVICE_WIDTH,
  SERVICE_UUID,
} from "../constants.ts";

/**
 * Default BLE configuration for the smART Sketcher 2.0
 */
export const DEFAULT_BLE_CONFIG: BLEConfig = {
  deviceName: DEVICE_NAME_FILTER,
  serviceUUID: SERVICE_UUID,
  writeCharacteristicUUID: DATA_CHARACTERISTIC_UUID,
  notifyCharacteristicUUID: DATA_CHARACTERISTIC_UUID,
  scanTimeout: 5.0,
  connectTimeout: 10.0,
  writeTimeout: 2.0,
  defaultWriteSize: 512,
};

/**
 * Default protocol configuration for data transmission
 *
 * Values from working uploads:
 * - frameSize: 80 bytes per data write
 * - packetDelay: 0.01s between writes
 * - readyTimeout: 10s for "OK" after SEND_IMAGE
 * - completionTimeout: 20s for "Done" after the last frame
 */
export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
  frameSize: 80,
  packetDelay: 0.01,
  retryLimit: 3,
  retryDelay: 0.05,
  readyTimeout: 10.0,
  completionTimeout: 20.0,
  reversePayload: true,
};

/**
 * Default image processing configuration for the 160x120 projector
 */
export const DEFAULT_IMAGE_CONFIG: ImageConfig = {
  defaultSize: [DEVICE_WIDTH, DEVICE_HEIGHT],
  mode: "rgb565",
  fit: "cover",
  dither: "threshold",
  threshold: 128,
  checkerboardSquares: 8,
};
