/**
 * Pixel encodings the image encoder can produce
 *
 * - rgb565: 16-bit colour, little-endian (device native)
 * - grey8: 8-bit luma
 * - mono1: 1 bit per pixel, MSB first
 */
export type PixelMode = "rgb565" | "grey8" | "mono1";

/**
 * How a source image is fitted to the target size
 *
 * - cover: scale to fill, then centre-crop the overflow
 * - contain: scale to fit, then letterbox onto black
 */
export type FitPolicy = "cover" | "contain";

/**
 * Colour reduction used by the mono1 mode
 */
export type DitherMode = "threshold" | "bayer";

/**
 * Bluetooth Low Energy (BLE) connection configuration
 *
 * Contains settings for discovering and connecting to the projector via BLE.
 */
export interface BLEConfig {
  /**
   * Advertised name fragment to match during scanning
   */
  deviceName: string;

  /**
   * Exact device address to connect to instead of matching by name
   */
  deviceAddress?: string;

  /**
   * UUID of the vendor service expected to hold the data characteristic
   */
  serviceUUID: string;

  /**
   * UUID of the characteristic used for writing commands/data to the device
   */
  writeCharacteristicUUID: string;

  /**
   * UUID of the characteristic that delivers notifications
   *
   * The projector uses the same characteristic for both directions.
   */
  notifyCharacteristicUUID: string;

  /**
   * Maximum time (in seconds) to wait for device discovery before timing out
   */
  scanTimeout: number;

  /**
   * Maximum time (in seconds) to wait for the adapter to power on and for
   * the GATT connection to complete
   */
  connectTimeout: number;

  /**
   * Maximum time (in seconds) a single characteristic write may take
   */
  writeTimeout: number;

  /**
   * Write size used when the BLE stack does not report a negotiated MTU
   */
  defaultWriteSize: number;
}

/**
 * Protocol configuration for frame transmission
 *
 * The projector offers no backpressure signal, so these timings are the only
 * thing keeping its receive buffer from overrunning.
 */
export interface ProtocolConfig {
  /**
   * Size in bytes of each image data frame
   *
   * Clamped to the connection's write size at upload time.
   */
  frameSize: number;

  /**
   * Delay (in seconds) between consecutive data frames
   */
  packetDelay: number;

  /**
   * Number of times a frame is re-sent after a failed write before the
   * transfer is abandoned
   */
  retryLimit: number;

  /**
   * Delay (in seconds) before re-sending a frame whose write failed
   */
  retryDelay: number;

  /**
   * Maximum time (in seconds) to wait for "OK" after SEND_IMAGE
   */
  readyTimeout: number;

  /**
   * Maximum time (in seconds) to wait for "Done" after the last frame
   */
  completionTimeout: number;

  /**
   * Whether the image payload is sent back to front
   *
   * The projector draws the buffer in reverse; sending it unreversed shows
   * the image rotated by 180 degrees.
   */
  reversePayload: boolean;
}

/**
 * Image processing configuration
 */
export interface ImageConfig {
  /**
   * Target dimensions [width, height]
   */
  defaultSize: [number, number];

  /**
   * Pixel encoding of the serialized rows
   */
  mode: PixelMode;

  /**
   * Resize policy when the source aspect ratio differs from the target
   */
  fit: FitPolicy;

  /**
   * Colour reduction for mono1
   */
  dither: DitherMode;

  /**
   * Luma cut-off (0-255) for mono1 thresholding; pixels at or above are lit
   */
  threshold: number;

  /**
   * Number of squares per side of the checkerboard test pattern
   */
  checkerboardSquares: number;
}
