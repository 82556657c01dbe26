/**
 * Advertised name fragment used to find the projector.
 *
 * Units seen in the wild advertise as "smART_Sketcher2.0"; name matching
 * ignores case and punctuation so this also matches "smART Sketcher 2.0".
 */
export const DEVICE_NAME_FILTER = "smART Sketcher";

/**
 * Vendor GATT service exposed by the projector
 */
export const SERVICE_UUID = "0000ffe0-0000-1000-8000-00805f9b34fb";

/**
 * Characteristic that accepts commands and image data, and that also
 * carries the device's textual notifications ("OK", "Done")
 */
export const DATA_CHARACTERISTIC_UUID = "0000ffe3-0000-1000-8000-00805f9b34fb";

/**
 * Native projector resolution
 */
export const DEVICE_WIDTH = 160;
export const DEVICE_HEIGHT = 120;

/**
 * Opcode of the SEND_IMAGE command (first byte of the 8-byte command frame)
 */
export const CMD_SEND_IMAGE = 0x01;

/**
 * Length of the SEND_IMAGE command frame in bytes
 *
 * Layout as captured from working uploads:
 * - Byte 0: opcode (0x01)
 * - Bytes 1-3: zero
 * - Bytes 4-5: data chunk size, little-endian
 * - Bytes 6-7: 0x0002, little-endian (matches the 2 bytes per RGB565 pixel)
 */
export const SEND_IMAGE_COMMAND_LENGTH = 8;

/**
 * Trailing word of the SEND_IMAGE command
 */
export const SEND_IMAGE_FORMAT_WORD = 0x0002;

/**
 * ATT header overhead subtracted from the MTU to get the usable write size
 */
export const ATT_HEADER_SIZE = 3;
