import type { PixelMode } from "../protocol/interfaces/config.ts";

/**
 * Describes the raster layout of an encoded image
 */
export interface EncodedImageHeader {
  readonly width: number;
  readonly height: number;
  readonly mode: PixelMode;
  /** Bytes per serialized row */
  readonly rowLength: number;
}

/**
 * Image in the device's row-oriented raster format
 *
 * Rows are ordered top to bottom and each is exactly `header.rowLength`
 * bytes long.
 */
export interface EncodedImage {
  readonly header: EncodedImageHeader;
  readonly rows: readonly Buffer[];
}

/**
 * Image source accepted by the encoder: a file path or encoded file bytes
 */
export type ImageInput = string | Buffer;
