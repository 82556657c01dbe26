import sharp from "sharp";
import type { ImageConfig, PixelMode } from "../protocol/index.ts";
import type { EncodedImage, ImageInput } from "./types.ts";
import { encodeRows, rowLengthFor } from "./pixel-formats.ts";
import { EncodingError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export interface EncodeOptions {
  /** Override the configured resize policy */
  fit?: ImageConfig["fit"];
  /** Force a per-row byte length; rows are zero-padded or truncated to it */
  rowLength?: number;
}

/**
 * Converts arbitrary images into the projector's row-oriented raster format.
 *
 * Decoding and resizing go through sharp; colour reduction and row packing
 * are plain integer arithmetic so the same input always yields the same
 * bytes.
 */
export class ImageEncoder {
  constructor(private config: ImageConfig) {}

  /**
   * Encode an image for the device
   *
   * @param input File path or encoded image bytes (PNG, JPEG, ...)
   * @param targetWidth Output width in pixels
   * @param targetHeight Output height in pixels
   * @param mode Output pixel encoding
   * @throws EncodingError when the input cannot be decoded, has zero area,
   * or the target size is invalid
   */
  public async encode(
    input: ImageInput,
    targetWidth: number = this.config.defaultSize[0],
    targetHeight: number = this.config.defaultSize[1],
    mode: PixelMode = this.config.mode,
    options: EncodeOptions = {},
  ): Promise<EncodedImage> {
    if (!this.isPositiveInteger(targetWidth) || !this.isPositiveInteger(targetHeight)) {
      throw new EncodingError(
        `Target size must be positive integers, got ${targetWidth}x${targetHeight}`,
      );
    }
    const rowLength = options.rowLength ?? rowLengthFor(mode, targetWidth);
    if (!this.isPositiveInteger(rowLength)) {
      throw new EncodingError(`Row length must be a positive integer, got ${rowLength}`);
    }

    const source = this.describe(input);
    logger.info(`Encoding ${source}`, LogEventType.ENCODE_START);

    let metadata: sharp.Metadata;
    try {
      metadata = await sharp(input).metadata();
    } catch (error) {
      throw new EncodingError(`Failed to decode ${source}: ${error}`);
    }

    if (!metadata.width || !metadata.height) {
      throw new EncodingError(`${source} has zero area`);
    }
    logger.debug(
      `Original size: ${metadata.width}x${metadata.height} (${metadata.format ?? "unknown"})`,
    );

    const fit = options.fit ?? this.config.fit;
    let pixels: Buffer;
    try {
      const { data, info } = await sharp(input)
        .flatten({ background: { r: 0, g: 0, b: 0 } })
        .resize(targetWidth, targetHeight, {
          fit,
          position: "centre",
          kernel: "lanczos3",
          background: { r: 0, g: 0, b: 0 },
        })
        .toColourspace("srgb")
        .raw()
        .toBuffer({ resolveWithObject: true });
      pixels = this.toRgb(data, info.channels, targetWidth * targetHeight);
    } catch (error) {
      throw new EncodingError(`Failed to resize ${source}: ${error}`);
    }

    const rows = encodeRows(
      pixels,
      targetWidth,
      targetHeight,
      mode,
      { dither: this.config.dither, threshold: this.config.threshold },
      rowLength,
    );

    logger.info(
      `Encoded ${targetWidth}x${targetHeight} ${mode}: ${rows.length} rows of ${rowLength} bytes`,
      LogEventType.ENCODE_COMPLETE,
      { width: targetWidth, height: targetHeight, mode, rowLength },
    );

    return Object.freeze({
      header: Object.freeze({
        width: targetWidth,
        height: targetHeight,
        mode,
        rowLength,
      }),
      rows: Object.freeze(rows),
    });
  }

  /**
   * Generate a checkerboard test pattern
   * @param size Image size [width, height]
   * @param squares Number of squares per side
   * @returns PNG image data
   */
  public async generateCheckerboard(
    size: [number, number] = this.config.defaultSize,
    squares: number = this.config.checkerboardSquares,
  ): Promise<Buffer> {
    const [width, height] = size;
    const squareWidth = Math.floor(width / squares);
    const squareHeight = Math.floor(height / squares);

    const svgPattern = this.createCheckerboardSVG(
      width,
      height,
      squareWidth,
      squareHeight,
      squares,
    );

    try {
      return await sharp(Buffer.from(svgPattern)).png().toBuffer();
    } catch (error) {
      throw new EncodingError(`Failed to generate checkerboard: ${error}`);
    }
  }

  /**
   * Expand sharp's raw output to 3 interleaved channels
   */
  private toRgb(data: Buffer, channels: number, pixelCount: number): Buffer {
    if (channels === 3) {
      return data;
    }
    if (channels < 1) {
      throw new EncodingError(`Unsupported channel count: ${channels}`);
    }

    const rgb = Buffer.alloc(pixelCount * 3);
    for (let i = 0; i < pixelCount; i++) {
      const base = i * channels;
      const r = data[base] ?? 0;
      rgb[i * 3] = r;
      rgb[i * 3 + 1] = channels >= 3 ? (data[base + 1] ?? 0) : r;
      rgb[i * 3 + 2] = channels >= 3 ? (data[base + 2] ?? 0) : r;
    }
    return rgb;
  }

  private isPositiveInteger(value: number): boolean {
    return Number.isInteger(value) && value > 0;
  }

  private describe(input: ImageInput): string {
    return typeof input === "string" ? input : `image buffer (${input.length} bytes)`;
  }

  /**
   * SVG markup for alternating black and white squares on a white ground
   */
  private createCheckerboardSVG(
    width: number,
    height: number,
    squareWidth: number,
    squareHeight: number,
    squares: number,
  ): string {
    let rects = "";

    for (let row = 0; row < squares; row++) {
      for (let col = 0; col < squares; col++) {
        if ((row + col) % 2 === 0) {
          const x = col * squareWidth;
          const y = row * squareHeight;
          rects += `<rect x="${x}" y="${y}" width="${squareWidth}" height="${squareHeight}" fill="black"/>`;
        }
      }
    }

    return `
      <svg width="${width}" height="${height}" xmlns="http://www.w3.org/2000/svg">
        <rect width="${width}" height="${height}" fill="white"/>
        ${rects}
      </svg>
    `;
  }
}
