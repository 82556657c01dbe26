import type { DitherMode, PixelMode } from "../protocol/interfaces/config.ts";

/**
 * 4x4 ordered-dither matrix; cell values 0-15
 */
const BAYER_4X4: readonly (readonly number[])[] = [
  [0, 8, 2, 10],
  [12, 4, 14, 6],
  [3, 11, 1, 9],
  [15, 7, 13, 5],
];

export interface ReductionOptions {
  dither: DitherMode;
  /** Luma at or above which a mono1 pixel is lit (threshold mode) */
  threshold: number;
}

/**
 * Bytes needed for one row of `width` pixels in `mode`
 */
export function rowLengthFor(mode: PixelMode, width: number): number {
  switch (mode) {
    case "rgb565":
      return width * 2;
    case "grey8":
      return width;
    case "mono1":
      return Math.ceil(width / 8);
  }
}

/**
 * ITU-R BT.601 luma, integer arithmetic
 */
export function luma(r: number, g: number, b: number): number {
  return Math.floor((299 * r + 587 * g + 114 * b) / 1000);
}

/**
 * Pack one pixel as RGB565: r5 << 11 | g6 << 5 | b5
 */
export function toRgb565(r: number, g: number, b: number): number {
  return (((r >> 3) & 0x1f) << 11) | (((g >> 2) & 0x3f) << 5) | ((b >> 3) & 0x1f);
}

function isLit(
  value: number,
  x: number,
  y: number,
  options: ReductionOptions,
): boolean {
  if (options.dither === "bayer") {
    const cell = BAYER_4X4[y % 4]?.[x % 4] ?? 0;
    return value >= cell * 16 + 8;
  }
  return value >= options.threshold;
}

/**
 * Pad with zeros or truncate `row` to exactly `length` bytes
 */
export function fitRow(row: Buffer, length: number): Buffer {
  if (row.length === length) {
    return row;
  }
  if (row.length > length) {
    return Buffer.from(row.subarray(0, length));
  }
  const padded = Buffer.alloc(length);
  row.copy(padded);
  return padded;
}

/**
 * Serialize interleaved 8-bit RGB pixels into rows, top to bottom
 *
 * @param rgb `width * height * 3` bytes, row-major
 * @param rowLength Bytes per output row; defaults to the natural length for `mode`
 */
export function encodeRows(
  rgb: Buffer,
  width: number,
  height: number,
  mode: PixelMode,
  options: ReductionOptions,
  rowLength: number = rowLengthFor(mode, width),
): Buffer[] {
  const natural = rowLengthFor(mode, width);
  const rows: Buffer[] = [];

  for (let y = 0; y < height; y++) {
    const row = Buffer.alloc(natural);

    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 3;
      const r = rgb[offset] ?? 0;
      const g = rgb[offset + 1] ?? 0;
      const b = rgb[offset + 2] ?? 0;

      switch (mode) {
        case "rgb565":
          row.writeUInt16LE(toRgb565(r, g, b), x * 2);
          break;
        case "grey8":
          row[x] = luma(r, g, b);
          break;
        case "mono1":
          if (isLit(luma(r, g, b), x, y, options)) {
            const index = x >> 3;
            row[index] = (row[index] ?? 0) | (0x80 >> (x & 7));
          }
          break;
      }
    }

    rows.push(fitRow(row, rowLength));
  }

  return rows;
}
