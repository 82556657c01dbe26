export { ImageEncoder, type EncodeOptions } from "./image-encoder.ts";
export {
  encodeRows,
  fitRow,
  luma,
  rowLengthFor,
  toRgb565,
  type ReductionOptions,
} from "./pixel-formats.ts";
export type { EncodedImage, EncodedImageHeader, ImageInput } from "./types.ts";
