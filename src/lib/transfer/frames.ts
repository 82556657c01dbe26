import type { TransferFrame } from "./types.ts";
import { ConfigurationError } from "../utils/errors.ts";

/**
 * Splits a payload into frames of at most `frameSize` bytes
 *
 * Frame payloads are views into `payload`, which must not be modified while
 * the frames are in use.
 */
export function splitFrames(payload: Buffer, frameSize: number): TransferFrame[] {
  if (!Number.isInteger(frameSize) || frameSize <= 0) {
    throw new ConfigurationError(
      `Frame size must be a positive integer, got ${frameSize}`,
    );
  }
  if (payload.length === 0) {
    throw new ConfigurationError("Cannot transfer an empty payload");
  }

  const totalFrames = Math.ceil(payload.length / frameSize);
  const frames: TransferFrame[] = [];
  for (let index = 0; index < totalFrames; index++) {
    const start = index * frameSize;
    frames.push({
      index,
      payload: payload.subarray(start, Math.min(start + frameSize, payload.length)),
      isFinal: index === totalFrames - 1,
    });
  }
  return frames;
}
