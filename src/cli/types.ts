import type {
  BLEConfig,
  ImageConfig,
  ProtocolConfig,
} from "../lib/protocol/index.ts";

/**
 * Options shared by every command that connects to the projector
 *
 * Values arrive from commander as strings and are validated by
 * `buildBleConfig`.
 */
export interface ConnectionOptions {
  address?: string;
  name: string;
  scanTimeout: string;
  retries: string;
}

export interface UploadOptions extends ConnectionOptions {
  image?: string;
  frameSize: string;
  packetDelay: string;
  fit: string;
  test: boolean;
}

export type ShellOptions = ConnectionOptions;

/**
 * Validated settings for one upload run
 */
export interface UploadJob {
  /** Image file; absent when uploading the test pattern */
  image?: string;
  test: boolean;
  bleConfig: BLEConfig;
  protocolConfig: ProtocolConfig;
  imageConfig: ImageConfig;
}

export interface ShellJob {
  bleConfig: BLEConfig;
  protocolConfig: ProtocolConfig;
}
