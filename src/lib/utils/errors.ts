import type { TransferResult } from "../transfer/types.ts";

/**
 * Base error class for all smART Sketcher errors
 */
export class SketcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SketcherError";
    Object.setPrototypeOf(this, SketcherError.prototype);
  }
}

/**
 * Error thrown when no matching device advertises within the scan timeout
 */
export class DeviceNotFoundError extends SketcherError {
  constructor(message: string = "Device not found") {
    super(message);
    this.name = "DeviceNotFoundError";
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}

/**
 * Error thrown when the GATT connection or characteristic lookup fails
 */
export class ConnectionError extends SketcherError {
  constructor(message: string = "Connection failed") {
    super(message);
    this.name = "ConnectionError";
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error thrown when a single characteristic write times out or the link is gone.
 * The chunked transfer retries these.
 */
export class WriteError extends SketcherError {
  constructor(message: string = "Write failed") {
    super(message);
    this.name = "WriteError";
    Object.setPrototypeOf(this, WriteError.prototype);
  }
}

/**
 * Error thrown when a source image cannot be turned into device raster data
 */
export class EncodingError extends SketcherError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Error thrown when a transfer ends in the failed state, either because a
 * frame ran out of retries or because the user cancelled it
 */
export class TransferFailedError extends SketcherError {
  constructor(
    message: string,
    public readonly result: TransferResult,
  ) {
    super(message);
    this.name = "TransferFailedError";
    Object.setPrototypeOf(this, TransferFailedError.prototype);
  }
}

/**
 * Error thrown when a transfer is started while another one owns the characteristic
 */
export class TransferInProgressError extends SketcherError {
  constructor(message: string = "A transfer is already in progress") {
    super(message);
    this.name = "TransferInProgressError";
    Object.setPrototypeOf(this, TransferInProgressError.prototype);
  }
}

/**
 * Error thrown on an illegal transfer session status change
 */
export class TransferStateError extends SketcherError {
  constructor(message: string) {
    super(message);
    this.name = "TransferStateError";
    Object.setPrototypeOf(this, TransferStateError.prototype);
  }
}

/**
 * Error thrown for invalid tunables such as a non-positive frame size
 */
export class ConfigurationError extends SketcherError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a shell line cannot be turned into bytes
 */
export class CommandParseError extends SketcherError {
  constructor(message: string) {
    super(message);
    this.name = "CommandParseError";
    Object.setPrototypeOf(this, CommandParseError.prototype);
  }
}

/**
 * Error thrown when the user interrupts scanning or connecting
 */
export class CancelledError extends SketcherError {
  constructor(message: string = "Cancelled by user") {
    super(message);
    this.name = "CancelledError";
    Object.setPrototypeOf(this, CancelledError.prototype);
  }
}

/**
 * Error thrown when the device does not answer the way the upload sequence expects
 */
export class DeviceResponseError extends SketcherError {
  constructor(message: string) {
    super(message);
    this.name = "DeviceResponseError";
    Object.setPrototypeOf(this, DeviceResponseError.prototype);
  }
}

/**
 * Process exit codes per failure kind
 */
export enum ExitCode {
  SUCCESS = 0,
  GENERIC = 1,
  NOT_FOUND = 2,
  CONNECTION = 3,
  TRANSFER = 4,
  ENCODING = 5,
  CONFIGURATION = 6,
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof DeviceNotFoundError) return ExitCode.NOT_FOUND;
  if (error instanceof ConnectionError) return ExitCode.CONNECTION;
  if (
    error instanceof TransferFailedError ||
    error instanceof WriteError ||
    error instanceof DeviceResponseError ||
    error instanceof TransferInProgressError ||
    error instanceof CancelledError
  ) {
    return ExitCode.TRANSFER;
  }
  if (error instanceof EncodingError) return ExitCode.ENCODING;
  if (error instanceof ConfigurationError || error instanceof CommandParseError) {
    return ExitCode.CONFIGURATION;
  }
  return ExitCode.GENERIC;
}

/**
 * Human-readable, one-line description of a failure for the terminal
 */
export function describeError(error: unknown): string {
  if (error instanceof DeviceNotFoundError) {
    return `Device not found: ${error.message}. Make sure the projector is powered on, in range and not connected to another client.`;
  }
  if (error instanceof ConnectionError) {
    return `Connection failed: ${error.message}`;
  }
  if (error instanceof TransferFailedError) {
    return `Transfer failed: ${error.message}`;
  }
  if (error instanceof WriteError) {
    return `Write failed: ${error.message}`;
  }
  if (error instanceof DeviceResponseError) {
    return `Device did not respond as expected: ${error.message}`;
  }
  if (error instanceof EncodingError) {
    return `Image could not be encoded: ${error.message}`;
  }
  if (error instanceof ConfigurationError) {
    return `Invalid configuration: ${error.message}`;
  }
  if (error instanceof SketcherError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
