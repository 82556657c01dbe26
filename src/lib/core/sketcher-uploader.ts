import type { FitPolicy, ImageConfig, ProtocolConfig } from "../protocol/index.ts";
import {
  CommandBuilder,
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_PROTOCOL_CONFIG,
  PayloadBuilder,
  ResponseStatus,
} from "../protocol/index.ts";
import type { Transport } from "../ble/transport.ts";
import { ImageEncoder } from "../processing/index.ts";
import type { EncodedImageHeader, ImageInput } from "../processing/index.ts";
import { ChunkedTransfer } from "../transfer/index.ts";
import type { TransferResult } from "../transfer/index.ts";
import { ResponseWaiter } from "./response-waiter.ts";
import { DeviceResponseError, TransferFailedError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export interface UploadOptions {
  /** Override the configured resize policy */
  fit?: FitPolicy;
  /**
   * Abort the upload: before the command goes out, during the device's
   * replies, or after the current data frame
   */
  signal?: AbortSignal;
  onProgress?: (framesSent: number, totalFrames: number) => void;
}

export interface UploadResult {
  image: EncodedImageHeader;
  transfer: TransferResult;
  /** Whether the device confirmed the image with "Done" */
  acknowledged: boolean;
}

/**
 * Drives the projector's image upload sequence over a connected transport
 */
export class SketcherUploader {
  private encoder: ImageEncoder;
  private payloadBuilder: PayloadBuilder;
  private chunked: ChunkedTransfer;

  constructor(
    private transport: Transport,
    private protocolConfig: ProtocolConfig = DEFAULT_PROTOCOL_CONFIG,
    private imageConfig: ImageConfig = DEFAULT_IMAGE_CONFIG,
  ) {
    this.encoder = new ImageEncoder(this.imageConfig);
    this.payloadBuilder = new PayloadBuilder(this.protocolConfig);
    this.chunked = new ChunkedTransfer(this.transport);
  }

  /**
   * Frame size actually used: the configured size, capped at the link's write size
   */
  public get frameSize(): number {
    return Math.min(this.protocolConfig.frameSize, this.transport.writeSize);
  }

  /**
   * Encode an image and show it on the projector
   *
   * @param input File path or encoded image bytes
   * @throws EncodingError when the image cannot be encoded
   * @throws DeviceResponseError when the device does not accept the upload command
   * @throws TransferFailedError when the data transfer fails or is cancelled
   */
  public async uploadImage(
    input: ImageInput,
    options: UploadOptions = {},
  ): Promise<UploadResult> {
    const [width, height] = this.imageConfig.defaultSize;
    const image = await this.encoder.encode(
      input,
      width,
      height,
      this.imageConfig.mode,
      { fit: options.fit },
    );
    const payload = this.payloadBuilder.buildImagePayload(image);
    logger.info(
      `Payload bytes: ${payload.length} (${image.rows.length} rows of ${image.header.rowLength})`,
    );

    const frameSize = this.frameSize;
    const { signal } = options;
    const waiter = new ResponseWaiter(this.transport);
    try {
      await this.sendCommand(frameSize, signal);

      const ready = await waiter.waitFor(
        ResponseStatus.OK,
        this.protocolConfig.readyTimeout * 1000,
        signal,
      );
      if (!ready && !signal?.aborted) {
        throw new DeviceResponseError(
          `No '${ResponseStatus.OK}' within ${this.protocolConfig.readyTimeout}s after the upload command`,
        );
      }
      if (ready) {
        logger.info("Device ready", LogEventType.DEVICE_READY);
      }

      // An aborted signal ends this before the first data frame
      const transfer = await this.chunked.transfer(payload, {
        frameSize,
        retryLimit: this.protocolConfig.retryLimit,
        frameDelayMs: this.protocolConfig.packetDelay * 1000,
        retryDelayMs: this.protocolConfig.retryDelay * 1000,
        signal,
        onProgress: options.onProgress,
      });
      if (transfer.status !== "completed") {
        throw new TransferFailedError(
          transfer.lastError?.message ?? "Transfer did not complete",
          transfer,
        );
      }

      logger.info("Waiting for device to process...");
      const acknowledged = await waiter.waitFor(
        ResponseStatus.DONE,
        this.protocolConfig.completionTimeout * 1000,
        signal,
      );
      if (acknowledged) {
        logger.info("Image uploaded");
      } else if (signal?.aborted) {
        logger.warning(`Stopped waiting for '${ResponseStatus.DONE}'`);
      } else {
        logger.warning(
          `Upload completed but the device did not report '${ResponseStatus.DONE}'; check the projector`,
        );
      }

      return { image: image.header, transfer, acknowledged };
    } finally {
      waiter.dispose();
    }
  }

  /**
   * Upload a checkerboard test pattern
   */
  public async uploadCheckerboard(
    squares: number = this.imageConfig.checkerboardSquares,
    options: UploadOptions = {},
  ): Promise<UploadResult> {
    logger.info(`Generating ${squares}x${squares} checkerboard pattern...`);
    const png = await this.encoder.generateCheckerboard(
      this.imageConfig.defaultSize,
      squares,
    );
    return await this.uploadImage(png, options);
  }

  private async sendCommand(
    frameSize: number,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const command = CommandBuilder.buildSendImage(frameSize);
    logger.info(
      `Sending SEND_IMAGE command: ${command.toString("hex")}`,
      LogEventType.COMMAND_SEND,
    );

    const result = await this.chunked.transfer(command, {
      frameSize: this.transport.writeSize,
      retryLimit: this.protocolConfig.retryLimit,
      retryDelayMs: this.protocolConfig.retryDelay * 1000,
      signal,
    });
    if (result.status !== "completed") {
      throw new TransferFailedError(
        `Upload command not sent: ${result.lastError?.message ?? "unknown error"}`,
        result,
      );
    }
  }
}
