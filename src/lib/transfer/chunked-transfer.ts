import type { Transport } from "../ble/transport.ts";
import type {
  FrameFailure,
  TransferFrame,
  TransferOptions,
  TransferResult,
} from "./types.ts";
import { splitFrames } from "./frames.ts";
import { TransferSession } from "./transfer-session.ts";
import {
  ConfigurationError,
  TransferInProgressError,
  WriteError,
} from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

export const DEFAULT_RETRY_LIMIT = 3;

/**
 * Sends byte payloads over a transport as ordered, size-bounded frames
 *
 * Owns the characteristic for the duration of a transfer; a second call
 * while one is running is rejected. Payloads are opaque: image data and
 * shell commands go through the same path.
 *
 * "completed" means every frame was accepted by the link layer. The
 * projector sends no per-frame acknowledgment, so that is the strongest
 * guarantee available.
 */
export class ChunkedTransfer {
  private busy = false;
  private current: TransferSession | null = null;

  constructor(private transport: Transport) {}

  public get isBusy(): boolean {
    return this.busy;
  }

  /**
   * Session of the running (or last) transfer
   */
  public get session(): TransferSession | null {
    return this.current;
  }

  /**
   * Send `payload` as a sequence of frames
   *
   * Failed writes are retried with the identical frame up to `retryLimit`
   * times. Running out of retries, or aborting `signal`, ends the transfer
   * with status "failed"; errors other than WriteError propagate.
   *
   * @throws ConfigurationError for an unusable frame size or empty payload
   * @throws TransferInProgressError when another transfer is running
   */
  public async transfer(
    payload: Buffer,
    options: TransferOptions,
  ): Promise<TransferResult> {
    if (this.busy) {
      throw new TransferInProgressError();
    }

    const {
      frameSize,
      retryLimit = DEFAULT_RETRY_LIMIT,
      frameDelayMs = 0,
      retryDelayMs = 0,
      signal,
      onProgress,
    } = options;

    if (frameSize > this.transport.writeSize) {
      throw new ConfigurationError(
        `Frame size ${frameSize} exceeds the connection's write size of ${this.transport.writeSize} bytes`,
      );
    }
    if (!Number.isInteger(retryLimit) || retryLimit < 0) {
      throw new ConfigurationError(
        `Retry limit must be a non-negative integer, got ${retryLimit}`,
      );
    }

    const frames = splitFrames(payload, frameSize);
    const session = new TransferSession(frames.length);
    this.busy = true;
    this.current = session;

    try {
      if (signal?.aborted) {
        session.fail();
        return this.result(session, this.cancelled(0));
      }

      session.start();
      logger.info(
        `Starting transfer: ${frames.length} frame(s), ${payload.length} bytes`,
        LogEventType.DATA_SEND_START,
        { totalFrames: frames.length, totalSize: payload.length },
      );

      for (const frame of frames) {
        if (frame.index > 0 && frameDelayMs > 0) {
          await this.sleep(frameDelayMs);
        }

        if (signal?.aborted) {
          session.fail();
          logger.warning(
            `Transfer cancelled after ${session.nextIndex}/${frames.length} frame(s)`,
          );
          return this.result(session, this.cancelled(frame.index));
        }

        const failure = await this.sendFrame(
          frame,
          session,
          retryLimit,
          retryDelayMs,
        );
        if (failure) {
          session.fail();
          logger.error(
            `Frame ${failure.frameIndex} failed after ${retryLimit} retries: ${failure.message}`,
          );
          return this.result(session, failure);
        }

        session.markSent(frame.index);
        logger.debug(
          `Sent frame ${frame.index + 1}/${frames.length} (bytes=${frame.payload.length}${frame.isFinal ? ", final" : ""})`,
          LogEventType.DATA_SEND_PROGRESS,
          { current: session.nextIndex, total: frames.length },
        );
        onProgress?.(session.nextIndex, frames.length);
      }

      session.complete();
      logger.info("Transfer complete", LogEventType.DATA_SEND_COMPLETE);
      return this.result(session, null);
    } catch (error) {
      if (session.isActive) {
        session.fail();
      }
      throw error;
    } finally {
      this.busy = false;
    }
  }

  /**
   * Write one frame, re-sending the same bytes on WriteError
   * @returns The failure once the retry budget is spent, otherwise null
   */
  private async sendFrame(
    frame: TransferFrame,
    session: TransferSession,
    retryLimit: number,
    retryDelayMs: number,
  ): Promise<FrameFailure | null> {
    for (;;) {
      try {
        await this.transport.write(frame.payload);
        return null;
      } catch (error) {
        if (!(error instanceof WriteError)) {
          throw error;
        }
        if (session.retriesFor(frame.index) >= retryLimit) {
          return {
            frameIndex: frame.index,
            kind: "WriteError",
            message: error.message,
          };
        }

        const attempt = session.recordRetry(frame.index);
        logger.warning(
          `Write of frame ${frame.index} failed (${error.message}), retry ${attempt}/${retryLimit}`,
          LogEventType.FRAME_RETRY,
          { frameIndex: frame.index, attempt },
        );
        if (retryDelayMs > 0) {
          await this.sleep(retryDelayMs);
        }
      }
    }
  }

  private cancelled(frameIndex: number): FrameFailure {
    return {
      frameIndex,
      kind: "Cancelled",
      message:
        frameIndex > 0
          ? `Cancelled by user after frame ${frameIndex - 1}`
          : "Cancelled by user before the first frame",
    };
  }

  private result(
    session: TransferSession,
    lastError: FrameFailure | null,
  ): TransferResult {
    return {
      status: session.status,
      framesSent: session.nextIndex,
      totalFrames: session.totalFrames,
      lastError,
    };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
