export type TransferStatus = "pending" | "in_progress" | "completed" | "failed";

/**
 * One sequence-numbered slice of a payload
 */
export interface TransferFrame {
  /** Zero-based, contiguous position in the payload */
  readonly index: number;
  readonly payload: Buffer;
  /** Set on the last frame only */
  readonly isFinal: boolean;
}

export type FrameFailureKind = "WriteError" | "Cancelled";

/**
 * Why and where a transfer was abandoned
 */
export interface FrameFailure {
  frameIndex: number;
  kind: FrameFailureKind;
  message: string;
}

export interface TransferResult {
  status: TransferStatus;
  /** Frames accepted at the link layer */
  framesSent: number;
  totalFrames: number;
  lastError: FrameFailure | null;
}

export interface TransferOptions {
  /** Maximum bytes per frame; must not exceed the transport's write size */
  frameSize: number;
  /** Re-sends allowed per frame after a failed write (default 3) */
  retryLimit?: number;
  /** Pause between consecutive frames in milliseconds (default 0) */
  frameDelayMs?: number;
  /** Pause before a re-send in milliseconds (default 0) */
  retryDelayMs?: number;
  /** Aborting stops the transfer before the next frame */
  signal?: AbortSignal;
  onProgress?: (framesSent: number, totalFrames: number) => void;
}
