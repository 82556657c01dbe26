import type { TransferStatus } from "./types.ts";
import { TransferStateError } from "../utils/errors.ts";

const ALLOWED_TRANSITIONS: Record<TransferStatus, readonly TransferStatus[]> = {
  pending: ["in_progress", "failed"],
  in_progress: ["completed", "failed"],
  completed: [],
  failed: [],
};

/**
 * Book-keeping for one in-flight transfer
 *
 * Status only moves forward: pending -> in_progress -> completed | failed.
 * A transfer cancelled before its first frame goes straight to failed.
 */
export class TransferSession {
  private _status: TransferStatus = "pending";
  private _nextIndex = 0;
  private readonly retries: number[];

  constructor(public readonly totalFrames: number) {
    this.retries = new Array<number>(totalFrames).fill(0);
  }

  public get status(): TransferStatus {
    return this._status;
  }

  /** Index of the next frame to send; equals the number of frames sent */
  public get nextIndex(): number {
    return this._nextIndex;
  }

  public get isActive(): boolean {
    return this._status === "in_progress";
  }

  public start(): void {
    this.transition("in_progress");
  }

  public complete(): void {
    if (this._nextIndex !== this.totalFrames) {
      throw new TransferStateError(
        `Cannot complete with ${this.totalFrames - this._nextIndex} frame(s) unsent`,
      );
    }
    this.transition("completed");
  }

  public fail(): void {
    this.transition("failed");
  }

  /**
   * Record that frame `index` was accepted; frames must be acknowledged in order
   */
  public markSent(index: number): void {
    if (this._status !== "in_progress") {
      throw new TransferStateError(`Cannot send frames while ${this._status}`);
    }
    if (index !== this._nextIndex) {
      throw new TransferStateError(
        `Frame ${index} sent out of order, expected ${this._nextIndex}`,
      );
    }
    this._nextIndex++;
  }

  /**
   * Count one more re-send of frame `index`
   * @returns Re-sends so far for that frame
   */
  public recordRetry(index: number): number {
    const count = (this.retries[index] ?? 0) + 1;
    this.retries[index] = count;
    return count;
  }

  public retriesFor(index: number): number {
    return this.retries[index] ?? 0;
  }

  private transition(next: TransferStatus): void {
    if (!ALLOWED_TRANSITIONS[this._status].includes(next)) {
      throw new TransferStateError(
        `Illegal transfer status change: ${this._status} -> ${next}`,
      );
    }
    this._status = next;
  }
}
