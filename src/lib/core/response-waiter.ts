import type { Transport } from "../ble/transport.ts";
import { ResponseParser } from "../protocol/index.ts";
import type { ParsedResponse } from "../protocol/index.ts";
import { logger } from "../utils/logger.ts";

type Waiter = {
  expected: string;
  resolve: (matched: boolean) => void;
  timeoutId: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort: () => void;
};

/**
 * Collects notifications from the projector and lets the upload sequence
 * wait for a given response text
 */
export class ResponseWaiter {
  private received: ParsedResponse[] = [];
  private waiters = new Set<Waiter>();
  private unsubscribe: (() => void) | null;

  constructor(transport: Transport) {
    this.unsubscribe = transport.onNotification((data) =>
      this.handleNotification(data),
    );
  }

  private handleNotification(data: Buffer): void {
    const parsed = ResponseParser.parse(data);
    if (!parsed.rawText) {
      return;
    }

    this.received.push(parsed);
    logger.info(`Device: ${parsed.rawText}`);

    for (const waiter of this.waiters) {
      if (ResponseParser.contains(parsed.rawText, waiter.expected)) {
        this.settle(waiter, true);
      }
    }
  }

  /**
   * Wait for a notification whose text contains `expected` (case-insensitive)
   *
   * Notifications already received count.
   * @returns False when nothing matched within `timeoutMs` or `signal` aborted
   */
  public waitFor(
    expected: string,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (this.received.some((parsed) => ResponseParser.contains(parsed.rawText, expected))) {
      return Promise.resolve(true);
    }
    if (!this.unsubscribe || signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        expected,
        resolve,
        timeoutId: setTimeout(() => this.settle(waiter, false), timeoutMs),
        signal,
        onAbort: () => this.settle(waiter, false),
      };
      this.waiters.add(waiter);
      signal?.addEventListener("abort", waiter.onAbort, { once: true });
    });
  }

  /**
   * Stop listening; pending waits resolve false
   */
  public dispose(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const waiter of this.waiters) {
      this.settle(waiter, false);
    }
  }

  private settle(waiter: Waiter, matched: boolean): void {
    if (!this.waiters.delete(waiter)) {
      return;
    }
    clearTimeout(waiter.timeoutId);
    waiter.signal?.removeEventListener("abort", waiter.onAbort);
    waiter.resolve(matched);
  }
}
