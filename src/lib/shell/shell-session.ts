import type { Transport } from "../ble/transport.ts";
import type { MacroTable } from "../protocol/index.ts";
import { DEFAULT_MACROS, ResponseParser } from "../protocol/index.ts";
import { ChunkedTransfer, DEFAULT_RETRY_LIMIT } from "../transfer/index.ts";
import { CommandParseError } from "../utils/errors.ts";
import { logger } from "../utils/logger.ts";
import { helpText, parseCommand, type ParsedCommand } from "./command-parser.ts";

export type ShellEntryKind = "input" | "sent" | "notification" | "info" | "error";

export interface ShellEntry {
  id: number;
  kind: ShellEntryKind;
  text: string;
  time: number;
}

export type ShellOutcome = "continue" | "quit";

export interface ShellSessionOptions {
  macros?: MacroTable;
  retryLimit?: number;
  retryDelayMs?: number;
}

type EntryListener = (entry: ShellEntry) => void;

/**
 * Interactive command session over one connected transport
 *
 * Lines are handled strictly one after another through a promise queue, so
 * the caller can keep reading input while a command is still being written.
 * Notifications are reported as entries the moment they arrive.
 */
export class ShellSession {
  private chunked: ChunkedTransfer;
  private macros: MacroTable;
  private retryLimit: number;
  private retryDelayMs: number;

  private listeners = new Set<EntryListener>();
  private queue: Promise<unknown> = Promise.resolve();
  private controller = new AbortController();
  private unsubscribe: () => void;
  private nextId = 0;
  private closing: Promise<void> | null = null;

  constructor(
    private transport: Transport,
    options: ShellSessionOptions = {},
  ) {
    this.chunked = new ChunkedTransfer(transport);
    this.macros = options.macros ?? DEFAULT_MACROS;
    this.retryLimit = options.retryLimit ?? DEFAULT_RETRY_LIMIT;
    this.retryDelayMs = options.retryDelayMs ?? 0;
    this.unsubscribe = transport.onNotification((data) =>
      this.emit("notification", ResponseParser.format(data)),
    );
  }

  public get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Registers a callback for every shell entry
   * @returns Unsubscribe function
   */
  public onEntry(listener: EntryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queue one line of input
   *
   * Parse errors and failed transfers are reported as error entries and
   * the session continues. Any other error rejects the returned promise.
   * @returns "quit" when the line asks to leave the shell
   */
  public submit(line: string): Promise<ShellOutcome> {
    if (this.closing) {
      return Promise.resolve("quit");
    }
    this.emit("input", line);

    const run = this.queue.then(() => this.execute(line));
    // Keep the queue alive after a rejected command; the caller sees the error
    this.queue = run.catch((error: unknown) => {
      logger.debug(`Shell command failed: ${error}`);
    });
    return run;
  }

  private async execute(line: string): Promise<ShellOutcome> {
    if (this.closing) {
      return "quit";
    }

    let command: ParsedCommand;
    try {
      command = parseCommand(line, this.macros);
    } catch (error) {
      if (error instanceof CommandParseError) {
        this.emit("error", error.message);
        return "continue";
      }
      throw error;
    }

    switch (command.kind) {
      case "empty":
        return "continue";
      case "quit":
        return "quit";
      case "help":
        for (const text of helpText(this.macros)) {
          this.emit("info", text);
        }
        return "continue";
      case "send":
        await this.send(command.bytes);
        return "continue";
    }
  }

  private async send(bytes: Buffer): Promise<void> {
    const result = await this.chunked.transfer(bytes, {
      frameSize: this.transport.writeSize,
      retryLimit: this.retryLimit,
      retryDelayMs: this.retryDelayMs,
      signal: this.controller.signal,
    });

    if (result.status === "completed") {
      this.emit("sent", `Sent ${bytes.length} byte(s): ${bytes.toString("hex")}`);
    } else {
      this.emit(
        "error",
        `Send failed at frame ${result.lastError?.frameIndex ?? 0}: ${result.lastError?.message ?? "unknown error"}`,
      );
    }
  }

  /**
   * Cancel any running send after its current frame, wait for queued lines
   * to settle and disconnect. Safe to call more than once.
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.controller.abort();
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    await this.queue;
    this.unsubscribe();
    await this.transport.disconnect();
    this.emit("info", "Disconnected");
  }

  private emit(kind: ShellEntryKind, text: string): void {
    const entry: ShellEntry = { id: this.nextId++, kind, text, time: Date.now() };
    this.listeners.forEach((listener) => listener(entry));
  }
}
