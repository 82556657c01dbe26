import type { ConnectableTransport, DeviceHandle } from "../ble/transport.ts";
import { logger } from "../utils/logger.ts";
import { ShellSession, type ShellSessionOptions } from "./shell-session.ts";

export interface OpenedShell {
  device: DeviceHandle;
  session: ShellSession;
}

/**
 * Owns the transport for the lifetime of the shell
 *
 * `close()` works in every phase: while scanning or connecting it aborts
 * the attempt and disconnects, afterwards it closes the session.
 */
export class ShellConnection {
  private controller = new AbortController();
  private session: ShellSession | null = null;
  private closing: Promise<void> | null = null;

  constructor(
    private transport: ConnectableTransport,
    private options: ShellSessionOptions = {},
  ) {}

  public get current(): ShellSession | null {
    return this.session;
  }

  public get isClosed(): boolean {
    return this.closing !== null;
  }

  /**
   * Connect and start a session
   *
   * @returns null when the connection was closed before the link came up
   * @throws the transport's error when connecting fails
   */
  public async open(): Promise<OpenedShell | null> {
    const { signal } = this.controller;
    let device: DeviceHandle;
    try {
      device = await this.transport.open(signal);
    } catch (error) {
      if (signal.aborted) {
        logger.debug(`Connection interrupted: ${error}`);
        return null;
      }
      await this.transport.disconnect();
      throw error;
    }

    if (signal.aborted) {
      await this.transport.disconnect();
      return null;
    }

    this.session = new ShellSession(this.transport, this.options);
    return { device, session: this.session };
  }

  /**
   * Abort a pending connect or close the session, then disconnect.
   * Safe to call more than once.
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.controller.abort();
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    if (this.session) {
      await this.session.close();
    } else {
      await this.transport.disconnect();
    }
  }
}
