import { describe, test, expect } from "vitest";
import { ShellConnection } from "./shell-connection.ts";
import { CancelledError, ConnectionError } from "../utils/errors.ts";
import { FakeTransport, fakeDevice } from "../../__tests__/utils/fake-transport.ts";

/**
 * Open hook that blocks like a scan with no device in range, until aborted
 */
const scanUntilAborted = (signal?: AbortSignal): Promise<void> =>
  new Promise((_, reject) => {
    signal?.addEventListener("abort", () => reject(new CancelledError("Scan cancelled")));
  });

describe("ShellConnection", () => {
  describe("open()", () => {
    test("connects and starts a session", async () => {
      const transport = new FakeTransport();
      const connection = new ShellConnection(transport);

      const opened = await connection.open();

      expect(opened?.device).toEqual(fakeDevice);
      expect(connection.current).toBe(opened?.session);
      expect(transport.openCount).toBe(1);
    });

    test("a failed connect disconnects and rethrows", async () => {
      const transport = new FakeTransport();
      transport.openHook = () => {
        throw new ConnectionError("characteristic missing");
      };
      const connection = new ShellConnection(transport);

      await expect(connection.open()).rejects.toThrow("characteristic missing");
      expect(transport.disconnectCount).toBe(1);
      expect(connection.current).toBeNull();
    });
  });

  describe("close()", () => {
    test("stops a pending scan and disconnects", async () => {
      const transport = new FakeTransport();
      transport.openHook = scanUntilAborted;
      const connection = new ShellConnection(transport);

      const opening = connection.open();
      await connection.close();

      await expect(opening).resolves.toBeNull();
      expect(transport.disconnectCount).toBe(1);
      expect(connection.current).toBeNull();
      expect(connection.isClosed).toBe(true);
    });

    test("drops a link that came up after close", async () => {
      const transport = new FakeTransport();
      let finishConnect = () => {};
      transport.openHook = () =>
        new Promise<void>((resolve) => {
          finishConnect = () => resolve();
        });
      const connection = new ShellConnection(transport);

      const opening = connection.open();
      const closing = connection.close();
      finishConnect();

      await expect(opening).resolves.toBeNull();
      await closing;
      expect(transport.disconnectCount).toBe(2);
      expect(connection.current).toBeNull();
    });

    test("closes an open session once", async () => {
      const transport = new FakeTransport();
      const connection = new ShellConnection(transport);
      const opened = await connection.open();

      await Promise.all([connection.close(), connection.close()]);

      expect(opened?.session.isClosed).toBe(true);
      expect(transport.disconnectCount).toBe(1);
    });
  });
});
