import { describe, test, expect } from "vitest";
import { SketcherUploader } from "./sketcher-uploader.ts";
import {
  DEFAULT_IMAGE_CONFIG,
  DEFAULT_PROTOCOL_CONFIG,
} from "../protocol/index.ts";
import type { ImageConfig, ProtocolConfig } from "../protocol/index.ts";
import {
  DeviceResponseError,
  EncodingError,
  TransferFailedError,
  WriteError,
} from "../utils/errors.ts";
import { FakeTransport } from "../../__tests__/utils/fake-transport.ts";
import { createSolidPng, expectHex } from "../../__tests__/utils/test-helpers.ts";

const protocolConfig: ProtocolConfig = {
  ...DEFAULT_PROTOCOL_CONFIG,
  packetDelay: 0,
  retryDelay: 0,
  readyTimeout: 0.05,
  completionTimeout: 0.05,
};

// 16x8 rgb565 = 256 bytes = frames of 80, 80, 80, 16
const imageConfig: ImageConfig = {
  ...DEFAULT_IMAGE_CONFIG,
  defaultSize: [16, 8],
};

/**
 * Fake projector: answers the upload command with "OK" and the last data
 * frame with "Done"
 */
const createDevice = (
  options: { ok?: boolean; done?: boolean; writeSize?: number } = {},
) => {
  const { ok = true, done = true, writeSize } = options;
  const transport = new FakeTransport(writeSize);
  let received = 0;
  transport.writeHook = (data, attempt) => {
    if (attempt === 0) {
      if (ok) transport.notify("OK");
      return;
    }
    received += data.length;
    if (done && received === 256) {
      transport.notify("Done\x00");
    }
  };
  return transport;
};

describe("SketcherUploader", () => {
  describe("uploadImage()", () => {
    test("sends the command, then the reversed raster in 80-byte frames", async () => {
      const transport = createDevice();
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      const result = await uploader.uploadImage(
        await createSolidPng(16, 8, { r: 255, g: 0, b: 0 }),
      );

      expectHex(transport.attempts[0] ?? Buffer.alloc(0), "0100000050000200");
      expect(transport.delivered.slice(1).map((frame) => frame.length)).toEqual([
        80, 80, 80, 16,
      ]);
      // rows are 00 f8 per pixel; reversed they read f8 00
      const data = Buffer.concat(transport.delivered.slice(1));
      expect(data.equals(Buffer.from("f800".repeat(128), "hex"))).toBe(true);

      expect(result.acknowledged).toBe(true);
      expect(result.image).toEqual({
        width: 16,
        height: 8,
        mode: "rgb565",
        rowLength: 32,
      });
      expect(result.transfer).toEqual({
        status: "completed",
        framesSent: 4,
        totalFrames: 4,
        lastError: null,
      });
    });

    test("reports data frame progress", async () => {
      const uploader = new SketcherUploader(
        createDevice(),
        protocolConfig,
        imageConfig,
      );
      const progress: number[] = [];

      await uploader.uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }), {
        onProgress: (sent) => progress.push(sent),
      });

      expect(progress).toEqual([1, 2, 3, 4]);
    });

    test("frame size is capped at the link's write size", async () => {
      const transport = createDevice({ writeSize: 64 });
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      await uploader.uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }));

      expect(uploader.frameSize).toBe(64);
      expectHex(transport.attempts[0] ?? Buffer.alloc(0), "0100000040000200");
      expect(transport.delivered).toHaveLength(1 + 4);
    });

    test("a missing 'Done' still succeeds", async () => {
      const transport = createDevice({ done: false });
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      const result = await uploader.uploadImage(
        await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }),
      );

      expect(result.acknowledged).toBe(false);
      expect(result.transfer.status).toBe("completed");
    });

    test("no 'OK' raises DeviceResponseError before any data is sent", async () => {
      const transport = createDevice({ ok: false });
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      await expect(
        uploader.uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 })),
      ).rejects.toThrow(DeviceResponseError);
      expect(transport.attempts).toHaveLength(1);
    });

    test("a failed data transfer raises TransferFailedError with the result", async () => {
      const transport = createDevice();
      transport.writeHook = (_data, attempt) => {
        if (attempt === 0) {
          transport.notify("OK");
        } else if (attempt >= 2) {
          throw new WriteError("link lost");
        }
      };
      const uploader = new SketcherUploader(
        transport,
        { ...protocolConfig, retryLimit: 1 },
        imageConfig,
      );

      const error = await uploader
        .uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }))
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransferFailedError);
      if (error instanceof TransferFailedError) {
        expect(error.message).toBe("link lost");
        expect(error.result.framesSent).toBe(1);
        expect(error.result.lastError).toEqual({
          frameIndex: 1,
          kind: "WriteError",
          message: "link lost",
        });
      }
    });

    test("an aborted signal fails the upload before the command is written", async () => {
      const controller = new AbortController();
      controller.abort();
      const transport = createDevice();
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      const error = await uploader
        .uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }), {
          signal: controller.signal,
        })
        .catch((e: unknown) => e);

      expect(transport.attempts).toEqual([]);
      expect(error).toBeInstanceOf(TransferFailedError);
      if (error instanceof TransferFailedError) {
        expect(error.result.lastError?.kind).toBe("Cancelled");
      }
    });

    test("aborting while waiting for 'OK' cancels without waiting out the timeout", async () => {
      const controller = new AbortController();
      const transport = createDevice({ ok: false });
      transport.writeHook = () => controller.abort();
      const uploader = new SketcherUploader(
        transport,
        { ...protocolConfig, readyTimeout: 60 },
        imageConfig,
      );

      const error = await uploader
        .uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }), {
          signal: controller.signal,
        })
        .catch((e: unknown) => e);

      expect(transport.attempts).toHaveLength(1);
      expect(error).toBeInstanceOf(TransferFailedError);
      if (error instanceof TransferFailedError) {
        expect(error.result.lastError).toEqual({
          frameIndex: 0,
          kind: "Cancelled",
          message: "Cancelled by user before the first frame",
        });
      }
    });

    test("aborting while waiting for 'Done' returns unacknowledged", async () => {
      const controller = new AbortController();
      const transport = createDevice({ done: false });
      const answer = transport.writeHook;
      transport.writeHook = async (data, attempt) => {
        await answer?.(data, attempt);
        // last of the four data frames
        if (attempt === 4) controller.abort();
      };
      const uploader = new SketcherUploader(
        transport,
        { ...protocolConfig, completionTimeout: 60 },
        imageConfig,
      );

      const result = await uploader.uploadImage(
        await createSolidPng(16, 8, { r: 0, g: 0, b: 0 }),
        { signal: controller.signal },
      );

      expect(result.acknowledged).toBe(false);
      expect(result.transfer.status).toBe("completed");
    });

    test("stops listening for notifications afterwards", async () => {
      const transport = createDevice();
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      await uploader.uploadImage(await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }));

      expect(transport.listenerCount).toBe(0);
    });

    test("undecodable input raises EncodingError without writing", async () => {
      const transport = createDevice();
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      await expect(uploader.uploadImage(Buffer.from("not an image"))).rejects.toThrow(
        EncodingError,
      );
      expect(transport.attempts).toHaveLength(0);
    });
  });

  describe("uploadCheckerboard()", () => {
    test("uploads a generated pattern", async () => {
      const transport = createDevice();
      const uploader = new SketcherUploader(transport, protocolConfig, imageConfig);

      const result = await uploader.uploadCheckerboard(2);

      expect(result.acknowledged).toBe(true);
      expect(transport.delivered).toHaveLength(1 + 4);
    });
  });
});
