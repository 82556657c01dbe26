import { describe, test, expect } from "vitest";
import sharp from "sharp";
import { ImageEncoder } from "./image-encoder.ts";
import { DEFAULT_IMAGE_CONFIG } from "../protocol/interfaces/defaults.ts";
import { EncodingError } from "../utils/errors.ts";
import {
  createPngFromPixels,
  createSolidPng,
} from "../../__tests__/utils/test-helpers.ts";

/**
 * 640x480 gradient with a colour cast, so resizing has real work to do
 */
const createGradientPng = async (): Promise<Buffer> => {
  const width = 640;
  const height = 480;
  const pixels = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 3;
      pixels[offset] = Math.floor((x / width) * 255);
      pixels[offset + 1] = Math.floor((y / height) * 255);
      pixels[offset + 2] = 96;
    }
  }
  return createPngFromPixels(width, height, pixels);
};

describe("ImageEncoder", () => {
  const encoder = new ImageEncoder(DEFAULT_IMAGE_CONFIG);

  describe("encode() - layout", () => {
    test("640x480 RGB to 128x128 mono1 gives 128 rows of 16 bytes", async () => {
      const image = await encoder.encode(await createGradientPng(), 128, 128, "mono1");

      expect(image.header).toEqual({
        width: 128,
        height: 128,
        mode: "mono1",
        rowLength: 16,
      });
      expect(image.rows).toHaveLength(128);
      expect(image.rows.every((row) => row.length === 16)).toBe(true);
    });

    test("defaults to the device's 160x120 rgb565 format", async () => {
      const image = await encoder.encode(await createGradientPng());

      expect(image.header).toEqual({
        width: 160,
        height: 120,
        mode: "rgb565",
        rowLength: 320,
      });
      expect(image.rows).toHaveLength(120);
    });

    test("rowLength option pads rows", async () => {
      const image = await encoder.encode(
        await createSolidPng(8, 2, { r: 255, g: 255, b: 255 }),
        8,
        2,
        "mono1",
        { rowLength: 4 },
      );
      expect(image.rows.map((row) => row.toString("hex"))).toEqual([
        "ff000000",
        "ff000000",
      ]);
    });

    test("the encoded image is frozen", async () => {
      const image = await encoder.encode(
        await createSolidPng(4, 4, { r: 0, g: 0, b: 0 }),
        4,
        4,
      );
      expect(Object.isFrozen(image)).toBe(true);
      expect(Object.isFrozen(image.rows)).toBe(true);
    });
  });

  describe("encode() - pixel values", () => {
    test("solid red encodes as little-endian 0xF800", async () => {
      const image = await encoder.encode(
        await createSolidPng(4, 2, { r: 255, g: 0, b: 0 }),
        4,
        2,
        "rgb565",
      );
      expect(image.rows.map((row) => row.toString("hex"))).toEqual([
        "00f800f800f800f8",
        "00f800f800f800f8",
      ]);
    });

    test("solid white grey8 is all 0xff", async () => {
      const image = await encoder.encode(
        await createSolidPng(3, 1, { r: 255, g: 255, b: 255 }),
        3,
        1,
        "grey8",
      );
      expect(image.rows[0]?.toString("hex")).toBe("ffffff");
    });

    test("contain letterboxes onto black", async () => {
      // 4x1 white strip fitted into 4x4: rows above and below stay black
      const image = await encoder.encode(
        await createSolidPng(4, 1, { r: 255, g: 255, b: 255 }),
        4,
        4,
        "grey8",
        { fit: "contain" },
      );
      expect(image.rows[0]?.toString("hex")).toBe("00000000");
      expect(image.rows[3]?.toString("hex")).toBe("00000000");
    });

    test("transparent pixels are flattened onto black", async () => {
      const png = await sharp({
        create: {
          width: 2,
          height: 2,
          channels: 4,
          background: { r: 255, g: 255, b: 255, alpha: 0 },
        },
      })
        .png()
        .toBuffer();
      const image = await encoder.encode(png, 2, 2, "grey8");
      expect(image.rows.map((row) => row.toString("hex"))).toEqual(["0000", "0000"]);
    });
  });

  describe("encode() - determinism", () => {
    test("identical input and parameters give byte-identical output", async () => {
      const png = await createGradientPng();
      const first = await encoder.encode(png, 160, 120, "rgb565");
      const second = await encoder.encode(png, 160, 120, "rgb565");

      expect(Buffer.concat(first.rows).equals(Buffer.concat(second.rows))).toBe(true);
    });

    test("bayer dithering is deterministic", async () => {
      const dithered = new ImageEncoder({ ...DEFAULT_IMAGE_CONFIG, dither: "bayer" });
      const png = await createGradientPng();
      const first = await dithered.encode(png, 64, 48, "mono1");
      const second = await dithered.encode(png, 64, 48, "mono1");

      expect(Buffer.concat(first.rows).equals(Buffer.concat(second.rows))).toBe(true);
    });
  });

  describe("encode() - errors", () => {
    test("undecodable bytes raise EncodingError", async () => {
      await expect(
        encoder.encode(Buffer.from("definitely not an image")),
      ).rejects.toThrow(EncodingError);
    });

    test("missing file raises EncodingError", async () => {
      await expect(encoder.encode("/non/existent/path.png")).rejects.toThrow(
        EncodingError,
      );
    });

    test("zero target size raises EncodingError", async () => {
      const png = await createSolidPng(4, 4, { r: 0, g: 0, b: 0 });
      await expect(encoder.encode(png, 0, 120)).rejects.toThrow(EncodingError);
      await expect(encoder.encode(png, 160, 0)).rejects.toThrow(EncodingError);
    });

    test("fractional target size raises EncodingError", async () => {
      const png = await createSolidPng(4, 4, { r: 0, g: 0, b: 0 });
      await expect(encoder.encode(png, 10.5, 10)).rejects.toThrow(EncodingError);
    });
  });

  describe("generateCheckerboard()", () => {
    test("generates a PNG of the default size", async () => {
      const png = await encoder.generateCheckerboard();
      const metadata = await sharp(png).metadata();
      expect(metadata.format).toBe("png");
      expect(metadata.width).toBe(160);
      expect(metadata.height).toBe(120);
    });

    test("top-left square is black and its neighbour white", async () => {
      const png = await encoder.generateCheckerboard([16, 16], 2);
      const image = await encoder.encode(png, 16, 16, "grey8");
      expect(image.rows[0]?.[0]).toBe(0);
      expect(image.rows[0]?.[15]).toBe(255);
    });
  });
});
