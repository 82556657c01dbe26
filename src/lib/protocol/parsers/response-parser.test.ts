import { describe, test, expect } from "vitest";
import { ResponseParser } from "./response-parser.ts";
import { ResponseStatus } from "../response-types.ts";

describe("ResponseParser", () => {
  describe("parse() - basic parsing", () => {
    test("empty buffer returns empty text and no status", () => {
      const result = ResponseParser.parse(Buffer.alloc(0));
      expect(result.rawText).toBe("");
      expect(result.status).toBeNull();
    });

    test("removes null bytes", () => {
      const result = ResponseParser.parse(Buffer.from("\x00OK\x00"));
      expect(result.rawText).toBe("OK");
    });

    test("drops bytes outside 7-bit ASCII", () => {
      const result = ResponseParser.parse(Buffer.from([0xd1, 0x68, 0x69, 0xff]));
      expect(result.rawText).toBe("hi");
    });

    test("trims whitespace", () => {
      const result = ResponseParser.parse(Buffer.from("  Done\r\n"));
      expect(result.rawText).toBe("Done");
    });
  });

  describe("parse() - status detection", () => {
    test("detects OK", () => {
      expect(ResponseParser.parse(Buffer.from("OK")).status).toBe(ResponseStatus.OK);
    });

    test("detects ok case-insensitively", () => {
      expect(ResponseParser.parse(Buffer.from("ok\r\n")).status).toBe(
        ResponseStatus.OK,
      );
    });

    test("detects Done", () => {
      expect(ResponseParser.parse(Buffer.from("Done")).status).toBe(
        ResponseStatus.DONE,
      );
    });

    test("prefers Done when both are present", () => {
      expect(ResponseParser.parse(Buffer.from("OK Done")).status).toBe(
        ResponseStatus.DONE,
      );
    });

    test("unknown text has no status", () => {
      expect(ResponseParser.parse(Buffer.from("ready")).status).toBeNull();
    });
  });

  describe("contains()", () => {
    test("matches regardless of case", () => {
      expect(ResponseParser.contains("Upload DONE", "done")).toBe(true);
    });

    test("returns false when absent", () => {
      expect(ResponseParser.contains("busy", "ok")).toBe(false);
    });
  });

  describe("format()", () => {
    test("printable notifications are shown as text", () => {
      expect(ResponseParser.format(Buffer.from("OK\r\n"))).toBe("OK");
    });

    test("binary notifications are shown as hex", () => {
      expect(ResponseParser.format(Buffer.from([0x01, 0x02, 0xff]))).toBe(
        "<0102ff>",
      );
    });

    test("notifications with no text are shown as hex", () => {
      expect(ResponseParser.format(Buffer.from([0x00, 0x00]))).toBe("<0000>");
    });
  });
});
