import { describe, test, expect } from "vitest";
import { CommandBuilder } from "./command-builder.ts";
import { ConfigurationError } from "../../utils/errors.ts";
import { expectHex } from "../../../__tests__/utils/test-helpers.ts";

describe("CommandBuilder", () => {
  describe("buildSendImage()", () => {
    test("80-byte frames produce 01 00 00 00 50 00 02 00", () => {
      expectHex(CommandBuilder.buildSendImage(80), "0100000050000200");
    });

    test("command is always 8 bytes", () => {
      expect(CommandBuilder.buildSendImage(1).length).toBe(8);
      expect(CommandBuilder.buildSendImage(0xffff).length).toBe(8);
    });

    test("frame size is little-endian", () => {
      expectHex(CommandBuilder.buildSendImage(0x01f4), "01000000f4010200");
    });

    test("rejects zero frame size", () => {
      expect(() => CommandBuilder.buildSendImage(0)).toThrow(ConfigurationError);
    });

    test("rejects negative and fractional frame sizes", () => {
      expect(() => CommandBuilder.buildSendImage(-5)).toThrow(ConfigurationError);
      expect(() => CommandBuilder.buildSendImage(12.5)).toThrow(
        ConfigurationError,
      );
    });

    test("rejects frame sizes that do not fit in 16 bits", () => {
      expect(() => CommandBuilder.buildSendImage(0x10000)).toThrow(
        ConfigurationError,
      );
    });
  });
});
