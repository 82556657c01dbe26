import { describe, test, expect } from "vitest";
import { helpText, parseCommand, parseHex, unescapeLiteral } from "./command-parser.ts";
import type { MacroTable } from "../protocol/index.ts";
import { CommandParseError } from "../utils/errors.ts";
import { expectHex } from "../../__tests__/utils/test-helpers.ts";

const bytesOf = (line: string, macros?: MacroTable): Buffer => {
  const command = parseCommand(line, macros);
  if (command.kind !== "send") {
    throw new Error(`expected a send command, got ${command.kind}`);
  }
  return command.bytes;
};

describe("command parser", () => {
  describe("parseCommand() - keywords", () => {
    test("blank lines are empty", () => {
      expect(parseCommand("")).toEqual({ kind: "empty" });
      expect(parseCommand("   \t")).toEqual({ kind: "empty" });
    });

    test("quit and exit, any case", () => {
      expect(parseCommand("quit")).toEqual({ kind: "quit" });
      expect(parseCommand(" EXIT ")).toEqual({ kind: "quit" });
    });

    test("help", () => {
      expect(parseCommand("help")).toEqual({ kind: "help" });
    });
  });

  describe("parseCommand() - hex", () => {
    test("hex keyword with spaces", () => {
      expectHex(bytesOf("hex 01 00 00 00 50 00 02 00"), "0100000050000200");
    });

    test("0x prefix", () => {
      expectHex(bytesOf("0x0d0a"), "0d0a");
    });

    test("colon and dash separators", () => {
      expectHex(bytesOf("hex de:ad-BE ef"), "deadbeef");
    });

    test("source is hex", () => {
      expect(parseCommand("0xff")).toEqual({
        kind: "send",
        source: "hex",
        bytes: Buffer.from([0xff]),
      });
    });

    test("odd digit count is rejected", () => {
      expect(() => parseCommand("hex abc")).toThrow(CommandParseError);
    });

    test("non-hex characters are rejected", () => {
      expect(() => parseCommand("0xzz")).toThrow(CommandParseError);
    });

    test("hex with no digits is rejected", () => {
      expect(() => parseCommand("hex")).toThrow(CommandParseError);
    });

    test("words starting with hex are literal text", () => {
      expect(bytesOf("hexagon").toString("latin1")).toBe("hexagon");
    });
  });

  describe("parseCommand() - macros", () => {
    test("image-header sends the upload command", () => {
      expectHex(bytesOf("!image-header"), "0100000050000200");
    });

    test("ping sends a line terminator", () => {
      expectHex(bytesOf("!ping"), "0d0a");
    });

    test("custom macro table", () => {
      const macros: MacroTable = new Map([
        ["reset", { description: "test", bytes: Buffer.from([0x99]) }],
      ]);
      expectHex(bytesOf("!reset", macros), "99");
    });

    test("macro bytes are copied", () => {
      const bytes = bytesOf("!ping");
      bytes[0] = 0;
      expectHex(bytesOf("!ping"), "0d0a");
    });

    test("unknown macro is rejected", () => {
      expect(() => parseCommand("!nope")).toThrow("Unknown macro 'nope'");
    });
  });

  describe("parseCommand() - literals", () => {
    test("plain text as latin1", () => {
      expect(parseCommand("hello")).toEqual({
        kind: "send",
        source: "literal",
        bytes: Buffer.from("hello", "latin1"),
      });
    });

    test("escapes", () => {
      expectHex(bytesOf("a\\r\\n\\t\\0\\\\\\x7f"), "610d0a09005c7f");
    });

    test("surrounding whitespace is kept", () => {
      expectHex(bytesOf(" a "), "206120");
    });
  });

  describe("unescapeLiteral()", () => {
    test("trailing backslash is rejected", () => {
      expect(() => unescapeLiteral("abc\\")).toThrow(CommandParseError);
    });

    test("unknown escape is rejected", () => {
      expect(() => unescapeLiteral("\\q")).toThrow("Unknown escape '\\q'");
    });

    test("short \\x is rejected", () => {
      expect(() => unescapeLiteral("\\x4")).toThrow(CommandParseError);
    });

    test("characters outside latin1 are rejected", () => {
      expect(() => unescapeLiteral("☃")).toThrow(CommandParseError);
    });

    test("latin1 characters map to one byte", () => {
      expectHex(unescapeLiteral("é"), "e9");
    });
  });

  describe("parseHex()", () => {
    test("mixed case", () => {
      expectHex(parseHex("aBcD"), "abcd");
    });
  });

  describe("helpText()", () => {
    test("lists every macro", () => {
      const lines = helpText();
      expect(lines.some((line) => line.includes("!image-header"))).toBe(true);
      expect(lines.some((line) => line.includes("!ping"))).toBe(true);
    });
  });
});
