import type { MacroTable } from "../protocol/index.ts";
import { DEFAULT_MACROS } from "../protocol/index.ts";
import { CommandParseError } from "../utils/errors.ts";

/**
 * One shell line, classified
 */
export type ParsedCommand =
  | { kind: "empty" }
  | { kind: "quit" }
  | { kind: "help" }
  | { kind: "send"; source: "hex" | "macro" | "literal"; bytes: Buffer };

const SIMPLE_ESCAPES: Record<string, number> = {
  n: 0x0a,
  r: 0x0d,
  t: 0x09,
  "0": 0x00,
  "\\": 0x5c,
};

/**
 * Decode hex digits, allowing whitespace, `:` and `-` between them
 */
export function parseHex(text: string): Buffer {
  const digits = text.replace(/[\s:-]/g, "");
  if (!digits) {
    throw new CommandParseError("No hex digits given");
  }
  if (!/^[0-9a-fA-F]+$/.test(digits)) {
    throw new CommandParseError(`Invalid hex digits: '${text.trim()}'`);
  }
  if (digits.length % 2 !== 0) {
    throw new CommandParseError(
      `Odd number of hex digits (${digits.length}); each byte needs two`,
    );
  }
  return Buffer.from(digits, "hex");
}

/**
 * Turn text into latin1 bytes, resolving \n \r \t \0 \\ and \xNN
 */
export function unescapeLiteral(text: string): Buffer {
  const bytes: number[] = [];

  for (let i = 0; i < text.length; i++) {
    const char = text.charCodeAt(i);
    if (char > 0xff) {
      throw new CommandParseError(
        `Character '${text[i]}' cannot be sent as a single byte; use hex instead`,
      );
    }
    if (text[i] !== "\\") {
      bytes.push(char);
      continue;
    }

    const next = text[i + 1];
    if (next === undefined) {
      throw new CommandParseError("Trailing backslash");
    }
    const simple = SIMPLE_ESCAPES[next];
    if (simple !== undefined) {
      bytes.push(simple);
      i += 1;
    } else if (next === "x") {
      const hex = text.slice(i + 2, i + 4);
      if (!/^[0-9a-fA-F]{2}$/.test(hex)) {
        throw new CommandParseError(`\\x needs two hex digits, got '${hex}'`);
      }
      bytes.push(parseInt(hex, 16));
      i += 3;
    } else {
      throw new CommandParseError(`Unknown escape '\\${next}'`);
    }
  }

  return Buffer.from(bytes);
}

/**
 * Parse one line of shell input
 *
 * @throws CommandParseError for malformed hex, unknown macros or bad escapes
 */
export function parseCommand(
  line: string,
  macros: MacroTable = DEFAULT_MACROS,
): ParsedCommand {
  const trimmed = line.trim();
  if (!trimmed) {
    return { kind: "empty" };
  }

  const keyword = trimmed.toLowerCase();
  if (keyword === "quit" || keyword === "exit") {
    return { kind: "quit" };
  }
  if (keyword === "help") {
    return { kind: "help" };
  }

  if (keyword === "hex" || keyword.startsWith("hex ")) {
    return { kind: "send", source: "hex", bytes: parseHex(trimmed.slice(3)) };
  }
  if (keyword.startsWith("0x")) {
    return { kind: "send", source: "hex", bytes: parseHex(trimmed.slice(2)) };
  }

  if (trimmed.startsWith("!")) {
    const name = trimmed.slice(1).trim();
    const macro = macros.get(name);
    if (!macro) {
      const known = [...macros.keys()].join(", ");
      throw new CommandParseError(`Unknown macro '${name}' (known: ${known})`);
    }
    return { kind: "send", source: "macro", bytes: Buffer.from(macro.bytes) };
  }

  // Literal text keeps its surrounding whitespace
  return { kind: "send", source: "literal", bytes: unescapeLiteral(line) };
}

/**
 * Help text listing the grammar and the available macros
 */
export function helpText(macros: MacroTable = DEFAULT_MACROS): string[] {
  const lines = [
    "hex <digits> | 0x<digits>   send raw bytes (separators: space : -)",
    "!<macro>                    send a named command",
    "<text>                      send text; escapes \\n \\r \\t \\0 \\\\ \\xNN",
    "help                        show this help",
    "quit | exit                 disconnect and leave",
    "Macros:",
  ];
  for (const [name, macro] of macros) {
    lines.push(`  !${name.padEnd(24)} ${macro.description}`);
  }
  return lines;
}
