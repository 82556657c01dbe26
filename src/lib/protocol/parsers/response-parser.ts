import type { ParsedResponse } from "../interfaces/parsed-response.ts";
import { ResponseStatus } from "../response-types.ts";

/**
 * Parser for notifications received from the projector
 */
export class ResponseParser {
  /**
   * Decodes a notification as ASCII and picks out a known response
   *
   * Bytes outside 7-bit ASCII are dropped and NULs removed before trimming.
   * "Done" is checked before "OK" so that a combined "OK Done" reports the
   * later stage.
   *
   * @param data - Raw notification value
   */
  public static parse(data: Buffer): ParsedResponse {
    const ascii = Buffer.from(data.filter((byte) => byte < 0x80));
    const rawText = ascii.toString("ascii").replace(/\x00/g, "").trim();

    let status: ResponseStatus | null = null;
    if (ResponseParser.contains(rawText, ResponseStatus.DONE)) {
      status = ResponseStatus.DONE;
    } else if (ResponseParser.contains(rawText, ResponseStatus.OK)) {
      status = ResponseStatus.OK;
    }

    return { rawText, status };
  }

  /**
   * Case-insensitive substring match
   */
  public static contains(text: string, expected: string): boolean {
    return text.toLowerCase().includes(expected.toLowerCase());
  }

  /**
   * Renders a notification for display: its text when it has printable
   * content, otherwise its bytes as hex
   */
  public static format(data: Buffer): string {
    const { rawText } = ResponseParser.parse(data);
    if (rawText && /^[\x20-\x7e\t\r\n]+$/.test(rawText)) {
      return rawText;
    }
    return `<${data.toString("hex")}>`;
  }
}
