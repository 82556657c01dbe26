import type { ResponseStatus } from "../response-types.ts";

/**
 * Parsed notification from the device
 */
export interface ParsedResponse {
  /**
   * Notification decoded as ASCII with NULs removed and whitespace trimmed
   *
   * Empty when the notification carried no printable text.
   */
  rawText: string;

  /**
   * Known response contained in the text, if any
   */
  status: ResponseStatus | null;
}
