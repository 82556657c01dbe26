import { CommandBuilder } from "./builders/command-builder.ts";
import { DEFAULT_PROTOCOL_CONFIG } from "./interfaces/defaults.ts";

/**
 * Named byte sequences available in the shell as `!name`
 */
export type MacroTable = ReadonlyMap<string, { description: string; bytes: Buffer }>;

export const DEFAULT_MACROS: MacroTable = new Map([
  [
    "image-header",
    {
      description: `SEND_IMAGE command for ${DEFAULT_PROTOCOL_CONFIG.frameSize}-byte frames (device answers "OK")`,
      bytes: CommandBuilder.buildSendImage(DEFAULT_PROTOCOL_CONFIG.frameSize),
    },
  ],
  [
    "ping",
    {
      description: "Bare line terminator",
      bytes: Buffer.from("\r\n", "latin1"),
    },
  ],
]);
