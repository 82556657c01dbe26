export {
  helpText,
  parseCommand,
  parseHex,
  unescapeLiteral,
  type ParsedCommand,
} from "./command-parser.ts";
export {
  ShellSession,
  type ShellEntry,
  type ShellEntryKind,
  type ShellOutcome,
  type ShellSessionOptions,
} from "./shell-session.ts";
export { ShellConnection, type OpenedShell } from "./shell-connection.ts";
