// Constants
export * from "./constants.ts";

// Enums
export * from "./response-types.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Builders
export { CommandBuilder } from "./builders/command-builder.ts";
export { PayloadBuilder } from "./builders/payload-builder.ts";

// Parsers
export { ResponseParser } from "./parsers/response-parser.ts";

// Shell macros
export { DEFAULT_MACROS, type MacroTable } from "./macros.ts";
