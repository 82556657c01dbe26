export * from "./config.ts";
export * from "./defaults.ts";
export * from "./parsed-response.ts";
