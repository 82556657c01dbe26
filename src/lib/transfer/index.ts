export { ChunkedTransfer, DEFAULT_RETRY_LIMIT } from "./chunked-transfer.ts";
export { TransferSession } from "./transfer-session.ts";
export { splitFrames } from "./frames.ts";
export type * from "./types.ts";
