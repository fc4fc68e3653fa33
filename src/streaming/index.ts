export { BoundedChannel } from "./channel";
export {
  DEFAULT_STREAM_BUFFER_SIZE,
  DONE_SENTINEL_LINE,
  LineBuffer,
  collectTokens,
  createTokenStream,
  decodeJsonStream,
  decodeLine,
  readableToChunks,
  type DecodeJsonStreamOptions,
} from "./decoder";
export {
  contentToken,
  errorResult,
  finishToken,
  type ChunkInput,
  type ChunkSource,
  type StreamingToken,
  type TokenResult,
  type TokenStream,
} from "./types";
