import type { RelayError } from "../protocol";

export interface StreamingToken {
  content: string;
  isFinish: boolean;
  metadata?: unknown;
}

/** One element of a token stream. Errors travel in-band and do not end the stream. */
export type TokenResult = { ok: true; token: StreamingToken } | { ok: false; error: RelayError };

export interface TokenStream extends AsyncIterable<TokenResult> {
  /** Abandon the stream; the producer stops after at most one more send attempt. */
  cancel(): void;
  readonly cancelled: boolean;
}

export type ChunkInput = Uint8Array | string;

export type ChunkSource = AsyncIterable<ChunkInput>;

export function contentToken(content: string, metadata?: unknown): TokenResult {
  const token: StreamingToken = { content, isFinish: false };
  if (metadata !== undefined) {
    token.metadata = metadata;
  }
  return { ok: true, token };
}

export function finishToken(): TokenResult {
  return { ok: true, token: { content: "", isFinish: true } };
}

export function errorResult(error: RelayError): TokenResult {
  return { ok: false, error };
}
