import type { z } from "zod";
import { logger } from "../logger";
import { DeserializationStreamError, NetworkTransportError, toErrorMessage } from "../protocol";
import { BoundedChannel } from "./channel";
import {
  contentToken,
  errorResult,
  finishToken,
  type ChunkInput,
  type ChunkSource,
  type TokenResult,
  type TokenStream,
} from "./types";

export const DEFAULT_STREAM_BUFFER_SIZE = 100;
export const DONE_SENTINEL_LINE = "data: [DONE]";
const DATA_PREFIX = "data:";

export interface DecodeJsonStreamOptions<T> {
  bufferSize?: number;
  signal?: AbortSignal;
  /** Text for a parsed value. Returning `undefined` drops the line. Defaults to JSON. */
  render?: (value: T) => string | undefined;
  /** Called once if the consumer abandons the stream, e.g. to abort the upstream request. */
  onCancel?: () => void;
  /** Called once when the stream has ended, however it ended. */
  onClose?: () => void;
}

/**
 * Accumulates decoded text and hands back every complete line.
 * Multi-byte characters split across chunks are decoded once whole.
 */
export class LineBuffer {
  private readonly decoder = new TextDecoder();
  private buffer = "";

  push(chunk: ChunkInput): string[] {
    this.buffer += typeof chunk === "string" ? chunk : this.decoder.decode(chunk, { stream: true });
    const lines: string[] = [];
    let newlineIndex = this.buffer.indexOf("\n");
    while (newlineIndex >= 0) {
      lines.push(this.buffer.slice(0, newlineIndex));
      this.buffer = this.buffer.slice(newlineIndex + 1);
      newlineIndex = this.buffer.indexOf("\n");
    }
    return lines;
  }

  /** Whatever is left without a line terminator. */
  flush(): string {
    const rest = this.buffer + this.decoder.decode();
    this.buffer = "";
    return rest;
  }
}

function stripDataPrefix(line: string): string {
  if (!line.startsWith(DATA_PREFIX)) {
    return line;
  }
  return line.slice(DATA_PREFIX.length).trimStart();
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Turns one raw line into a stream element, or `null` when the line carries nothing.
 */
export function decodeLine<T>(
  rawLine: string,
  schema: z.ZodType<T>,
  render: (value: T) => string | undefined = (value) => JSON.stringify(value),
): TokenResult | null {
  const line = rawLine.trim();
  if (line.length === 0 || line === DONE_SENTINEL_LINE) {
    return null;
  }

  const json = stripDataPrefix(line);
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return errorResult(new DeserializationStreamError(toErrorMessage(error), line));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return errorResult(new DeserializationStreamError(describeIssues(result.error), line));
  }

  const content = render(result.data);
  if (content === undefined) {
    return null;
  }
  return contentToken(content, result.data);
}

async function closeSource(iterator: AsyncIterator<ChunkInput>): Promise<void> {
  if (!iterator.return) {
    return;
  }
  try {
    await iterator.return();
  } catch (error) {
    logger.debug({ err: error }, "Chunk source failed to close after cancellation");
  }
}

function cancellation(channel: BoundedChannel<TokenResult>): Promise<"cancelled"> {
  return new Promise((resolve) => {
    channel.onCancel(() => resolve("cancelled"));
  });
}

async function pumpJsonStream<T>(
  source: ChunkSource,
  schema: z.ZodType<T>,
  channel: BoundedChannel<TokenResult>,
  options: DecodeJsonStreamOptions<T>,
): Promise<void> {
  const lines = new LineBuffer();
  const iterator = source[Symbol.asyncIterator]();
  const cancelled = cancellation(channel);
  const signal = options.signal;
  const onAbort = () => channel.cancel();
  signal?.addEventListener("abort", onAbort, { once: true });
  if (signal?.aborted) {
    channel.cancel();
  }
  let sourceFailed = false;

  try {
    reading: while (!channel.cancelled) {
      let next: IteratorResult<ChunkInput> | "cancelled";
      const pending = iterator.next();
      pending.catch((error: unknown) => {
        if (channel.cancelled) {
          logger.debug({ err: error }, "Chunk source failed after cancellation");
        }
      });
      try {
        next = await Promise.race([pending, cancelled]);
      } catch (error) {
        sourceFailed = true;
        await channel.send(
          errorResult(new NetworkTransportError(toErrorMessage(error), { cause: error })),
        );
        break;
      }
      if (next === "cancelled" || next.done) {
        break;
      }

      for (const line of lines.push(next.value)) {
        const result = decodeLine(line, schema, options.render);
        if (!result) {
          continue;
        }
        if (!(await channel.send(result))) {
          break reading;
        }
      }
    }

    const trailing = lines.flush().trim();
    if (trailing.length > 0 && !channel.cancelled) {
      logger.warn({ bytes: trailing.length }, "Discarding unterminated trailing stream line");
    }
  } finally {
    signal?.removeEventListener("abort", onAbort);
    if (channel.cancelled) {
      if (!sourceFailed) {
        // The source may still be suspended on a read; do not wait for it.
        void closeSource(iterator);
      }
      channel.trySend(finishToken());
    } else {
      await channel.send(finishToken());
    }
    channel.close();
    options.onClose?.();
  }
}

/**
 * Decodes a line-delimited JSON (or SSE `data:`) byte stream into tokens.
 *
 * Reading runs as a background task feeding a bounded channel. Every stream
 * ends with exactly one finish token, including after a transport error.
 */
export function decodeJsonStream<T>(
  source: ChunkSource,
  schema: z.ZodType<T>,
  options: DecodeJsonStreamOptions<T> = {},
): TokenStream {
  const channel = new BoundedChannel<TokenResult>(
    options.bufferSize ?? DEFAULT_STREAM_BUFFER_SIZE,
  );
  if (options.onCancel) {
    channel.onCancel(options.onCancel);
  }

  pumpJsonStream(source, schema, channel, options).catch((error: unknown) => {
    logger.error({ err: error }, "Stream decoder stopped unexpectedly");
    channel.close();
  });

  return createTokenStream(channel);
}

export function createTokenStream(channel: BoundedChannel<TokenResult>): TokenStream {
  return channel;
}

export async function collectTokens(stream: TokenStream): Promise<TokenResult[]> {
  const results: TokenResult[] = [];
  for await (const result of stream) {
    results.push(result);
  }
  return results;
}

/** Adapts a WHATWG byte stream (e.g. a fetch body) into a chunk source. */
export async function* readableToChunks(
  stream: ReadableStream<Uint8Array>,
): AsyncGenerator<Uint8Array> {
  const reader = stream.getReader();
  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        finished = true;
        return;
      }
      if (value !== undefined && value.byteLength > 0) {
        yield value;
      }
    }
  } finally {
    if (!finished) {
      await reader.cancel().catch((error: unknown) => {
        logger.debug({ err: error }, "Failed to cancel byte stream reader");
      });
    }
    reader.releaseLock();
  }
}
