import { AgentRegistry, isStreamingCapability, toInternalAgentError } from "../agents";
import { logger } from "../logger";
import {
  AgentNotRegisteredError,
  InternalAgentError,
  InvalidCommandFormatError,
  createErrorEnvelope,
  hasValidMagic,
  isRelayError,
  serializeEnvelope,
  type Envelope,
  type RelayError,
} from "../protocol";
import {
  BoundedChannel,
  DEFAULT_STREAM_BUFFER_SIZE,
  contentToken,
  errorResult,
  finishToken,
  type TokenResult,
  type TokenStream,
} from "../streaming";

export const INVALID_MAGIC_MESSAGE = "Invalid magic number";

export type DispatchResult =
  | { kind: "envelope"; envelope: Envelope }
  | { kind: "error"; status: number; error: RelayError };

export interface DispatchServiceOptions {
  registry: AgentRegistry;
  bufferSize?: number;
}

export interface DispatchStreamOptions {
  signal?: AbortSignal;
}

/** HTTP status for an error raised while routing or handling an envelope. */
export function statusForError(error: RelayError): number {
  if (error instanceof InvalidCommandFormatError || error instanceof AgentNotRegisteredError) {
    return 400;
  }
  if (error instanceof InternalAgentError) {
    return 502;
  }
  return 500;
}

function toRelayError(error: unknown): RelayError {
  return isRelayError(error) ? error : toInternalAgentError(error);
}

export class DispatchService {
  readonly registry: AgentRegistry;
  private readonly bufferSize: number;

  constructor(options: DispatchServiceOptions) {
    this.registry = options.registry;
    this.bufferSize = options.bufferSize ?? DEFAULT_STREAM_BUFFER_SIZE;
  }

  async handle(envelope: Envelope): Promise<DispatchResult> {
    if (!hasValidMagic(envelope)) {
      logger.warn({ magic: envelope.magic }, "Rejected envelope with invalid magic");
      return { kind: "envelope", envelope: createErrorEnvelope(INVALID_MAGIC_MESSAGE) };
    }

    const startedAt = Date.now();
    try {
      const response = await this.registry.dispatch(envelope);
      logger.info(
        { command: envelope.command, durationMs: Date.now() - startedAt },
        "Dispatched envelope",
      );
      return { kind: "envelope", envelope: response };
    } catch (error) {
      const relayError = toRelayError(error);
      logger.warn(
        { command: envelope.command, code: relayError.code, durationMs: Date.now() - startedAt },
        relayError.message,
      );
      return { kind: "error", status: statusForError(relayError), error: relayError };
    }
  }

  /**
   * Runs the envelope as a token stream. Routing and agent failures arrive as
   * error elements; the stream always ends with exactly one finish token.
   */
  stream(envelope: Envelope, options: DispatchStreamOptions = {}): TokenStream {
    const channel = new BoundedChannel<TokenResult>(this.bufferSize);
    const signal = options.signal;
    const onAbort = () => channel.cancel();
    if (signal?.aborted) {
      channel.cancel();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }
    const detach = () => signal?.removeEventListener("abort", onAbort);

    this.pump(envelope, channel, detach).catch((error: unknown) => {
      logger.error({ err: error, command: envelope.command }, "Stream dispatch failed");
      channel.close();
      detach();
    });
    return channel;
  }

  private async pump(
    envelope: Envelope,
    channel: BoundedChannel<TokenResult>,
    onDone: () => void,
  ): Promise<void> {
    const startedAt = Date.now();
    let finished = false;
    // Nothing is forwarded once a finish token has gone out.
    const emit = async (item: TokenResult): Promise<boolean> => {
      if (finished) {
        return false;
      }
      if (item.ok && item.token.isFinish) {
        finished = true;
      }
      return channel.send(item);
    };

    try {
      if (!hasValidMagic(envelope)) {
        logger.warn({ magic: envelope.magic }, "Rejected stream envelope with invalid magic");
        await emit(contentToken(serializeEnvelope(createErrorEnvelope(INVALID_MAGIC_MESSAGE))));
        return;
      }

      const { capability } = this.registry.resolve(envelope);
      if (!isStreamingCapability(capability)) {
        const response = await this.registry.dispatch(envelope);
        await emit(contentToken(serializeEnvelope(response), response.payload));
        return;
      }

      const abort = new AbortController();
      channel.onCancel(() => abort.abort());
      let upstream: TokenStream;
      try {
        upstream = await capability.stream(envelope, {
          signal: abort.signal,
          bufferSize: this.bufferSize,
        });
      } catch (error) {
        throw toInternalAgentError(error);
      }
      try {
        for await (const item of upstream) {
          if (!(await emit(item)) || finished) {
            break;
          }
        }
      } finally {
        if (channel.cancelled) {
          upstream.cancel();
        }
      }
    } catch (error) {
      const relayError = toRelayError(error);
      logger.warn({ command: envelope.command, code: relayError.code }, relayError.message);
      await emit(errorResult(relayError));
    } finally {
      if (!finished) {
        finished = true;
        if (channel.cancelled) {
          channel.trySend(finishToken());
        } else {
          await channel.send(finishToken());
        }
      }
      channel.close();
      onDone();
      logger.debug(
        { command: envelope.command, durationMs: Date.now() - startedAt, cancelled: channel.cancelled },
        "Stream dispatch finished",
      );
    }
  }
}
