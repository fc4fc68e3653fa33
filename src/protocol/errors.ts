export type RelayErrorCode =
  | "INVALID_COMMAND_FORMAT"
  | "AGENT_NOT_REGISTERED"
  | "INTERNAL_AGENT_ERROR"
  | "DESERIALIZATION_STREAM_ERROR"
  | "NETWORK_TRANSPORT_ERROR"
  | "CONVERSATION_NOT_FOUND";

/**
 * Base class of every error the relay core surfaces. Callers branch on `code`
 * rather than on `instanceof` chains.
 */
export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCommandFormatError extends RelayError {
  readonly code = "INVALID_COMMAND_FORMAT";

  constructor(readonly command: string) {
    super("Invalid command format (expected 'agent:action')");
  }
}

export class AgentNotRegisteredError extends RelayError {
  readonly code = "AGENT_NOT_REGISTERED";

  constructor(readonly agentKey: string) {
    super(`Agent '${agentKey}' is not registered`);
  }
}

export class InternalAgentError extends RelayError {
  readonly code = "INTERNAL_AGENT_ERROR";

  constructor(
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Internal agent error: ${detail}`, options);
  }
}

/** A single malformed line inside a token stream. The stream keeps going. */
export class DeserializationStreamError extends RelayError {
  readonly code = "DESERIALIZATION_STREAM_ERROR";

  constructor(
    readonly detail: string,
    readonly line?: string,
  ) {
    super(`Failed to deserialize stream line: ${detail}`);
  }
}

/** The chunk source itself failed. The stream finishes right after this. */
export class NetworkTransportError extends RelayError {
  readonly code = "NETWORK_TRANSPORT_ERROR";

  constructor(
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Network transport error: ${detail}`, options);
  }
}

export class ConversationNotFoundError extends RelayError {
  readonly code = "CONVERSATION_NOT_FOUND";

  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`);
  }
}

export function isRelayError(value: unknown): value is RelayError {
  return value instanceof RelayError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type ErrorResponseBody = { error: string };

export function toErrorResponseBody(error: unknown): ErrorResponseBody {
  return { error: toErrorMessage(error) };
}
