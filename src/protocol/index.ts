export {
  COMMAND_SEPARATOR,
  ERROR_COMMAND,
  PROTOCOL_MAGIC,
  PROTOCOL_VERSION,
  createAgentEnvelope,
  createEnvelope,
  createErrorEnvelope,
  hasValidMagic,
  parseEnvelope,
  responseCommand,
  serializeEnvelope,
  splitCommand,
  type CommandParts,
  type Envelope,
  type EnvelopeParseResult,
} from "./envelope";
export {
  AgentNotRegisteredError,
  ConversationNotFoundError,
  DeserializationStreamError,
  InternalAgentError,
  InvalidCommandFormatError,
  NetworkTransportError,
  RelayError,
  isRelayError,
  toErrorMessage,
  toErrorResponseBody,
  type ErrorResponseBody,
  type RelayErrorCode,
} from "./errors";
export {
  ConversationMessageInputSchema,
  EnvelopeSchema,
  type ConversationMessageInput,
  type EnvelopeInput,
} from "./schemas";
