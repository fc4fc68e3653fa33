export {
  DEFAULT_CLIENT_TIMEOUT_MS,
  RelayClientError,
  sendEnvelope,
  type RelayClientErrorKind,
  type SendEnvelopeOptions,
} from "./client";
