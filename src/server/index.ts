export {
  RelayHttpServer,
  RequestBodyError,
  conversationToJson,
  formatSseEvent,
  type RelayHttpServerOptions,
} from "./http-server";
export { RelayHost, type RelayHostOptions } from "./host";
