import type { Envelope } from "../protocol";
import type { TokenStream } from "../streaming";

/**
 * A named backend handler. Implementations are stateless or synchronize their
 * own state; the registry may call `handle` concurrently.
 */
export interface AgentCapability {
  name(): string;
  handle(envelope: Envelope): Promise<Envelope>;
}

export interface AgentStreamOptions {
  signal?: AbortSignal;
  bufferSize?: number;
}

export interface StreamingAgentCapability extends AgentCapability {
  stream(envelope: Envelope, options?: AgentStreamOptions): Promise<TokenStream>;
}

export function isStreamingCapability(
  capability: AgentCapability,
): capability is StreamingAgentCapability {
  return "stream" in capability && typeof capability.stream === "function";
}
