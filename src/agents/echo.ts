import { createEnvelope, responseCommand, type Envelope } from "../protocol";
import type { AgentCapability } from "./types";

export const DEFAULT_ECHO_AGENT_NAME = "echo";

/** Replies with the request payload unchanged. Useful for wiring checks. */
export class EchoAgent implements AgentCapability {
  constructor(private readonly agentName: string = DEFAULT_ECHO_AGENT_NAME) {}

  name(): string {
    return this.agentName;
  }

  async handle(envelope: Envelope): Promise<Envelope> {
    return createEnvelope(responseCommand(this.agentName), envelope.payload);
  }
}
