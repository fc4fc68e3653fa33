import { logger } from "../logger";
import {
  AgentNotRegisteredError,
  InternalAgentError,
  splitCommand,
  toErrorMessage,
  type Envelope,
} from "../protocol";
import type { AgentCapability } from "./types";

export type ResolvedAgent = {
  capability: AgentCapability;
  agentKey: string;
  action: string;
};

/**
 * AgentRegistry routes an envelope to the capability named by the part of its
 * command before the first separator.
 *
 * The map is only read or written synchronously, so a `register` that has
 * returned is visible to every dispatch that starts afterwards, and no lookup
 * is held across a handler's I/O.
 */
export class AgentRegistry {
  private agents = new Map<string, AgentCapability>();

  /** Register a capability. Replaces any prior registration with the same name. */
  register(capability: AgentCapability): void {
    const name = capability.name();
    if (this.agents.has(name)) {
      logger.debug({ agent: name }, "Replacing registered agent");
    }
    this.agents.set(name, capability);
  }

  unregister(name: string): boolean {
    return this.agents.delete(name);
  }

  get(name: string): AgentCapability | undefined {
    return this.agents.get(name);
  }

  has(name: string): boolean {
    return this.agents.has(name);
  }

  list(): string[] {
    return Array.from(this.agents.keys()).sort();
  }

  resolve(envelope: Envelope): ResolvedAgent {
    const { agentKey, action } = splitCommand(envelope);
    const capability = this.agents.get(agentKey);
    if (!capability) {
      throw new AgentNotRegisteredError(agentKey);
    }
    return { capability, agentKey, action };
  }

  async dispatch(envelope: Envelope): Promise<Envelope> {
    const { capability } = this.resolve(envelope);
    try {
      return await capability.handle(envelope);
    } catch (error) {
      throw toInternalAgentError(error);
    }
  }
}

export function toInternalAgentError(error: unknown): InternalAgentError {
  if (error instanceof InternalAgentError) {
    return error;
  }
  return new InternalAgentError(toErrorMessage(error), { cause: error });
}
