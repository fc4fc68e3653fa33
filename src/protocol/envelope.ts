import { InvalidCommandFormatError } from "./errors";
import { EnvelopeSchema } from "./schemas";

export const PROTOCOL_MAGIC = "MCP0";
export const PROTOCOL_VERSION = 1;
export const COMMAND_SEPARATOR = ":";
export const ERROR_COMMAND = "error";

/**
 * Wire message exchanged with the relay. Request and response share the shape;
 * `payload` is opaque here and only interpreted by the handling agent.
 */
export interface Envelope {
  readonly magic: string;
  readonly version: number;
  readonly command: string;
  readonly payload: unknown;
}

export interface CommandParts {
  agentKey: string;
  action: string;
}

export type EnvelopeParseResult =
  | { success: true; envelope: Envelope }
  | { success: false; error: string };

function freezeEnvelope(envelope: Envelope): Envelope {
  return Object.freeze({ ...envelope });
}

export function createEnvelope(command: string, payload: unknown): Envelope {
  return freezeEnvelope({
    magic: PROTOCOL_MAGIC,
    version: PROTOCOL_VERSION,
    command,
    payload,
  });
}

export function createAgentEnvelope(agent: string, action: string, payload: unknown): Envelope {
  return createEnvelope(`${agent}${COMMAND_SEPARATOR}${action}`, payload);
}

export function createErrorEnvelope(message: string): Envelope {
  return createEnvelope(ERROR_COMMAND, { message });
}

export function responseCommand(agentKey: string): string {
  return `${agentKey}_response`;
}

export function hasValidMagic(envelope: Envelope): boolean {
  return envelope.magic === PROTOCOL_MAGIC;
}

/** Only the first separator counts; the action may contain more of them. */
export function splitCommand(envelope: Envelope): CommandParts {
  const index = envelope.command.indexOf(COMMAND_SEPARATOR);
  if (index < 0) {
    throw new InvalidCommandFormatError(envelope.command);
  }
  return {
    agentKey: envelope.command.slice(0, index),
    action: envelope.command.slice(index + COMMAND_SEPARATOR.length),
  };
}

export function parseEnvelope(raw: string | Uint8Array): EnvelopeParseResult {
  const text = typeof raw === "string" ? raw : new TextDecoder().decode(raw);
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return {
      success: false,
      error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  const result = EnvelopeSchema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return { success: false, error: `Invalid envelope: ${errors.join("; ")}` };
  }

  return {
    success: true,
    envelope: freezeEnvelope({
      magic: result.data.magic,
      version: result.data.version,
      command: result.data.command,
      payload: result.data.payload ?? null,
    }),
  };
}

export function serializeEnvelope(envelope: Envelope): string {
  return JSON.stringify({
    magic: envelope.magic,
    version: envelope.version,
    command: envelope.command,
    payload: envelope.payload ?? null,
  });
}
