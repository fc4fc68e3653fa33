import { describe, expect, it } from "vitest";
import {
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
} from "./envelope";
import { InvalidCommandFormatError } from "./errors";

describe("envelope", () => {
  it("builds agent envelopes with the protocol magic and version", () => {
    const envelope = createAgentEnvelope("echo", "say", { text: "hi" });
    expect(envelope).toEqual({
      magic: PROTOCOL_MAGIC,
      version: PROTOCOL_VERSION,
      command: "echo:say",
      payload: { text: "hi" },
    });
    expect(hasValidMagic(envelope)).toBe(true);
    expect(Object.isFrozen(envelope)).toBe(true);
  });

  it("splits the command on the first separator only", () => {
    expect(splitCommand(createEnvelope("openai:chat:stream", null))).toEqual({
      agentKey: "openai",
      action: "chat:stream",
    });
    expect(splitCommand(createEnvelope("echo:", null))).toEqual({ agentKey: "echo", action: "" });
  });

  it("rejects commands without a separator", () => {
    expect(() => splitCommand(createEnvelope("invalid", null))).toThrow(InvalidCommandFormatError);
  });

  it("names response and error commands", () => {
    expect(responseCommand("deepseek")).toBe("deepseek_response");
    expect(createErrorEnvelope("Invalid magic number")).toMatchObject({
      command: "error",
      payload: { message: "Invalid magic number" },
    });
  });

  it("parses what it serializes", () => {
    const envelope = createAgentEnvelope("echo", "x", { n: [1, 2] });
    const raw = serializeEnvelope(envelope);
    expect(raw).toBe('{"magic":"MCP0","version":1,"command":"echo:x","payload":{"n":[1,2]}}');
    const parsed = parseEnvelope(new TextEncoder().encode(raw));
    expect(parsed).toEqual({ success: true, envelope });
  });

  it("reports invalid JSON and invalid shapes", () => {
    const badJson = parseEnvelope("{not json");
    expect(badJson.success).toBe(false);
    if (!badJson.success) {
      expect(badJson.error.startsWith("Invalid JSON:")).toBe(true);
    }

    const badShape = parseEnvelope(JSON.stringify({ magic: "MCP0", version: -1, command: "a:b" }));
    expect(badShape.success).toBe(false);
    if (!badShape.success) {
      expect(badShape.error.startsWith("Invalid envelope: version:")).toBe(true);
    }
  });

  it("defaults a missing payload to null", () => {
    const parsed = parseEnvelope(JSON.stringify({ magic: "XXXX", version: 1, command: "a:b" }));
    expect(parsed).toEqual({
      success: true,
      envelope: { magic: "XXXX", version: 1, command: "a:b", payload: null },
    });
    if (parsed.success) {
      expect(hasValidMagic(parsed.envelope)).toBe(false);
    }
  });
});
