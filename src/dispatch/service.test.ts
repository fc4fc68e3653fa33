import { describe, expect, it, vi } from "vitest";
import { AgentRegistry, EchoAgent, type AgentStreamOptions, type StreamingAgentCapability } from "../agents";
import {
  InternalAgentError,
  createAgentEnvelope,
  createEnvelope,
  parseEnvelope,
  type Envelope,
} from "../protocol";
import {
  BoundedChannel,
  collectTokens,
  contentToken,
  finishToken,
  type TokenResult,
  type TokenStream,
} from "../streaming";
import { DispatchService, INVALID_MAGIC_MESSAGE } from "./service";

function badMagic(command: string): Envelope {
  return { magic: "XXXX", version: 1, command, payload: null };
}

class WordsAgent implements StreamingAgentCapability {
  lastSignal: AbortSignal | undefined;

  constructor(private readonly words: string[]) {}

  name(): string {
    return "words";
  }

  async handle(_envelope: Envelope): Promise<Envelope> {
    return createEnvelope("words_response", { words: this.words });
  }

  async stream(_envelope: Envelope, options: AgentStreamOptions = {}): Promise<TokenStream> {
    this.lastSignal = options.signal;
    const channel = new BoundedChannel<TokenResult>(options.bufferSize ?? 4);
    const words = this.words;
    void (async () => {
      for (const word of words) {
        if (!(await channel.send(contentToken(word)))) {
          return;
        }
      }
      await channel.send(finishToken());
      channel.close();
    })();
    return channel;
  }
}

class ScriptedStreamAgent implements StreamingAgentCapability {
  constructor(private readonly items: TokenResult[]) {}

  name(): string {
    return "scripted";
  }

  async handle(_envelope: Envelope): Promise<Envelope> {
    return createEnvelope("scripted_response", null);
  }

  async stream(): Promise<TokenStream> {
    const channel = new BoundedChannel<TokenResult>(this.items.length);
    for (const item of this.items) {
      channel.trySend(item);
    }
    channel.close();
    return channel;
  }
}

class BrokenStreamAgent implements StreamingAgentCapability {
  name(): string {
    return "broken";
  }

  async handle(_envelope: Envelope): Promise<Envelope> {
    throw new Error("not used");
  }

  async stream(): Promise<TokenStream> {
    throw new Error("upstream refused");
  }
}

function summarize(results: TokenResult[]) {
  return results.map((result) =>
    result.ok ? [result.token.content, result.token.isFinish] : result.error.code,
  );
}

function createService(...agents: Array<EchoAgent | StreamingAgentCapability>) {
  const registry = new AgentRegistry();
  for (const agent of agents) {
    registry.register(agent);
  }
  return new DispatchService({ registry, bufferSize: 2 });
}

describe("DispatchService.handle", () => {
  it("returns the agent response", async () => {
    const service = createService(new EchoAgent());

    const result = await service.handle(createAgentEnvelope("echo", "x", { v: 1 }));

    expect(result).toEqual({
      kind: "envelope",
      envelope: createEnvelope("echo_response", { v: 1 }),
    });
  });

  it("answers a bad magic with an error envelope", async () => {
    const service = createService(new EchoAgent());

    const result = await service.handle(badMagic("echo:x"));

    expect(result).toEqual({
      kind: "envelope",
      envelope: createEnvelope("error", { message: INVALID_MAGIC_MESSAGE }),
    });
  });

  it("maps routing errors to 400 and agent errors to 502", async () => {
    const service = createService(new EchoAgent(), new BrokenStreamAgent());

    const unknown = await service.handle(createAgentEnvelope("nobody", "x", null));
    expect(unknown).toMatchObject({ kind: "error", status: 400 });

    const malformed = await service.handle(createEnvelope("echo", null));
    expect(malformed).toMatchObject({ kind: "error", status: 400 });

    const failed = await service.handle(createAgentEnvelope("broken", "x", null));
    expect(failed.kind).toBe("error");
    if (failed.kind === "error") {
      expect(failed.status).toBe(502);
      expect(failed.error).toBeInstanceOf(InternalAgentError);
      expect(failed.error.message).toBe("Internal agent error: not used");
    }
  });
});

describe("DispatchService.stream", () => {
  it("forwards a streaming agent's tokens with one finish", async () => {
    const service = createService(new WordsAgent(["a", "b", "c"]));

    const results = await collectTokens(service.stream(createAgentEnvelope("words", "go", null)));

    expect(summarize(results)).toEqual([
      ["a", false],
      ["b", false],
      ["c", false],
      ["", true],
    ]);
  });

  it("turns a plain agent's response into a single token", async () => {
    const service = createService(new EchoAgent());

    const results = await collectTokens(service.stream(createAgentEnvelope("echo", "x", { n: 1 })));

    expect(results).toHaveLength(2);
    const first = results[0];
    expect(first?.ok).toBe(true);
    if (first?.ok) {
      expect(parseEnvelope(first.token.content)).toEqual({
        success: true,
        envelope: createEnvelope("echo_response", { n: 1 }),
      });
      expect(first.token.metadata).toEqual({ n: 1 });
    }
    expect(summarize(results)[1]).toEqual(["", true]);
  });

  it("streams a bad magic as a serialized error envelope", async () => {
    const service = createService(new EchoAgent());

    const results = await collectTokens(service.stream(badMagic("echo:x")));

    expect(summarize(results)).toEqual([
      ['{"magic":"MCP0","version":1,"command":"error","payload":{"message":"Invalid magic number"}}', false],
      ["", true],
    ]);
  });

  it("reports routing and upstream failures in-band", async () => {
    const service = createService(new BrokenStreamAgent());

    const unknown = await collectTokens(service.stream(createAgentEnvelope("nobody", "x", null)));
    expect(summarize(unknown)).toEqual(["AGENT_NOT_REGISTERED", ["", true]]);

    const broken = await collectTokens(service.stream(createAgentEnvelope("broken", "x", null)));
    expect(summarize(broken)).toEqual(["INTERNAL_AGENT_ERROR", ["", true]]);
  });

  it("aborts the upstream when the caller cancels", async () => {
    const agent = new WordsAgent(Array.from({ length: 100 }, (_, index) => `w${index}`));
    const service = createService(agent);
    const controller = new AbortController();

    const stream = service.stream(createAgentEnvelope("words", "go", null), {
      signal: controller.signal,
    });
    const iterator = stream[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(first.value).toEqual(contentToken("w0"));

    controller.abort();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(stream.cancelled).toBe(true);
    expect(agent.lastSignal?.aborted).toBe(true);
    expect(await iterator.next()).toEqual({ value: undefined, done: true });
  });

  it("forwards nothing after the upstream finish token", async () => {
    const service = createService(
      new ScriptedStreamAgent([contentToken("a"), finishToken(), contentToken("after-finish")]),
    );

    const results = await collectTokens(service.stream(createAgentEnvelope("scripted", "go", null)));

    expect(summarize(results)).toEqual([
      ["a", false],
      ["", true],
    ]);
  });

  it("detaches from the caller's abort signal once the stream ends", async () => {
    const service = createService(new WordsAgent(["a"]));
    const controller = new AbortController();
    const removeListener = vi.spyOn(controller.signal, "removeEventListener");

    const stream = service.stream(createAgentEnvelope("words", "go", null), {
      signal: controller.signal,
    });
    const results = await collectTokens(stream);
    await vi.waitFor(() => expect(removeListener).toHaveBeenCalledWith("abort", expect.any(Function)));
    controller.abort();

    expect(summarize(results)).toEqual([
      ["a", false],
      ["", true],
    ]);
    expect(stream.cancelled).toBe(false);
  });
});
