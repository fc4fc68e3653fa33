import { afterEach, describe, expect, it, vi } from "vitest";
import { createAgentEnvelope, createEnvelope, serializeEnvelope } from "../protocol";
import { RelayClientError, sendEnvelope } from "./client";

const originalFetch = globalThis.fetch;

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function mockFetch(impl: (...args: FetchArgs) => Promise<Response>) {
  const fetchMock = vi.fn(impl);
  globalThis.fetch = fetchMock as unknown as typeof fetch;
  return fetchMock;
}

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("sendEnvelope", () => {
  const request = createAgentEnvelope("echo", "x", { v: 1 });

  it("posts to /mcp with the bearer token and parses the reply", async () => {
    const reply = createEnvelope("echo_response", { v: 1 });
    const fetchMock = mockFetch(async () => new Response(serializeEnvelope(reply)));

    const response = await sendEnvelope("http://relay.test/", request, { token: "test-token" });

    expect(response).toEqual(reply);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://relay.test/mcp");
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(serializeEnvelope(request));
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      Authorization: "Bearer test-token",
    });
  });

  it("raises a network error when the request fails", async () => {
    mockFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await sendEnvelope("http://relay.test", request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RelayClientError);
    expect(error).toMatchObject({ kind: "network", status: undefined });
  });

  it("raises unexpected_status with the server's error message", async () => {
    mockFetch(
      async () =>
        new Response(JSON.stringify({ error: "Agent 'echo' is not registered" }), { status: 400 }),
    );

    const error = await sendEnvelope("http://relay.test", request).catch((err: unknown) => err);

    expect(error).toMatchObject({
      kind: "unexpected_status",
      status: 400,
      message: "Relay returned status 400: Agent 'echo' is not registered",
    });
  });

  it("raises a deserialization error for bodies that are not envelopes", async () => {
    mockFetch(async () => new Response("not an envelope"));

    const error = await sendEnvelope("http://relay.test", request).catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: "deserialization", status: 200 });
  });
});
