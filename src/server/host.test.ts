import { afterEach, describe, expect, it } from "vitest";
import { sendEnvelope } from "../client";
import { createAgentEnvelope } from "../protocol";
import { RelayHost } from "./host";

const hosts: RelayHost[] = [];

afterEach(async () => {
  for (const host of hosts.splice(0)) {
    await host.stop();
  }
});

describe("RelayHost", () => {
  it("serves configured agents end to end", async () => {
    const host = new RelayHost(
      {
        server: { host: "127.0.0.1", port: 0 },
        auth: { tokens: ["test-token"] },
        agents: { echo: { name: "ping" } },
      },
      { env: {} },
    );
    hosts.push(host);
    await host.start();

    const response = await sendEnvelope(
      `http://127.0.0.1:${host.server.getPort()}`,
      createAgentEnvelope("ping", "hello", { text: "hi" }),
      { token: "test-token" },
    );

    expect(response.command).toBe("ping_response");
    expect(response.payload).toEqual({ text: "hi" });
    expect(host.registry.list()).toEqual(["ping"]);
    expect(host.conversations).toBeDefined();
  });

  it("leaves out the conversation store when disabled", () => {
    const host = new RelayHost({ conversations: { enabled: false } }, { env: {} });

    expect(host.conversations).toBeUndefined();
  });
});
