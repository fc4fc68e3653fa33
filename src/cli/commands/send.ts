import { RelayClientError, sendEnvelope } from "../../client";
import { createAgentEnvelope } from "../../protocol";

export const DEFAULT_SERVER_URL = "http://127.0.0.1:3000";

export interface SendOptions {
  payload?: string;
  url?: string;
  token?: string;
  timeout?: string;
}

export function parsePayloadArg(raw: string | undefined): unknown {
  if (raw === undefined) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new Error(`--payload must be JSON: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}

export async function runSend(agent: string, action: string, options: SendOptions): Promise<void> {
  const timeoutMs = options.timeout ? Number.parseInt(options.timeout, 10) : undefined;
  try {
    const envelope = createAgentEnvelope(agent, action, parsePayloadArg(options.payload));
    const response = await sendEnvelope(options.url ?? DEFAULT_SERVER_URL, envelope, {
      token: options.token ?? process.env.MODEL_RELAY_TOKEN,
      timeoutMs: Number.isFinite(timeoutMs) ? timeoutMs : undefined,
    });
    console.log(JSON.stringify(response, null, 2));
  } catch (error) {
    if (error instanceof RelayClientError) {
      console.error(`❌ ${error.kind}: ${error.message}`);
    } else {
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(1);
  }
}
