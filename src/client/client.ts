import { parseEnvelope, serializeEnvelope, toErrorMessage, type Envelope } from "../protocol";

export const DEFAULT_CLIENT_TIMEOUT_MS = 30_000;

export type RelayClientErrorKind = "network" | "unexpected_status" | "deserialization";

export class RelayClientError extends Error {
  constructor(
    readonly kind: RelayClientErrorKind,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RelayClientError";
  }
}

export interface SendEnvelopeOptions {
  token?: string;
  timeoutMs?: number;
}

function readErrorBody(text: string): string | undefined {
  try {
    const body: unknown = JSON.parse(text);
    if (body && typeof body === "object" && "error" in body && typeof body.error === "string") {
      return body.error;
    }
  } catch {
    return text.trim() || undefined;
  }
  return undefined;
}

/** POSTs an envelope to `<serverUrl>/mcp` and returns the reply envelope. */
export async function sendEnvelope(
  serverUrl: string,
  envelope: Envelope,
  options: SendEnvelopeOptions = {},
): Promise<Envelope> {
  const url = `${serverUrl.replace(/\/+$/, "")}/mcp`;
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers,
      body: serializeEnvelope(envelope),
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS),
    });
  } catch (error) {
    throw new RelayClientError("network", `Request to ${url} failed: ${toErrorMessage(error)}`, undefined, {
      cause: error,
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new RelayClientError("network", `Reading response failed: ${toErrorMessage(error)}`, response.status, {
      cause: error,
    });
  }

  if (!response.ok) {
    const detail = readErrorBody(text);
    throw new RelayClientError(
      "unexpected_status",
      detail ? `Relay returned status ${response.status}: ${detail}` : `Relay returned status ${response.status}`,
      response.status,
    );
  }

  const parsed = parseEnvelope(text);
  if (!parsed.success) {
    throw new RelayClientError("deserialization", parsed.error, response.status);
  }
  return parsed.envelope;
}
