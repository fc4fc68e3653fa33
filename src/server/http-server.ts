import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { AuthTokenSet, extractBearerToken } from "../auth";
import type { Conversation, ConversationStore } from "../conversations";
import type { DispatchService } from "../dispatch";
import { logger } from "../logger";
import {
  ConversationMessageInputSchema,
  parseEnvelope,
  serializeEnvelope,
  toErrorMessage,
} from "../protocol";
import type { TokenResult, TokenStream } from "../streaming";

export interface RelayHttpServerOptions {
  host: string;
  port: number;
  dispatch: DispatchService;
  conversations?: ConversationStore;
  tokens?: AuthTokenSet;
}

const CONVERSATION_PATH = /^\/conversation\/([^/]+)$/;
const CONVERSATION_MESSAGES_PATH = /^\/conversation\/([^/]+)\/messages$/;

export class RequestBodyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RequestBodyError";
  }
}

export function conversationToJson(conversation: Conversation): Record<string, unknown> {
  return {
    conversation_id: conversation.id,
    messages: conversation.messages.map((message) => ({
      role: message.role,
      content: message.content,
      timestamp: message.timestamp,
    })),
    metadata: conversation.metadata,
    created_at: conversation.createdAt,
    updated_at: conversation.updatedAt,
  };
}

function decodePathSegment(raw: string | undefined): string | undefined {
  if (!raw) {
    return undefined;
  }
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    logger.debug({ err: error, segment: raw }, "Rejected malformed path segment");
    return undefined;
  }
}

/** Resolves once the socket can take more data, or once it is gone. */
function waitForDrain(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.off("drain", done);
      res.off("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

/** One SSE frame for a stream element. */
export function formatSseEvent(item: TokenResult): string {
  if (!item.ok) {
    return `event: error\ndata: ${JSON.stringify({ error: item.error.message })}\n\n`;
  }
  const body: Record<string, unknown> = {
    content: item.token.content,
    is_finish: item.token.isFinish,
  };
  if (item.token.metadata !== undefined) {
    body.metadata = item.token.metadata;
  }
  return `data: ${JSON.stringify(body)}\n\n`;
}

/**
 * HTTP front of the relay: envelope dispatch, token streaming over SSE and
 * the conversation endpoints.
 */
export class RelayHttpServer {
  private server: ReturnType<typeof createServer> | null = null;
  private readonly tokens: AuthTokenSet;
  private readonly openStreams = new Set<TokenStream>();

  constructor(private readonly options: RelayHttpServerOptions) {
    this.tokens = options.tokens ?? new AuthTokenSet();
  }

  async start(): Promise<void> {
    if (this.server) {
      return;
    }
    const { host, port } = this.options;

    this.server = createServer(async (req, res) => {
      try {
        await this.handleRequest(req, res);
      } catch (error) {
        logger.warn({ err: error, method: req.method, url: req.url }, "Relay request failed");
        if (!res.headersSent) {
          this.writeJson(res, 500, { error: "internal_error" });
        } else {
          res.end();
        }
      }
    });

    await new Promise<void>((resolve, reject) => {
      const s = this.server;
      if (!s) {
        reject(new Error("Relay server missing"));
        return;
      }
      s.once("error", reject);
      s.listen(port, host, () => {
        s.off("error", reject);
        resolve();
      });
    });

    logger.info({ host, port: this.getPort() }, "Relay server listening");
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    for (const stream of this.openStreams) {
      stream.cancel();
    }
    this.openStreams.clear();
    if (!server) {
      return;
    }
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    logger.info("Relay server stopped");
  }

  getPort(): number | null {
    const address = this.server?.address();
    if (!address || typeof address === "string") {
      return null;
    }
    return address.port;
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    const url = new URL(req.url ?? "/", "http://localhost");
    const pathname = url.pathname;

    if (method === "GET" && pathname === "/health") {
      this.writeJson(res, 200, { ok: true, agents: this.options.dispatch.registry.list() });
      return;
    }

    if (!this.isAuthorized(req)) {
      this.writeJson(res, 401, { error: "unauthorized" });
      return;
    }

    if (method === "POST" && pathname === "/mcp") {
      await this.handleDispatch(req, res);
      return;
    }

    if (method === "POST" && pathname === "/mcp/stream") {
      await this.handleStream(req, res);
      return;
    }

    if (pathname === "/conversation" || pathname.startsWith("/conversation/")) {
      await this.handleConversation(method, pathname, req, res);
      return;
    }

    this.writeJson(res, 404, { error: "not_found" });
  }

  private isAuthorized(req: IncomingMessage): boolean {
    if (this.tokens.size === 0) {
      return true;
    }
    return this.tokens.isValid(extractBearerToken(req.headers.authorization));
  }

  private async handleDispatch(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const parsed = parseEnvelope(await this.readBody(req));
    if (!parsed.success) {
      this.writeJson(res, 400, { error: parsed.error });
      return;
    }

    const result = await this.options.dispatch.handle(parsed.envelope);
    if (result.kind === "error") {
      this.writeJson(res, result.status, { error: result.error.message });
      return;
    }
    res.statusCode = 200;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(serializeEnvelope(result.envelope));
  }

  private async handleStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const parsed = parseEnvelope(await this.readBody(req));
    if (!parsed.success) {
      this.writeJson(res, 400, { error: parsed.error });
      return;
    }

    const stream = this.options.dispatch.stream(parsed.envelope);
    this.openStreams.add(stream);
    res.on("close", () => {
      if (!res.writableFinished) {
        logger.debug({ command: parsed.envelope.command }, "Stream client disconnected");
        stream.cancel();
      }
    });

    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache, no-transform",
      Connection: "keep-alive",
    });

    try {
      for await (const item of stream) {
        if (res.destroyed) {
          break;
        }
        if (!res.write(formatSseEvent(item))) {
          await waitForDrain(res);
        }
      }
    } finally {
      this.openStreams.delete(stream);
      res.end();
    }
  }

  private async handleConversation(
    method: string,
    pathname: string,
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> {
    const store = this.options.conversations;
    if (!store) {
      this.writeJson(res, 501, { error: "conversations_disabled" });
      return;
    }

    if (pathname === "/conversation") {
      if (method !== "POST") {
        this.writeJson(res, 404, { error: "not_found" });
        return;
      }
      const conversation = store.create();
      this.writeJson(res, 201, {
        conversation_id: conversation.id,
        created_at: conversation.createdAt,
      });
      return;
    }

    const messagesMatch = CONVERSATION_MESSAGES_PATH.exec(pathname);
    const conversationMatch = CONVERSATION_PATH.exec(pathname);
    const rawId = messagesMatch?.[1] ?? conversationMatch?.[1];
    const id = decodePathSegment(rawId);
    if (rawId !== undefined && id === undefined) {
      this.writeJson(res, 400, { error: "invalid_conversation_id" });
      return;
    }

    if (messagesMatch && id !== undefined && method === "POST") {
      let body: unknown;
      try {
        body = this.parseJson(await this.readBody(req));
      } catch (error) {
        this.writeJson(res, 400, { error: toErrorMessage(error) });
        return;
      }
      const input = ConversationMessageInputSchema.safeParse(body);
      if (!input.success) {
        const issues = input.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        this.writeJson(res, 400, { error: `Invalid message: ${issues.join("; ")}` });
        return;
      }
      if (!store.get(id)) {
        this.writeJson(res, 404, { error: `Conversation ${id} not found` });
        return;
      }
      store.appendMessage(id, input.data.role, input.data.content);
      this.writeEmpty(res, 204);
      return;
    }

    if (conversationMatch && id !== undefined) {
      if (method === "GET") {
        const conversation = store.get(id);
        if (!conversation) {
          this.writeJson(res, 404, { error: `Conversation ${id} not found` });
          return;
        }
        this.writeJson(res, 200, conversationToJson(conversation));
        return;
      }
      if (method === "DELETE") {
        if (!store.delete(id)) {
          this.writeJson(res, 404, { error: `Conversation ${id} not found` });
          return;
        }
        this.writeEmpty(res, 204);
        return;
      }
    }

    this.writeJson(res, 404, { error: "not_found" });
  }

  private async readBody(req: IncomingMessage): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    return Buffer.concat(chunks).toString("utf8");
  }

  private parseJson(raw: string): unknown {
    const text = raw.trim();
    if (!text) {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new RequestBodyError(`Invalid JSON: ${toErrorMessage(error)}`, { cause: error });
    }
  }

  private writeEmpty(res: ServerResponse, statusCode: number): void {
    res.statusCode = statusCode;
    res.end();
  }

  private writeJson(res: ServerResponse, statusCode: number, body: Record<string, unknown>): void {
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(body));
  }
}
