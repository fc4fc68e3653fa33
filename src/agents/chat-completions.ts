import { z } from "zod";
import type { ConversationStore } from "../conversations";
import { logger } from "../logger";
import {
  InternalAgentError,
  createEnvelope,
  responseCommand,
  toErrorMessage,
  type Envelope,
} from "../protocol";
import { decodeJsonStream, readableToChunks, type TokenStream } from "../streaming";
import type { AgentStreamOptions, StreamingAgentCapability } from "./types";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

const ChatCompletionResponseSchema = z.object({
  id: z.string().optional(),
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
});

export const ChatCompletionChunkSchema = z.object({
  id: z.string().optional(),
  choices: z.array(
    z.object({
      delta: z
        .object({
          role: z.string().optional(),
          content: z.string().nullable().optional(),
        })
        .optional(),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;
export type ChatCompletionChunk = z.infer<typeof ChatCompletionChunkSchema>;

type ChatMessage = { role: string; content: string };

export type ChatRequest = {
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  conversationId?: string;
};

export interface ChatCompletionsAgentOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs?: number;
  /** When set, requests carrying `conversation_id` get history and are recorded. */
  conversations?: ConversationStore;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseChatRequest(payload: unknown): ChatRequest {
  const data = isRecord(payload) ? payload : {};
  const userPrompt = data.user_prompt;
  if (typeof userPrompt !== "string") {
    throw new InternalAgentError("Missing user_prompt");
  }
  const request: ChatRequest = { userPrompt };
  if (typeof data.temperature === "number") {
    request.temperature = data.temperature;
  }
  if (typeof data.max_tokens === "number" && Number.isInteger(data.max_tokens)) {
    request.maxTokens = data.max_tokens;
  }
  if (typeof data.conversation_id === "string" && data.conversation_id.trim()) {
    request.conversationId = data.conversation_id;
  }
  return request;
}

export function renderChunkDelta(chunk: ChatCompletionChunk): string | undefined {
  const content = chunk.choices[0]?.delta?.content;
  return typeof content === "string" && content.length > 0 ? content : undefined;
}

/**
 * Shared client for OpenAI-compatible `/v1/chat/completions` backends.
 * Subclasses pick the name, label and the shape of the success payload.
 */
export abstract class ChatCompletionsAgent implements StreamingAgentCapability {
  protected readonly apiKey: string;
  protected readonly baseUrl: string;
  protected readonly model: string;
  protected readonly timeoutMs: number;
  protected readonly conversations?: ConversationStore;

  constructor(options: ChatCompletionsAgentOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.conversations = options.conversations;
  }

  abstract name(): string;

  /** Human-readable backend name used in error messages. */
  protected abstract readonly label: string;

  protected abstract buildResponsePayload(
    answer: string,
    response: ChatCompletionResponse,
  ): Record<string, unknown>;

  get endpoint(): string {
    return `${this.baseUrl}/v1/chat/completions`;
  }

  async handle(envelope: Envelope): Promise<Envelope> {
    const request = parseChatRequest(envelope.payload);
    const history = this.loadHistory(request.conversationId);

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    let data: ChatCompletionResponse;
    try {
      const response = await this.post(this.buildBody(request, history, false), controller.signal);
      if (!response.ok) {
        throw new InternalAgentError(`${this.label} API returned status ${response.status}`);
      }
      data = await this.readCompletion(response);
    } finally {
      clearTimeout(timeout);
    }

    const first = data.choices[0];
    if (!first) {
      throw new InternalAgentError("No response choices");
    }
    const answer = first.message.content;
    this.recordExchange(request, answer);

    return createEnvelope(responseCommand(this.name()), this.buildResponsePayload(answer, data));
  }

  async stream(envelope: Envelope, options: AgentStreamOptions = {}): Promise<TokenStream> {
    const request = parseChatRequest(envelope.payload);
    const history = this.loadHistory(request.conversationId);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.post(this.buildBody(request, history, true), controller.signal);
    } catch (error) {
      options.signal?.removeEventListener("abort", onAbort);
      throw error;
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok || !response.body) {
      options.signal?.removeEventListener("abort", onAbort);
      throw new InternalAgentError(
        response.ok
          ? `${this.label} API returned an empty stream`
          : `${this.label} API returned status ${response.status}`,
      );
    }

    return decodeJsonStream(readableToChunks(response.body), ChatCompletionChunkSchema, {
      bufferSize: options.bufferSize,
      signal: options.signal,
      render: renderChunkDelta,
      onCancel: () => controller.abort(),
      onClose: () => options.signal?.removeEventListener("abort", onAbort),
    });
  }

  protected buildBody(
    request: ChatRequest,
    history: ChatMessage[],
    stream: boolean,
  ): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [...history, { role: "user", content: request.userPrompt }],
    };
    if (request.temperature !== undefined) {
      body.temperature = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      body.max_tokens = request.maxTokens;
    }
    if (stream) {
      body.stream = true;
    }
    return body;
  }

  private async post(body: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    try {
      return await fetch(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new InternalAgentError(`${this.label} request failed: ${toErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async readCompletion(response: Response): Promise<ChatCompletionResponse> {
    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new InternalAgentError(`${this.label} response is not valid JSON`, { cause: error });
    }
    const parsed = ChatCompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      throw new InternalAgentError(`Unexpected ${this.label} response: ${issues.join("; ")}`);
    }
    return parsed.data;
  }

  private loadHistory(conversationId: string | undefined): ChatMessage[] {
    if (!conversationId || !this.conversations) {
      return [];
    }
    const conversation = this.conversations.get(conversationId);
    if (!conversation) {
      throw new InternalAgentError(`Conversation ${conversationId} not found`);
    }
    return conversation.messages.map(({ role, content }) => ({ role, content }));
  }

  private recordExchange(request: ChatRequest, answer: string): void {
    if (!request.conversationId || !this.conversations) {
      return;
    }
    this.conversations.appendMessage(request.conversationId, "user", request.userPrompt);
    this.conversations.appendMessage(request.conversationId, "assistant", answer);
    logger.debug(
      { agent: this.name(), conversationId: request.conversationId },
      "Recorded chat exchange",
    );
  }
}
