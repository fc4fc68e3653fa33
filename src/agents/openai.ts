import {
  ChatCompletionsAgent,
  type ChatCompletionResponse,
  type ChatCompletionsAgentOptions,
} from "./chat-completions";

export const OPENAI_AGENT_NAME = "openai";
export const DEFAULT_OPENAI_MODEL = "gpt-3.5-turbo";
export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com";

export type OpenAIAgentOptions = Omit<ChatCompletionsAgentOptions, "baseUrl" | "model"> & {
  baseUrl?: string;
  model?: string;
};

/**
 * Sends `payload.user_prompt` to the OpenAI chat completions API and answers
 * with `openai_response` carrying `{ answer }`.
 */
export class OpenAIAgent extends ChatCompletionsAgent {
  protected readonly label = "OpenAI";

  constructor(options: OpenAIAgentOptions) {
    super({
      ...options,
      baseUrl: options.baseUrl ?? DEFAULT_OPENAI_BASE_URL,
      model: options.model ?? DEFAULT_OPENAI_MODEL,
    });
  }

  name(): string {
    return OPENAI_AGENT_NAME;
  }

  protected buildResponsePayload(answer: string, _response: ChatCompletionResponse) {
    return { answer };
  }
}
