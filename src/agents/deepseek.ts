import {
  ChatCompletionsAgent,
  type ChatCompletionResponse,
  type ChatCompletionsAgentOptions,
} from "./chat-completions";

export const DEEPSEEK_AGENT_NAME = "deepseek";
export const DEFAULT_DEEPSEEK_MODEL = "deepseek-chat";
export const DEFAULT_DEEPSEEK_BASE_URL = "https://api.deepseek.com";

export type DeepSeekAgentOptions = Omit<ChatCompletionsAgentOptions, "baseUrl" | "model"> & {
  baseUrl?: string;
  model?: string;
};

export class DeepSeekAgent extends ChatCompletionsAgent {
  protected readonly label = "DeepSeek";

  constructor(options: DeepSeekAgentOptions) {
    super({
      ...options,
      baseUrl: options.baseUrl ?? DEFAULT_DEEPSEEK_BASE_URL,
      model: options.model ?? DEFAULT_DEEPSEEK_MODEL,
    });
  }

  name(): string {
    return DEEPSEEK_AGENT_NAME;
  }

  protected buildResponsePayload(answer: string, response: ChatCompletionResponse) {
    return {
      answer,
      id: response.id ?? null,
      finish_reason: response.choices[0]?.finish_reason ?? "unknown",
    };
  }
}
