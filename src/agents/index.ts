export { AgentRegistry, toInternalAgentError, type ResolvedAgent } from "./registry";
export {
  isStreamingCapability,
  type AgentCapability,
  type AgentStreamOptions,
  type StreamingAgentCapability,
} from "./types";
export { EchoAgent, DEFAULT_ECHO_AGENT_NAME } from "./echo";
export {
  ChatCompletionsAgent,
  ChatCompletionChunkSchema,
  DEFAULT_REQUEST_TIMEOUT_MS,
  parseChatRequest,
  renderChunkDelta,
  type ChatCompletionsAgentOptions,
  type ChatRequest,
} from "./chat-completions";
export { OpenAIAgent, OPENAI_AGENT_NAME, type OpenAIAgentOptions } from "./openai";
export { DeepSeekAgent, DEEPSEEK_AGENT_NAME, type DeepSeekAgentOptions } from "./deepseek";
export {
  createAgentsFromConfig,
  DEEPSEEK_API_KEY_ENV,
  OPENAI_API_KEY_ENV,
  type AgentFactoryDeps,
} from "./factory";
