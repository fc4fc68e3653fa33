import type { RelayConfig } from "../config";
import type { ConversationStore } from "../conversations";
import { logger } from "../logger";
import { DeepSeekAgent } from "./deepseek";
import { EchoAgent } from "./echo";
import { OpenAIAgent } from "./openai";
import type { AgentCapability } from "./types";

export const OPENAI_API_KEY_ENV = "OPENAI_API_KEY";
export const DEEPSEEK_API_KEY_ENV = "DEEPSEEK_API_KEY";

export interface AgentFactoryDeps {
  conversations?: ConversationStore;
  env?: Record<string, string | undefined>;
}

function resolveApiKey(
  configured: string | undefined,
  envName: string,
  env: Record<string, string | undefined>,
): string | undefined {
  const key = configured?.trim() || env[envName]?.trim();
  return key ? key : undefined;
}

/**
 * Builds every agent enabled in config. Echo is on unless disabled; chat
 * backends are on when a section exists and an API key can be found.
 */
export function createAgentsFromConfig(
  config: RelayConfig,
  deps: AgentFactoryDeps = {},
): AgentCapability[] {
  const env = deps.env ?? process.env;
  const agents = config.agents ?? {};
  const created: AgentCapability[] = [];

  if (agents.echo?.enabled !== false) {
    created.push(new EchoAgent(agents.echo?.name));
  }

  const openai = agents.openai;
  if (openai && openai.enabled !== false) {
    const apiKey = resolveApiKey(openai.apiKey, OPENAI_API_KEY_ENV, env);
    if (apiKey) {
      created.push(
        new OpenAIAgent({
          apiKey,
          baseUrl: openai.baseUrl,
          model: openai.model,
          timeoutMs: openai.timeoutMs,
          conversations: deps.conversations,
        }),
      );
    } else {
      logger.warn({ agent: "openai", env: OPENAI_API_KEY_ENV }, "Skipping agent without API key");
    }
  }

  const deepseek = agents.deepseek;
  if (deepseek && deepseek.enabled !== false) {
    const apiKey = resolveApiKey(deepseek.apiKey, DEEPSEEK_API_KEY_ENV, env);
    if (apiKey) {
      created.push(
        new DeepSeekAgent({
          apiKey,
          baseUrl: deepseek.baseUrl,
          model: deepseek.model,
          timeoutMs: deepseek.timeoutMs,
          conversations: deps.conversations,
        }),
      );
    } else {
      logger.warn(
        { agent: "deepseek", env: DEEPSEEK_API_KEY_ENV },
        "Skipping agent without API key",
      );
    }
  }

  return created;
}
