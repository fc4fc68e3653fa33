import { z } from "zod";

const ChatBackendSchema = z
  .object({
    enabled: z.boolean().optional(),
    apiKey: z.string().optional(),
    baseUrl: z.string().url().optional(),
    model: z.string().min(1).optional(),
    timeoutMs: z.number().int().min(1000).max(600_000).optional(),
  })
  .strict();

const EchoAgentSchema = z
  .object({
    enabled: z.boolean().optional(),
    name: z.string().min(1).optional(),
  })
  .strict();

export const AgentsSchema = z
  .object({
    echo: EchoAgentSchema.optional(),
    openai: ChatBackendSchema.optional(),
    deepseek: ChatBackendSchema.optional(),
  })
  .strict();

export type ChatBackendConfig = z.infer<typeof ChatBackendSchema>;
export type AgentsConfig = z.infer<typeof AgentsSchema>;
