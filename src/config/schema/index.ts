import { z } from "zod";
import { AgentsSchema } from "./agents";
import { ConversationsSchema } from "./conversations";
import { AuthSchema, ServerSchema } from "./server";

export const LoggingSchema = z
  .object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).optional(),
  })
  .strict();

export const RelayConfigSchema = z
  .object({
    $schema: z.string().optional(),
    server: ServerSchema.optional(),
    auth: AuthSchema.optional(),
    conversations: ConversationsSchema.optional(),
    agents: AgentsSchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

export { AgentsSchema, type AgentsConfig, type ChatBackendConfig } from "./agents";
export { ConversationsSchema, type ConversationsConfig } from "./conversations";
export { AuthSchema, ServerSchema, type AuthConfig, type ServerConfig } from "./server";
