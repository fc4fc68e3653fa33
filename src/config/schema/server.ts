import { z } from "zod";

export const ServerSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65535).optional(),
    streamBufferSize: z.number().int().positive().optional(),
  })
  .strict();

export const AuthSchema = z
  .object({
    tokens: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerSchema>;
export type AuthConfig = z.infer<typeof AuthSchema>;
