import { z } from "zod";

export const ConversationsSchema = z
  .object({
    enabled: z.boolean().optional(),
    maxAgeHours: z.number().positive().optional(),
    sweepIntervalMs: z.number().int().min(1000).optional(),
  })
  .strict();

export type ConversationsConfig = z.infer<typeof ConversationsSchema>;
