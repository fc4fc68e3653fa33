import { z } from "zod";

export const EnvelopeSchema = z.object({
  magic: z.string(),
  version: z.number().int().nonnegative(),
  command: z.string(),
  payload: z.unknown(),
});

export const ConversationMessageInputSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
});

export type EnvelopeInput = z.infer<typeof EnvelopeSchema>;
export type ConversationMessageInput = z.infer<typeof ConversationMessageInputSchema>;
