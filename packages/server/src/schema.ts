import { z } from "zod";

export const ChatRequestSchema = z.object({
  question: z.string().min(1, "question must not be empty"),
  conversation_id: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
  max_references: z.number().int().min(1).max(10).default(3),
});

export type ChatRequestBody = z.infer<typeof ChatRequestSchema>;
