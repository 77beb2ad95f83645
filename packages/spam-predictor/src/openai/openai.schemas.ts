import { z } from 'zod';

export const ChatMessageSchema = z.object({
  content: z.string(),
  role: z.enum(['assistant', 'system', 'user']),
});

export type ChatMessage = z.infer<typeof ChatMessageSchema>;

export const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        index: z.number().optional(),
        message: z.object({
          content: z
            .string()
            .nullish()
            .transform((content) => content ?? ''),
          role: z.string().optional(),
        }),
      })
    )
    .min(1, 'No choices in completion response'),
  id: z.string().optional(),
  model: z.string().optional(),
  usage: z
    .object({
      completion_tokens: z.number(),
      prompt_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

export interface ChatCompletionRequest {
  max_tokens: number;
  messages: ChatMessage[];
  model: string;
  stop?: string[] | undefined;
  temperature?: number | undefined;
}
