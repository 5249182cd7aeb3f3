import { z } from 'zod';

const roleSchema = z.enum(['system', 'user', 'assistant', 'function']);

const functionCallSchema = z.object({
  name: z.string(),
  arguments: z.string(),
});

const usageSchema = z.object({
  prompt_tokens: z.number(),
  completion_tokens: z.number(),
  total_tokens: z.number(),
});

export const completionSchema = z.object({
  id: z.string(),
  object: z.string().default(''),
  created: z.number().default(0),
  model: z.string().default(''),
  choices: z.array(
    z.object({
      index: z.number().int(),
      message: z.object({
        role: roleSchema,
        content: z.string().nullable().optional(),
        function_call: functionCallSchema.nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  usage: usageSchema.nullable().optional(),
});

export const chunkSchema = z.object({
  id: z.string(),
  object: z.string().default(''),
  created: z.number().default(0),
  model: z.string().default(''),
  choices: z.array(
    z.object({
      index: z.number().int(),
      delta: z.object({
        role: roleSchema.nullable().optional(),
        content: z.string().nullable().optional(),
        function_call: functionCallSchema.partial().nullable().optional(),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
});

export type RawCompletion = z.infer<typeof completionSchema>;
export type RawChunk = z.infer<typeof chunkSchema>;
