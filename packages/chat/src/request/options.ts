import { z } from 'zod';
import { InvalidInputError, type CompletionOptions } from '@tipchat/llm';
import { formatIssues } from '../utils/issues.js';

// Types of the documented parameters. Anything else passes through untouched.
const optionTypesSchema = z
  .object({
    temperature: z.number(),
    top_p: z.number(),
    n: z.number(),
    stop: z.union([z.string(), z.array(z.string())]).nullable(),
    max_tokens: z.number(),
    stream: z.boolean(),
    frequency_penalty: z.number(),
    presence_penalty: z.number(),
    logit_bias: z.record(z.number()),
    user: z.string(),
    seed: z.number(),
  })
  .partial()
  .passthrough();

// Documented ranges. The API is the authority here, so these only warn.
const optionRangesSchema = z
  .object({
    temperature: z.number().min(0).max(2),
    top_p: z.number().min(0).max(1),
    n: z.number().int().min(1),
    max_tokens: z.number().int().min(1),
    frequency_penalty: z.number().min(-2).max(2),
    presence_penalty: z.number().min(-2).max(2),
    seed: z.number().int(),
  })
  .partial();

export type ValidatedOptions = {
  readonly options: CompletionOptions;
  readonly warnings: ReadonlyArray<string>;
};

/**
 * Checks the value types of known completion options. Out-of-range values
 * come back as warnings instead of errors.
 */
export function validateOptions(input: unknown): ValidatedOptions {
  if (input === undefined) {
    return { options: {}, warnings: [] };
  }

  const typed = optionTypesSchema.safeParse(input);
  if (!typed.success) {
    throw new InvalidInputError(`Invalid options: ${formatIssues(typed.error)}`);
  }

  const ranged = optionRangesSchema.safeParse(typed.data);
  const warnings = ranged.success
    ? []
    : ranged.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);

  return { options: { ...typed.data }, warnings };
}
