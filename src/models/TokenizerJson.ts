import { z } from 'zod';

export const AddedTokenSchema = z
  .object({
    id: z.number().int().nonnegative(),
    content: z.string(),
    special: z.boolean().optional()
  })
  .passthrough();

export const TokenizerJsonSchema = z
  .object({
    model: z
      .object({
        vocab: z.record(z.number().int().nonnegative())
      })
      .passthrough(),
    added_tokens: z.array(AddedTokenSchema).default([])
  })
  .passthrough();

export type TokenizerJson = z.infer<typeof TokenizerJsonSchema>;
