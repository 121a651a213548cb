import { z } from 'zod';

export const GenerationConfigSchema = z
  .object({
    decoder_start_token_id: z.number().int().optional(),
    no_timestamps_token_id: z.number().int().optional(),
    task_to_id: z.record(z.number().int()).optional(),
    lang_to_id: z.record(z.number().int()).optional(),
    // entries may carry null on either side
    forced_decoder_ids: z.array(z.tuple([z.number().int().nullable(), z.number().int().nullable()])).optional()
  })
  .passthrough();

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
