import { z } from 'zod';

/** The parts of a Whisper config.json needed to shape empty cache tensors */
export const ModelConfigSchema = z
  .object({
    d_model: z.number().int().positive().optional(),
    decoder_attention_heads: z.number().int().positive().optional(),
    decoder_layers: z.number().int().positive().optional(),
    num_mel_bins: z.number().int().positive().optional(),
    vocab_size: z.number().int().positive().optional()
  })
  .passthrough();

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
