import { z } from 'zod';

const queryFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const TranscriptionQuerySchema = z.object({
  audioId: z.string().min(1, 'audioId is required'),
  language: z
    .string()
    .regex(/^[a-z]{2,3}(_[a-z]+)?$/i, 'language must be a language code such as "en"')
    .optional(),
  translate: queryFlag,
  timestamps: queryFlag
});

export type TranscriptionQuery = z.infer<typeof TranscriptionQuerySchema>;

export const LoadModelBodySchema = z.object({
  name: z.string().min(1).optional()
});

export type LoadModelBody = z.infer<typeof LoadModelBodySchema>;
