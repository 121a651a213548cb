import { z } from 'zod';
import type { SpectralOverrides } from '../whisper/spectral/SpectralConfig';

const positiveInt = z.number().int().positive();

export const PreprocessorConfigSchema = z
  .object({
    sampling_rate: positiveInt.optional(),
    sample_rate: positiveInt.optional(),
    sampleRate: positiveInt.optional(),
    sr: positiveInt.optional(),
    n_fft: positiveInt.optional(),
    nFft: positiveInt.optional(),
    hop_length: positiveInt.optional(),
    hopLength: positiveInt.optional(),
    hop: positiveInt.optional(),
    feature_size: positiveInt.optional(),
    n_mels: positiveInt.optional(),
    nMels: positiveInt.optional(),
    num_mel_bins: positiveInt.optional(),
    chunk_length: z.number().positive().optional(), // seconds
    n_frames: positiveInt.optional(),
    nFrames: positiveInt.optional(),
    nb_max_frames: positiveInt.optional(),
    mel_filters: z.array(z.array(z.number())).optional()
  })
  .passthrough();

export type PreprocessorConfig = z.infer<typeof PreprocessorConfigSchema>;

/**
 * Spectral overrides from a preprocessor_config.json. Keys missing from the
 * file stay undefined and fall back to the defaults.
 */
export function toSpectralOverrides(config: PreprocessorConfig): SpectralOverrides {
  const sampleRate = config.sampling_rate ?? config.sample_rate ?? config.sampleRate ?? config.sr;
  const overrides: SpectralOverrides = {
    sampleRate,
    nFft: config.n_fft ?? config.nFft,
    hopLength: config.hop_length ?? config.hopLength ?? config.hop,
    nMels: config.feature_size ?? config.n_mels ?? config.nMels ?? config.num_mel_bins,
    nFrames: config.n_frames ?? config.nFrames ?? config.nb_max_frames
  };

  if (config.chunk_length !== undefined) {
    overrides.chunkLengthSamples = Math.round(config.chunk_length * (sampleRate ?? 16000));
  }

  return overrides;
}
