import { z } from 'zod';
import { DEFAULT_SPECTRAL_CONFIG } from '../../config/constants';
import type { SpectralConfig } from '../types';

export type SpectralOverrides = Partial<SpectralConfig>;

const SpectralConfigSchema = z.object({
  sampleRate: z.number().int().positive(),
  nFft: z.number().int().min(2),
  hopLength: z.number().int().positive(),
  nMels: z.number().int().positive(),
  chunkLengthSamples: z.number().int().positive(),
  nFrames: z.number().int().positive()
});

/**
 * Merge overrides onto a base configuration.
 *
 * A frame count given without a chunk length sets the chunk length to
 * `nFrames * hopLength`; a chunk length given without a frame count derives
 * the frame count from the hop.
 */
export function resolveSpectralConfig(
  overrides: SpectralOverrides = {},
  base: SpectralConfig = DEFAULT_SPECTRAL_CONFIG
): SpectralConfig {
  const hopLength = overrides.hopLength ?? base.hopLength;

  let chunkLengthSamples = overrides.chunkLengthSamples ?? base.chunkLengthSamples;
  let nFrames = overrides.nFrames ?? base.nFrames;

  if (overrides.nFrames !== undefined && overrides.chunkLengthSamples === undefined) {
    chunkLengthSamples = overrides.nFrames * hopLength;
  } else if (overrides.chunkLengthSamples !== undefined && overrides.nFrames === undefined) {
    nFrames = Math.max(1, Math.floor(overrides.chunkLengthSamples / hopLength));
  }

  const resolved = SpectralConfigSchema.parse({
    sampleRate: overrides.sampleRate ?? base.sampleRate,
    nFft: overrides.nFft ?? base.nFft,
    hopLength,
    nMels: overrides.nMels ?? base.nMels,
    chunkLengthSamples,
    nFrames
  });

  return Object.freeze(resolved);
}

export function freqBinCount(config: SpectralConfig): number {
  return Math.floor(config.nFft / 2) + 1;
}
