import type { DecodingEngineOptions } from '../whisper/decoding/DecodingEngine';
import { DEFAULT_GUARD_OPTIONS } from '../whisper/decoding/StepGuards';
import { DEFAULT_TOKEN_POLICY } from '../whisper/decoding/TokenPolicy';
import type { Env } from './env';

type DecodingEnv = Pick<
  Env,
  | 'WHISPER_MAX_TOKENS'
  | 'WHISPER_REPETITION_PENALTY'
  | 'WHISPER_REPETITION_WINDOW'
  | 'WHISPER_QUALITY_TOP_K'
  | 'WHISPER_QUALITY_MASK_CAP'
  | 'WHISPER_SAMPLING_TOP_K'
  | 'WHISPER_SAMPLING_TEMPERATURE'
  | 'WHISPER_INITIAL_SAMPLING_STEPS'
  | 'WHISPER_MIN_TOKENS_BEFORE_EOT'
>;

export function decodingOptionsFromEnv(env: DecodingEnv): Omit<DecodingEngineOptions, 'random'> {
  return {
    maxTokens: env.WHISPER_MAX_TOKENS,
    policy: {
      ...DEFAULT_TOKEN_POLICY,
      repetitionPenalty: env.WHISPER_REPETITION_PENALTY,
      repetitionWindow: env.WHISPER_REPETITION_WINDOW,
      qualityTopK: env.WHISPER_QUALITY_TOP_K,
      qualityMaskCap: env.WHISPER_QUALITY_MASK_CAP,
      samplingTopK: env.WHISPER_SAMPLING_TOP_K,
      samplingTemperature: env.WHISPER_SAMPLING_TEMPERATURE,
      initialSamplingSteps: env.WHISPER_INITIAL_SAMPLING_STEPS
    },
    guards: {
      ...DEFAULT_GUARD_OPTIONS,
      minTokensBeforeEot: env.WHISPER_MIN_TOKENS_BEFORE_EOT
    }
  };
}
