import type { SpectralConfig } from '../whisper/types';

export const DEFAULT_SPECTRAL_CONFIG: SpectralConfig = Object.freeze({
  sampleRate: 16000,
  nFft: 400,
  hopLength: 160,
  nMels: 80,
  chunkLengthSamples: 16000 * 30,
  nFrames: 3000
});

// Log-mel numeric policy
export const LOG_ENERGY_FLOOR = 1e-10;
export const DYNAMIC_RANGE_DB = 8.0;

// Chunk validation
export const DEFAULT_SILENCE_RMS = 0.001;
export const COLLAPSED_SPREAD_EPSILON = 1e-6;

// Vocabulary fallbacks of the multilingual Whisper tokenizer
export const TOKEN_FALLBACKS = {
  START_OF_TRANSCRIPT: 50258,
  END_OF_TEXT: 50257,
  TRANSCRIBE: 50359,
  TRANSLATE: 50358,
  NO_TIMESTAMPS: 50363,
  ENGLISH: 50259
};

export const SPECIAL_TOKENS = {
  START_OF_TRANSCRIPT: '<|startoftranscript|>',
  END_OF_TEXT: '<|endoftext|>',
  TRANSCRIBE: '<|transcribe|>',
  TRANSLATE: '<|translate|>',
  NO_TIMESTAMPS: '<|notimestamps|>'
};

export const DEFAULT_LANGUAGE = 'en';

export const MODEL_FILES = {
  ENCODER: 'encoder_model.onnx',
  DECODER: 'decoder_model_merged.onnx',
  TOKENIZER: 'tokenizer.json',
  PREPROCESSOR: 'preprocessor_config.json',
  CONFIG: 'config.json',
  GENERATION: 'generation_config.json'
};

export const TENSOR_NAMES = {
  ENCODER_INPUT: 'input_features',
  ENCODER_OUTPUT: 'last_hidden_state',
  INPUT_IDS: 'input_ids',
  ENCODER_HIDDEN_STATES: 'encoder_hidden_states',
  USE_CACHE_BRANCH: 'use_cache_branch',
  LOGITS: 'logits',
  PAST_PREFIX: 'past_key_values.',
  PRESENT_PREFIX: 'present.'
};
