/**
 * Shared types of the transcription core.
 *
 * The core only talks to the inference engine through these shapes; the ONNX
 * adapter in providers/ai/stt maps them onto named session inputs and outputs.
 */

export interface FloatTensor {
  data: Float32Array;
  dims: readonly number[];
}

/** Mono or multi-channel audio as delivered by a caller. Never mutated. */
export interface AudioClip {
  sampleRate: number;
  channels: Float32Array[];
}

export interface SpectralConfig {
  sampleRate: number;
  nFft: number;
  hopLength: number;
  nMels: number;
  chunkLengthSamples: number;
  nFrames: number;
}

export interface EncoderSession {
  encode(features: FloatTensor): Promise<FloatTensor>;
}

/** One key/value cache slot, resolved once from the decoder's declared names. */
export interface CacheSlot {
  index: number;
  inputName: string;
  outputName: string;
  /** Shape of the tensor fed before the slot holds a "present" output */
  emptyDims: readonly number[];
}

export interface DecoderSignature {
  cacheSlots: readonly CacheSlot[];
  supportsCacheBranch: boolean;
}

export interface DecoderStepInput {
  inputIds: readonly number[];
  encoderHiddenStates: FloatTensor;
  /** false on the first step, true afterwards; only sent when the signature supports it */
  useCacheBranch: boolean;
  /** Indexed by CacheSlot.index */
  cache: readonly FloatTensor[];
}

export interface DecoderStepOutput {
  /** Shape [1, sequence, vocab] */
  logits: FloatTensor;
  /** Indexed by CacheSlot.index */
  present: FloatTensor[];
}

export interface DecoderSession {
  readonly signature: DecoderSignature;
  decode(input: DecoderStepInput): Promise<DecoderStepOutput>;
}

export interface TextDecoderLike {
  /** Never throws; unknown ids decode to nothing */
  decode(ids: readonly number[]): string;
}

export interface TranscriptionOptions {
  language?: string;
  translate?: boolean;
  timestamps?: boolean;
  signal?: AbortSignal;
}
