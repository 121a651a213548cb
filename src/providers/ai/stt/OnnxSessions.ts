import { readFile } from 'fs/promises';
import { InferenceSession, Tensor } from 'onnxruntime-web';
import { TENSOR_NAMES } from '../../../config/constants';
import type { ModelConfig } from '../../../models/ModelConfig';
import { createLogger } from '../../../utils/logger';
import { resolveCacheSlots } from '../../../whisper/decoding/CacheSchema';
import type {
  DecoderSession,
  DecoderSignature,
  DecoderStepInput,
  DecoderStepOutput,
  EncoderSession,
  FloatTensor
} from '../../../whisper/types';

const logger = createLogger({ service: 'OnnxSessions' });

/** The slice of an onnxruntime InferenceSession the adapters use */
export interface InferenceSessionLike {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, Tensor>): Promise<Record<string, Tensor>>;
  release(): Promise<void>;
}

export type SessionFactory = (modelPath: string) => Promise<InferenceSessionLike>;

export const createOrtSession: SessionFactory = async (modelPath) => {
  const bytes = await readFile(modelPath);
  const session = await InferenceSession.create(bytes, {
    executionProviders: ['wasm'],
    graphOptimizationLevel: 'all'
  });
  logger.debug(
    { modelPath, inputs: session.inputNames, outputs: session.outputNames },
    'Inference session created'
  );
  return session;
};

export function toFloatTensor(tensor: Tensor | undefined, name: string): FloatTensor {
  if (!tensor) {
    throw new Error(`Session returned no '${name}' output`);
  }
  if (!(tensor.data instanceof Float32Array)) {
    throw new Error(`Output '${name}' has type ${tensor.type}, expected float32`);
  }
  return { data: tensor.data, dims: tensor.dims };
}

function floatFeed(tensor: FloatTensor): Tensor {
  return new Tensor('float32', tensor.data, tensor.dims);
}

function pickName(names: readonly string[], preferred: string, role: string): string {
  if (names.includes(preferred)) return preferred;
  if (names.length === 0) {
    throw new Error(`Session declares no ${role}`);
  }
  logger.warn({ preferred, using: names[0] }, `No '${preferred}' ${role}, using the first one`);
  return names[0];
}

/**
 * Empty cache shape `[1, heads, 0, headDim]` from config.json. Without the
 * config the whisper-tiny layout is assumed.
 */
export function emptyCacheDims(config: ModelConfig): number[] {
  const heads = config.decoder_attention_heads;
  const width = config.d_model;
  if (heads === undefined || width === undefined) {
    logger.warn({ heads, width }, 'config.json lacks decoder heads or width, assuming 6 heads of 64');
    return [1, 6, 0, 64];
  }
  return [1, heads, 0, Math.floor(width / heads)];
}

export class OnnxEncoder implements EncoderSession {
  private readonly inputName: string;
  private readonly outputName: string;

  constructor(private readonly session: InferenceSessionLike) {
    this.inputName = pickName(session.inputNames, TENSOR_NAMES.ENCODER_INPUT, 'encoder input');
    this.outputName = pickName(session.outputNames, TENSOR_NAMES.ENCODER_OUTPUT, 'encoder output');
  }

  async encode(features: FloatTensor): Promise<FloatTensor> {
    const outputs = await this.session.run({ [this.inputName]: floatFeed(features) });
    return toFloatTensor(outputs[this.outputName], this.outputName);
  }
}

/** Merged decoder: a single graph for the first step and the cached steps */
export class OnnxDecoder implements DecoderSession {
  readonly signature: DecoderSignature;

  constructor(
    private readonly session: InferenceSessionLike,
    emptyDims: readonly number[]
  ) {
    const inputs = session.inputNames;
    for (const required of [TENSOR_NAMES.INPUT_IDS, TENSOR_NAMES.ENCODER_HIDDEN_STATES]) {
      if (!inputs.includes(required)) {
        throw new Error(`Decoder has no '${required}' input`);
      }
    }
    if (!session.outputNames.includes(TENSOR_NAMES.LOGITS)) {
      throw new Error(`Decoder has no '${TENSOR_NAMES.LOGITS}' output`);
    }

    this.signature = {
      cacheSlots: resolveCacheSlots(inputs, session.outputNames, emptyDims),
      supportsCacheBranch: inputs.includes(TENSOR_NAMES.USE_CACHE_BRANCH)
    };
    if (this.signature.cacheSlots.length === 0) {
      throw new Error('Decoder declares no past_key_values inputs; a merged decoder is required');
    }
  }

  async decode(input: DecoderStepInput): Promise<DecoderStepOutput> {
    const ids = BigInt64Array.from(input.inputIds, (id) => BigInt(id));
    const feeds: Record<string, Tensor> = {
      [TENSOR_NAMES.INPUT_IDS]: new Tensor('int64', ids, [1, ids.length]),
      [TENSOR_NAMES.ENCODER_HIDDEN_STATES]: floatFeed(input.encoderHiddenStates)
    };
    if (this.signature.supportsCacheBranch) {
      feeds[TENSOR_NAMES.USE_CACHE_BRANCH] = new Tensor('bool', [input.useCacheBranch], [1]);
    }
    for (const slot of this.signature.cacheSlots) {
      const tensor = input.cache[slot.index];
      if (!tensor) {
        throw new Error(`Missing cache tensor for ${slot.inputName}`);
      }
      feeds[slot.inputName] = floatFeed(tensor);
    }

    const outputs = await this.session.run(feeds);
    return {
      logits: toFloatTensor(outputs[TENSOR_NAMES.LOGITS], TENSOR_NAMES.LOGITS),
      present: this.signature.cacheSlots.map((slot) => toFloatTensor(outputs[slot.outputName], slot.outputName))
    };
  }
}
