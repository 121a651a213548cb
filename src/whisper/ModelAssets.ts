import { readFile } from 'fs/promises';
import type { z } from 'zod';
import { GenerationConfigSchema, type GenerationConfig } from '../models/GenerationConfig';
import { ModelConfigSchema, type ModelConfig } from '../models/ModelConfig';
import { PreprocessorConfigSchema, toSpectralOverrides } from '../models/PreprocessorConfig';
import type { WhisperModelInfo } from '../models/WhisperModelInfo';
import { createLogger } from '../utils/logger';
import { resolveSpectralConfig } from './spectral/SpectralConfig';
import { WhisperTokenizer } from './Tokenizer';
import { TokenMap } from './TokenMap';
import type { SpectralConfig } from './types';

const logger = createLogger({ service: 'ModelAssets' });

export interface ModelAssets {
  spectral: SpectralConfig;
  melFilters?: number[][];
  modelConfig: ModelConfig;
  generation?: GenerationConfig;
  tokenizer: WhisperTokenizer;
  tokenMap: TokenMap;
}

export async function readJsonFile<T extends z.ZodTypeAny>(path: string, schema: T): Promise<z.output<T>> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return schema.parse(raw);
}

/**
 * Reads an optional JSON file. A missing path yields undefined; a file that
 * cannot be read or validated is logged and treated as missing.
 */
async function readOptional<T extends z.ZodTypeAny>(
  path: string | undefined,
  schema: T,
  label: string
): Promise<z.output<T> | undefined> {
  if (!path) return undefined;
  try {
    return await readJsonFile(path, schema);
  } catch (error) {
    logger.warn({ path, error: error instanceof Error ? error.message : String(error) }, `Ignoring unreadable ${label}`);
    return undefined;
  }
}

/** Everything besides the ONNX sessions that a loaded model needs */
export async function loadModelAssets(model: WhisperModelInfo): Promise<ModelAssets> {
  const [preprocessor, modelConfig, generation, tokenizer] = await Promise.all([
    readOptional(model.preprocessorConfigPath, PreprocessorConfigSchema, 'preprocessor config'),
    readOptional(model.configPath, ModelConfigSchema, 'model config'),
    readOptional(model.generationConfigPath, GenerationConfigSchema, 'generation config'),
    WhisperTokenizer.load(model.tokenizerPath)
  ]);

  const spectral = resolveSpectralConfig(preprocessor ? toSpectralOverrides(preprocessor) : {});
  const tokenMap = TokenMap.resolve(tokenizer, generation);

  logger.info(
    {
      model: model.name,
      sampleRate: spectral.sampleRate,
      nMels: spectral.nMels,
      nFrames: spectral.nFrames,
      chunkLengthSamples: spectral.chunkLengthSamples,
      vocabulary: tokenizer.size,
      melFilters: preprocessor?.mel_filters ? 'preprocessor' : 'computed'
    },
    'Model assets loaded'
  );

  return {
    spectral,
    melFilters: preprocessor?.mel_filters,
    modelConfig: modelConfig ?? {},
    generation,
    tokenizer,
    tokenMap
  };
}
