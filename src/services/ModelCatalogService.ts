import { readdir, stat } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { MODEL_FILES } from '../config/constants';
import type { WhisperModelInfo } from '../models/WhisperModelInfo';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'ModelCatalogService' });

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/** Graph files sit in the model directory or in its `onnx/` subdirectory */
async function findGraph(directory: string, file: string): Promise<string | undefined> {
  for (const candidate of [join(directory, file), join(directory, 'onnx', file)]) {
    if (await isFile(candidate)) return candidate;
  }
  return undefined;
}

async function optionalFile(directory: string, file: string): Promise<string | undefined> {
  const path = join(directory, file);
  return (await isFile(path)) ? path : undefined;
}

/** A Whisper export, or undefined when a required file is missing */
export async function describeModelDirectory(directory: string): Promise<WhisperModelInfo | undefined> {
  const [encoderPath, decoderPath, tokenizerPath] = await Promise.all([
    findGraph(directory, MODEL_FILES.ENCODER),
    findGraph(directory, MODEL_FILES.DECODER),
    optionalFile(directory, MODEL_FILES.TOKENIZER)
  ]);
  if (!encoderPath || !decoderPath || !tokenizerPath) return undefined;

  const [preprocessorConfigPath, configPath, generationConfigPath] = await Promise.all([
    optionalFile(directory, MODEL_FILES.PREPROCESSOR),
    optionalFile(directory, MODEL_FILES.CONFIG),
    optionalFile(directory, MODEL_FILES.GENERATION)
  ]);

  return {
    name: basename(directory),
    directory,
    encoderPath,
    decoderPath,
    tokenizerPath,
    preprocessorConfigPath,
    configPath,
    generationConfigPath
  };
}

/**
 * Whisper model directories found under the configured search directories.
 * A search directory may itself be a model directory or contain them one
 * level down.
 */
export class ModelCatalogService {
  private readonly searchDirectories: string[];

  constructor(searchDirectories: readonly string[]) {
    this.searchDirectories = [...new Set(searchDirectories.map((dir) => resolve(dir)))];
  }

  async list(): Promise<WhisperModelInfo[]> {
    const models: WhisperModelInfo[] = [];
    const seen = new Set<string>();

    for (const root of this.searchDirectories) {
      if (!(await isDirectory(root))) {
        logger.debug({ directory: root }, 'Model directory does not exist');
        continue;
      }

      const candidates = [root];
      const entries = await readdir(root, { withFileTypes: true });
      for (const entry of entries) {
        if (entry.isDirectory()) candidates.push(join(root, entry.name));
      }

      for (const candidate of candidates) {
        if (seen.has(candidate)) continue;
        seen.add(candidate);
        const model = await describeModelDirectory(candidate);
        if (model) models.push(model);
      }
    }

    models.sort((a, b) => a.name.localeCompare(b.name));
    logger.debug({ count: models.length, models: models.map((m) => m.name) }, 'Model directories scanned');
    return models;
  }

  /**
   * Exact name first, then the first model whose name contains `query`
   * (case-insensitive). Without a query the first model is returned.
   */
  async find(query?: string): Promise<WhisperModelInfo | undefined> {
    const models = await this.list();
    if (!query) return models[0];

    const exact = models.find((model) => model.name === query);
    if (exact) return exact;

    const needle = query.toLowerCase();
    return models.find((model) => model.name.toLowerCase().includes(needle));
  }
}
