/**
 * ONNX Whisper STT Provider
 *
 * Runs an exported Whisper model (encoder_model.onnx + decoder_model_merged.onnx)
 * in-process through onnxruntime-web. Feature extraction, the decode loop and
 * the token policy are our own; the runtime only evaluates the two graphs.
 */

import type { AudioPreparation } from '../../../audio/AudioPreparer';
import type { WhisperModelInfo } from '../../../models/WhisperModelInfo';
import { createLogger } from '../../../utils/logger';
import { ChunkScheduler, type ScheduleOptions } from '../../../whisper/ChunkScheduler';
import { DecodingEngine, type DecodingEngineOptions } from '../../../whisper/decoding/DecodingEngine';
import { loadModelAssets } from '../../../whisper/ModelAssets';
import { LogMelExtractor } from '../../../whisper/spectral/LogMelExtractor';
import type { WhisperTokenizer } from '../../../whisper/Tokenizer';
import type { AudioClip } from '../../../whisper/types';
import type { ISTTProvider } from '../ISTTProvider';
import {
  OnnxDecoder,
  OnnxEncoder,
  createOrtSession,
  emptyCacheDims,
  type InferenceSessionLike,
  type SessionFactory
} from './OnnxSessions';

const logger = createLogger({ service: 'OnnxWhisperProvider' });

export interface OnnxWhisperProviderOptions {
  audio: AudioPreparation;
  decoding?: Partial<DecodingEngineOptions>;
  silenceRms?: number;
  /** 0 or undefined: one per available core */
  featureWorkers?: number;
  createSession?: SessionFactory;
}

interface LoadedModel {
  info: WhisperModelInfo;
  sessions: InferenceSessionLike[];
  extractor: LogMelExtractor;
  tokenizer: WhisperTokenizer;
  scheduler: ChunkScheduler;
}

export class OnnxWhisperProvider implements ISTTProvider {
  readonly name = 'onnx-whisper';
  private loaded: LoadedModel | null = null;
  private readonly createSession: SessionFactory;

  constructor(private readonly options: OnnxWhisperProviderOptions) {
    this.createSession = options.createSession ?? createOrtSession;
  }

  get model(): WhisperModelInfo | null {
    return this.loaded?.info ?? null;
  }

  get progress(): number | undefined {
    return this.loaded?.scheduler.progress;
  }

  /** Replaces any loaded model; on failure nothing stays loaded */
  async load(info: WhisperModelInfo): Promise<void> {
    await this.release();

    const started = Date.now();
    const assets = await loadModelAssets(info);
    const sessions: InferenceSessionLike[] = [];

    try {
      const encoderSession = await this.createSession(info.encoderPath);
      sessions.push(encoderSession);
      const decoderSession = await this.createSession(info.decoderPath);
      sessions.push(decoderSession);

      const encoder = new OnnxEncoder(encoderSession);
      const decoder = new OnnxDecoder(decoderSession, emptyCacheDims(assets.modelConfig));
      const extractor = new LogMelExtractor(assets.spectral, {
        workers: this.options.featureWorkers,
        melFilters: assets.melFilters
      });
      const engine = new DecodingEngine(decoder, assets.tokenizer, this.options.decoding);
      const scheduler = new ChunkScheduler(
        { audio: this.options.audio, extractor, encoder, engine, tokenMap: assets.tokenMap },
        { silenceRms: this.options.silenceRms }
      );

      this.loaded = { info, sessions, extractor, tokenizer: assets.tokenizer, scheduler };
      logger.info(
        {
          model: info.name,
          cacheSlots: decoder.signature.cacheSlots.length,
          cacheBranch: decoder.signature.supportsCacheBranch,
          durationMs: Date.now() - started
        },
        'Whisper model loaded'
      );
    } catch (error) {
      assets.tokenizer.free();
      await Promise.allSettled(sessions.map((session) => session.release()));
      throw error;
    }
  }

  async release(): Promise<void> {
    const loaded = this.loaded;
    if (!loaded) return;
    this.loaded = null;

    await loaded.extractor.close();
    loaded.tokenizer.free();
    const results = await Promise.allSettled(loaded.sessions.map((session) => session.release()));
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.warn({ model: loaded.info.name, error: String(result.reason) }, 'Session release failed');
      }
    }
    logger.info({ model: loaded.info.name }, 'Whisper model released');
  }

  async *transcribe(clip: AudioClip, options: ScheduleOptions = {}): AsyncGenerator<string, void, void> {
    if (!this.loaded) {
      throw new Error('No Whisper model loaded');
    }
    yield* this.loaded.scheduler.transcribe(clip, options);
  }
}
