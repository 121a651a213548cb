import { COLLAPSED_SPREAD_EPSILON, DEFAULT_SILENCE_RMS } from '../config/constants';
import type { AudioPreparation } from '../audio/AudioPreparer';
import { calculateRms } from '../audio/AudioUtils';
import { createLogger } from '../utils/logger';
import type { DecodingEngine, ChunkDecodeSummary } from './decoding/DecodingEngine';
import { describeMel, type FeatureExtractor } from './spectral/LogMelExtractor';
import type { TokenMap } from './TokenMap';
import type { AudioClip, EncoderSession, FloatTensor, TranscriptionOptions } from './types';

const logger = createLogger({ service: 'ChunkScheduler' });

export type ChunkOutcome = 'silent' | 'extraction-failed' | 'invalid-features' | 'encoder-failed' | 'decoded';

export interface ChunkReport {
  index: number;
  startSample: number;
  /** Exclusive; the true end, before zero padding */
  endSample: number;
  rms: number;
  outcome: ChunkOutcome;
  fragments: number;
  decode?: ChunkDecodeSummary;
}

export interface ScheduleOptions extends TranscriptionOptions {
  /** Called with every progress change; `undefined` once the pass is over */
  onProgress?: (progress: number | undefined) => void;
  onChunk?: (report: ChunkReport) => void;
}

export interface ChunkSchedulerDeps {
  audio: AudioPreparation;
  extractor: FeatureExtractor;
  encoder: EncoderSession;
  engine: DecodingEngine;
  tokenMap: TokenMap;
}

export interface ChunkSchedulerOptions {
  silenceRms?: number;
}

/**
 * Splits audio into fixed, non-overlapping windows and runs each through
 * feature extraction, the encoder and the decoding engine, in order.
 *
 * Silent or degenerate chunks, extraction failures and encoder failures are
 * skipped; none of them stops the pass.
 */
export class ChunkScheduler {
  private currentProgress: number | undefined;
  private readonly silenceRms: number;

  constructor(
    private readonly deps: ChunkSchedulerDeps,
    options: ChunkSchedulerOptions = {}
  ) {
    this.silenceRms = options.silenceRms ?? DEFAULT_SILENCE_RMS;
  }

  /** Fraction of the running pass in [0, 1]; undefined when idle */
  get progress(): number | undefined {
    return this.currentProgress;
  }

  private setProgress(value: number | undefined, options: ScheduleOptions): void {
    this.currentProgress = value;
    options.onProgress?.(value);
  }

  async *transcribe(clip: AudioClip, options: ScheduleOptions = {}): AsyncGenerator<string, void, void> {
    const { extractor, encoder, engine, tokenMap } = this.deps;
    const { signal } = options;

    this.setProgress(0, options);

    try {
      // snapshot: a reconfiguration mid-pass does not change the chunk size
      const { config } = extractor.filterBank;
      const samples = await this.deps.audio.toMono(clip, config.sampleRate);
      const total = samples.length;
      const chunkLength = config.chunkLengthSamples;

      logger.info(
        {
          samples: total,
          seconds: Number((total / config.sampleRate).toFixed(1)),
          chunkLength,
          language: options.language ?? '(default)',
          translate: options.translate ?? false,
          timestamps: options.timestamps ?? false
        },
        'Transcription started'
      );

      let position = 0;
      let index = 0;

      while (position < total && !signal?.aborted) {
        const take = Math.min(total - position, chunkLength);
        const chunk = new Float32Array(chunkLength);
        chunk.set(samples.subarray(position, position + take));
        const rms = calculateRms(chunk, 0, take);

        const report: ChunkReport = {
          index,
          startSample: position,
          endSample: position + take,
          rms,
          outcome: 'decoded',
          fragments: 0
        };

        if (rms < this.silenceRms) {
          report.outcome = 'silent';
          logger.debug({ chunk: index, rms }, 'Silent chunk skipped');
        } else {
          const hiddenStates = await this.encodeChunk(chunk, report);
          if (hiddenStates) {
            const decode = engine.decodeChunk(hiddenStates, tokenMap, { ...options, chunkIndex: index });
            for (;;) {
              const next = await decode.next();
              if (next.done) {
                report.decode = next.value;
                break;
              }
              report.fragments++;
              yield next.value;
            }
          }
        }

        logger.info(
          {
            chunk: index,
            startSample: report.startSample,
            endSample: report.endSample,
            rms: Number(rms.toFixed(6)),
            outcome: report.outcome,
            fragments: report.fragments,
            stopReason: report.decode?.reason
          },
          'Chunk processed'
        );

        position += chunkLength;
        index++;
        this.setProgress(Math.min(position, total) / total, options);
        options.onChunk?.(report);
      }

      if (signal?.aborted) {
        logger.info({ chunks: index }, 'Transcription cancelled');
      } else {
        this.setProgress(1, options);
        logger.info({ chunks: index }, 'Transcription finished');
      }
    } finally {
      this.setProgress(undefined, options);
    }
  }

  /** Features and encoder output, or undefined when the chunk is skipped */
  private async encodeChunk(chunk: Float32Array, report: ChunkReport): Promise<FloatTensor | undefined> {
    let features: FloatTensor;
    try {
      features = await this.deps.extractor.extract(chunk);
    } catch (error) {
      report.outcome = 'extraction-failed';
      logger.error(
        { chunk: report.index, error: error instanceof Error ? error.message : String(error) },
        'Feature extraction failed, chunk skipped'
      );
      return undefined;
    }

    const stats = describeMel(features);

    logger.debug(
      { chunk: report.index, dims: features.dims, min: stats.min, max: stats.max, mean: stats.mean },
      'Log-mel features'
    );

    if (stats.hasNaN || stats.hasInfinity) {
      report.outcome = 'invalid-features';
      logger.warn({ chunk: report.index }, 'Log-mel features contain NaN or Infinity, chunk skipped');
      return undefined;
    }
    if (Math.abs(stats.max - stats.min) < COLLAPSED_SPREAD_EPSILON) {
      report.outcome = 'invalid-features';
      logger.warn({ chunk: report.index, value: stats.max }, 'Log-mel features collapsed, chunk skipped');
      return undefined;
    }

    try {
      return await this.deps.encoder.encode(features);
    } catch (error) {
      report.outcome = 'encoder-failed';
      logger.error(
        { chunk: report.index, error: error instanceof Error ? error.message : String(error) },
        'Encoder failed, chunk skipped'
      );
      return undefined;
    }
  }
}
