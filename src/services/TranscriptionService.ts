import type { WhisperModelInfo } from '../models/WhisperModelInfo';
import type { ISTTProvider } from '../providers/ai/ISTTProvider';
import { ModelNotLoadedError, TranscriptionBusyError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ChunkReport } from '../whisper/ChunkScheduler';
import type { AudioClip, TranscriptionOptions } from '../whisper/types';
import type { ModelCatalogService } from './ModelCatalogService';

const logger = createLogger({ service: 'TranscriptionService' });

export interface TranscriptionStatus {
  model: string | null;
  busy: boolean;
  progress: number | undefined;
}

/**
 * Model lifecycle and transcription on top of one STT provider. The
 * provider runs a single transcription at a time; a second request while one
 * runs, or any request while the model is being changed, fails with
 * TranscriptionBusyError.
 */
export class TranscriptionService {
  private busy = false;
  private changingModel = false;

  constructor(
    private readonly catalog: ModelCatalogService,
    private readonly provider: ISTTProvider,
    private readonly defaultModel?: string
  ) {}

  listModels(): Promise<WhisperModelInfo[]> {
    return this.catalog.list();
  }

  status(): TranscriptionStatus {
    return {
      model: this.provider.model?.name ?? null,
      busy: this.busy,
      progress: this.provider.progress
    };
  }

  get progress(): number | undefined {
    return this.provider.progress;
  }

  /**
   * Loads `name`, the configured default, or the first model found.
   * Returns false when no model matches or loading fails.
   */
  async initialize(name?: string): Promise<boolean> {
    this.assertIdle();
    this.changingModel = true;

    try {
      const query = name ?? this.defaultModel;
      const model = await this.catalog.find(query);
      if (!model) {
        logger.warn({ query: query ?? '(any)' }, 'No Whisper model found');
        return false;
      }
      if (this.provider.model?.directory === model.directory) {
        logger.info({ model: model.name }, 'Whisper model already loaded');
        return true;
      }

      try {
        await this.provider.load(model);
        return true;
      } catch (error) {
        logger.error(
          { model: model.name, error: error instanceof Error ? error.message : String(error) },
          'Loading Whisper model failed'
        );
        return false;
      }
    } finally {
      this.changingModel = false;
    }
  }

  async deinitialize(): Promise<void> {
    this.assertIdle();
    this.changingModel = true;
    try {
      await this.provider.release();
    } finally {
      this.changingModel = false;
    }
  }

  private assertIdle(): void {
    if (this.busy) throw new TranscriptionBusyError();
    if (this.changingModel) throw new TranscriptionBusyError('The Whisper model is being changed');
  }

  /**
   * Fragments as they are decoded. The idle check runs when iteration
   * starts, so an abandoned generator never holds the provider.
   */
  async *stream(clip: AudioClip, options: TranscriptionOptions = {}): AsyncGenerator<string, void, void> {
    this.assertIdle();
    if (!this.provider.model) throw new ModelNotLoadedError();

    this.busy = true;
    const started = Date.now();
    const chunks: ChunkReport[] = [];
    let fragments = 0;

    try {
      for await (const fragment of this.provider.transcribe(clip, {
        ...options,
        onChunk: (report) => chunks.push(report)
      })) {
        fragments++;
        yield fragment;
      }
    } finally {
      this.busy = false;
      logger.info(
        {
          model: this.provider.model?.name,
          chunks: chunks.length,
          skipped: chunks.filter((chunk) => chunk.outcome !== 'decoded').length,
          fragments,
          cancelled: options.signal?.aborted ?? false,
          durationMs: Date.now() - started
        },
        'Transcription completed'
      );
    }
  }

  async transcribe(clip: AudioClip, options: TranscriptionOptions = {}): Promise<string> {
    let text = '';
    for await (const fragment of this.stream(clip, options)) {
      text += fragment;
    }
    return text.trim();
  }
}
