import type { WhisperModelInfo } from '../../models/WhisperModelInfo';
import type { ScheduleOptions } from '../../whisper/ChunkScheduler';
import type { AudioClip } from '../../whisper/types';

/**
 * Speech-to-text backend driven by the transcription service. One model is
 * loaded at a time; `transcribe` must not be called concurrently.
 */
export interface ISTTProvider {
  readonly name: string;
  /** The loaded model, or null */
  readonly model: WhisperModelInfo | null;
  /** Progress of the running transcription; undefined when idle */
  readonly progress: number | undefined;

  load(model: WhisperModelInfo): Promise<void>;
  release(): Promise<void>;
  transcribe(clip: AudioClip, options?: ScheduleOptions): AsyncGenerator<string, void, void>;
}
