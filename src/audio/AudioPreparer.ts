import { createLogger } from '../utils/logger';
import type { AudioClip } from '../whisper/types';
import { downmix, resampleFloat32 } from './AudioUtils';

const logger = createLogger({ service: 'AudioPreparer' });

export interface AudioPreparation {
  /** Mono samples at `sampleRate`; the clip itself is left untouched */
  toMono(clip: AudioClip, sampleRate: number): Promise<Float32Array>;
}

export class AudioPreparer implements AudioPreparation {
  constructor(private readonly ffmpegPath: string = 'ffmpeg') {}

  async toMono(clip: AudioClip, sampleRate: number): Promise<Float32Array> {
    const mono = downmix(clip.channels);
    if (clip.channels.length > 1) {
      logger.debug({ channels: clip.channels.length, samples: mono.length }, 'Downmixed to mono');
    }

    if (clip.sampleRate === sampleRate) {
      return mono;
    }

    const resampled = await resampleFloat32(mono, clip.sampleRate, sampleRate, this.ffmpegPath);
    logger.debug(
      { from: clip.sampleRate, to: sampleRate, before: mono.length, after: resampled.length },
      'Resampled audio'
    );
    return resampled;
  }
}
