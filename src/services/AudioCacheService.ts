import { randomUUID } from 'crypto';
import { getAudioDurationMs } from '../audio/AudioUtils';
import { AudioNotFoundError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { AudioClip } from '../whisper/types';

const logger = createLogger({ service: 'AudioCacheService' });

export interface AudioCacheOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
}

interface CacheEntry {
  clip: AudioClip;
  expiresAt: number;
}

/** Uploaded audio by id, evicted after its TTL or when the cache is full */
export class AudioCacheService {
  private cache: Map<string, CacheEntry> = new Map();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: AudioCacheOptions = {}) {
    this.maxEntries = options.maxEntries ?? 20;
    this.ttlMs = options.ttlMs ?? 10 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    this.evictExpired();
    return this.cache.size;
  }

  store(clip: AudioClip): string {
    this.evictExpired();

    // Oldest first: Map keeps insertion order
    while (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      logger.debug({ audioId: oldest.value }, 'Audio cache full, oldest entry dropped');
    }

    const audioId = randomUUID();
    this.cache.set(audioId, { clip, expiresAt: this.now() + this.ttlMs });

    logger.debug(
      {
        audioId,
        sampleRate: clip.sampleRate,
        channels: clip.channels.length,
        durationMs: getAudioDurationMs(clip.channels[0]?.length ?? 0, clip.sampleRate)
      },
      'Audio cached'
    );
    return audioId;
  }

  get(audioId: string): AudioClip | undefined {
    const entry = this.cache.get(audioId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.cache.delete(audioId);
      logger.debug({ audioId }, 'Audio cache entry expired');
      return undefined;
    }
    return entry.clip;
  }

  /** @throws AudioNotFoundError */
  require(audioId: string): AudioClip {
    const clip = this.get(audioId);
    if (!clip) throw new AudioNotFoundError(audioId);
    return clip;
  }

  delete(audioId: string): boolean {
    return this.cache.delete(audioId);
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [audioId, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(audioId);
        logger.debug({ audioId }, 'Audio cache entry expired');
      }
    }
  }
}
