import express, { Router, Request, Response, NextFunction } from 'express';
import { decodeWav, getAudioDurationMs } from '../audio/AudioUtils';
import type { AudioCacheService } from '../services/AudioCacheService';
import { InvalidAudioError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { AudioClip } from '../whisper/types';

const logger = createLogger({ service: 'AudioRoutes' });

const WAV_TYPES = ['audio/wav', 'audio/x-wav', 'audio/wave', 'audio/vnd.wave', 'application/octet-stream'];

function describeClip(audioId: string, clip: AudioClip) {
  const samples = clip.channels[0]?.length ?? 0;
  return {
    audioId,
    sampleRate: clip.sampleRate,
    channels: clip.channels.length,
    durationMs: Math.round(getAudioDurationMs(samples, clip.sampleRate))
  };
}

export function createAudioRouter(audioCache: AudioCacheService, uploadLimitMb: number): Router {
  const router = Router();

  /**
   * POST /api/audio
   * Upload a WAV file (raw body); returns the id to transcribe it by
   */
  router.post(
    '/',
    express.raw({ type: WAV_TYPES, limit: `${uploadLimitMb}mb` }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
          throw new InvalidAudioError(`Expected a WAV body with Content-Type ${WAV_TYPES[0]}`);
        }
        const clip = decodeWav(req.body);
        const audioId = audioCache.store(clip);
        const info = describeClip(audioId, clip);

        logger.info(info, 'Audio uploaded');
        res.status(201).json(info);
      } catch (error) {
        next(error);
      }
    }
  );

  /**
   * GET /api/audio/:audioId
   * Format and duration of an uploaded clip
   */
  router.get('/:audioId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { audioId } = req.params;
      res.json(describeClip(audioId, audioCache.require(audioId)));
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/audio/:audioId
   */
  router.delete('/:audioId', (req: Request, res: Response) => {
    const deleted = audioCache.delete(req.params.audioId);
    res.status(deleted ? 204 : 404).end();
  });

  return router;
}
