import { Router, Request, Response, NextFunction } from 'express';
import { LoadModelBodySchema, TranscriptionQuerySchema, type TranscriptionQuery } from '../models/TranscriptionRequest';
import type { AudioCacheService } from '../services/AudioCacheService';
import type { TranscriptionService } from '../services/TranscriptionService';
import { createLogger } from '../utils/logger';
import type { TranscriptionOptions } from '../whisper/types';

const logger = createLogger({ service: 'WhisperRoutes' });

/** Aborts when the client goes away before the response is finished */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      logger.info('Client disconnected, cancelling transcription');
      controller.abort();
    }
  });
  return controller;
}

function toOptions(query: TranscriptionQuery, signal: AbortSignal): TranscriptionOptions {
  return {
    language: query.language,
    translate: query.translate,
    timestamps: query.timestamps,
    signal
  };
}

function sseEvent(data: unknown, event?: string): string {
  return `${event ? `event: ${event}\n` : ''}data: ${JSON.stringify(data)}\n\n`;
}

export function createWhisperRouter(transcription: TranscriptionService, audioCache: AudioCacheService): Router {
  const router = Router();

  /**
   * GET /api/whisper/models
   * Whisper model directories found under WHISPER_MODEL_DIRS
   */
  router.get('/models', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const models = await transcription.listModels();
      res.json({ count: models.length, models: models.map((model) => ({ name: model.name, directory: model.directory })) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/whisper/status
   * Loaded model (or null) and whether a transcription is running
   */
  router.get('/status', (_req: Request, res: Response) => {
    res.json(transcription.status());
  });

  /**
   * POST /api/whisper/load
   * Body: { name?: string }. Responds { loaded: false } when no model matches
   * or loading fails.
   */
  router.post('/load', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = LoadModelBodySchema.parse(req.body ?? {});
      const loaded = await transcription.initialize(name);
      res.json({ loaded, model: transcription.status().model });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/whisper
   * Release the loaded model's sessions
   */
  router.delete('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      await transcription.deinitialize();
      res.json({ disposed: true });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/whisper/progress
   * { progress } in [0, 1] while a transcription runs, 204 otherwise
   */
  router.get('/progress', (_req: Request, res: Response) => {
    const progress = transcription.progress;
    if (progress === undefined) {
      res.status(204).end();
      return;
    }
    res.json({ progress });
  });

  /**
   * POST /api/whisper/transcribe?audioId=…&language=en&translate=false&timestamps=false
   */
  router.post('/transcribe', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = TranscriptionQuerySchema.parse(req.query);
      const clip = audioCache.require(query.audioId);
      const controller = abortOnDisconnect(res);

      const text = await transcription.transcribe(clip, toOptions(query, controller.signal));
      res.json({ text });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/whisper/transcribe/stream?audioId=…
   * Server-sent events: one `data:` event per fragment (JSON string), then
   * `event: done` with the full text.
   */
  router.post('/transcribe/stream', async (req: Request, res: Response, next: NextFunction) => {
    let fragments: AsyncGenerator<string, void, void>;
    let first: IteratorResult<string, void>;

    try {
      const query = TranscriptionQuerySchema.parse(req.query);
      const clip = audioCache.require(query.audioId);
      const controller = abortOnDisconnect(res);

      fragments = transcription.stream(clip, toOptions(query, controller.signal));
      // busy and not-loaded errors surface here, before any event is written
      first = await fragments.next();
    } catch (error) {
      next(error);
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive'
    });

    let text = '';
    try {
      for (let step = first; !step.done; step = await fragments.next()) {
        text += step.value;
        res.write(sseEvent(step.value));
      }
      res.write(sseEvent({ text: text.trim() }, 'done'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, 'Streaming transcription failed');
      res.write(sseEvent({ message }, 'error'));
    } finally {
      res.end();
    }
  });

  return router;
}
