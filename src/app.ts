import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { createAudioRouter } from './api/audio.routes';
import { createWhisperRouter } from './api/whisper.routes';
import { errorHandler } from './middleware/errorHandler';
import type { AudioCacheService } from './services/AudioCacheService';
import type { TranscriptionService } from './services/TranscriptionService';
import { logger } from './utils/logger';

export interface AppDependencies {
  transcription: TranscriptionService;
  audioCache: AudioCacheService;
  enableCors?: boolean;
  uploadLimitMb?: number;
}

export function createApp({ transcription, audioCache, enableCors = true, uploadLimitMb = 100 }: AppDependencies) {
  const app = express();

  // Middleware
  app.use(helmet());
  if (enableCors) app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  app.use(
    pinoHttp({
      logger,
      autoLogging: false
    })
  );

  // Routes
  app.get('/health', (_req, res) => {
    const status = transcription.status();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      model: status.model,
      busy: status.busy,
      cachedAudio: audioCache.size
    });
  });

  app.use('/api/audio', createAudioRouter(audioCache, uploadLimitMb));
  app.use('/api/whisper', createWhisperRouter(transcription, audioCache));

  app.use((req, res) => {
    res.status(404).json({ error: 'Not Found', message: `${req.method} ${req.path} does not exist` });
  });

  app.use(errorHandler);

  return app;
}
