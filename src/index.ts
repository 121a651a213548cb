import { createApp } from './app';
import { AudioPreparer } from './audio/AudioPreparer';
import { decodingOptionsFromEnv } from './config/decoding';
import { env } from './config/env';
import { OnnxWhisperProvider } from './providers/ai/stt/OnnxWhisperProvider';
import { AudioCacheService } from './services/AudioCacheService';
import { ModelCatalogService } from './services/ModelCatalogService';
import { TranscriptionService } from './services/TranscriptionService';
import { logger } from './utils/logger';

// Initialize services
const catalog = new ModelCatalogService(env.WHISPER_MODEL_DIRS);
const provider = new OnnxWhisperProvider({
  audio: new AudioPreparer(env.FFMPEG_PATH),
  decoding: decodingOptionsFromEnv(env),
  silenceRms: env.WHISPER_SILENCE_RMS,
  featureWorkers: env.WHISPER_FEATURE_WORKERS
});
const transcription = new TranscriptionService(catalog, provider, env.WHISPER_DEFAULT_MODEL);
const audioCache = new AudioCacheService({ ttlMs: env.AUDIO_CACHE_TTL_MS });

const app = createApp({
  transcription,
  audioCache,
  enableCors: env.ENABLE_CORS,
  uploadLimitMb: env.AUDIO_UPLOAD_LIMIT_MB
});

const server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, modelDirs: env.WHISPER_MODEL_DIRS }, 'Server started');

  if (env.WHISPER_DEFAULT_MODEL) {
    transcription
      .initialize(env.WHISPER_DEFAULT_MODEL)
      .then((loaded) => logger.info({ model: env.WHISPER_DEFAULT_MODEL, loaded }, 'Default Whisper model'))
      .catch((error: unknown) => logger.error({ error }, 'Loading default Whisper model failed'));
  }
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutting down');
  server.close();
  await provider.release();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error({ error }, 'Shutdown failed');
    process.exit(1);
  });
});
