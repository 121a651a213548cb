import pino from 'pino';
import { env } from '../config/env';

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { app: 'whisper-onnx-server' },
  timestamp: pino.stdTimeFunctions.isoTime
});

/**
 * Child logger bound to a component, e.g. `createLogger({ service: 'ChunkScheduler' })`
 */
export function createLogger(bindings: pino.Bindings): pino.Logger {
  return logger.child(bindings);
}
