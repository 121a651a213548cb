/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

// Load .env file
dotenv.config();

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  // ===== Server Configuration =====
  PORT: z.coerce.number().int().positive().default(3003),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  ENABLE_CORS: booleanFlag(true),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // ===== Whisper Models =====
  WHISPER_MODEL_DIRS: z
    .string()
    .default('./models')
    .transform((value) =>
      value
        .split(',')
        .map((dir) => dir.trim())
        .filter((dir) => dir.length > 0)
    ),
  WHISPER_DEFAULT_MODEL: z.string().optional(),

  // ===== Decoding Policy =====
  WHISPER_SILENCE_RMS: z.coerce.number().nonnegative().default(0.001),
  WHISPER_MAX_TOKENS: z.coerce.number().int().positive().default(448),
  WHISPER_REPETITION_PENALTY: z.coerce.number().positive().default(2.0),
  WHISPER_REPETITION_WINDOW: z.coerce.number().int().positive().default(15),
  WHISPER_QUALITY_TOP_K: z.coerce.number().int().nonnegative().default(64),
  WHISPER_QUALITY_MASK_CAP: z.coerce.number().int().nonnegative().default(16),
  WHISPER_SAMPLING_TOP_K: z.coerce.number().int().positive().default(50),
  WHISPER_SAMPLING_TEMPERATURE: z.coerce.number().positive().default(0.8),
  WHISPER_INITIAL_SAMPLING_STEPS: z.coerce.number().int().nonnegative().default(3),
  WHISPER_MIN_TOKENS_BEFORE_EOT: z.coerce.number().int().nonnegative().default(3),

  // ===== Feature Extraction =====
  WHISPER_FEATURE_WORKERS: z.coerce.number().int().nonnegative().default(0), // 0 = one per core

  // ===== Audio =====
  AUDIO_UPLOAD_LIMIT_MB: z.coerce.number().positive().default(100),
  AUDIO_CACHE_TTL_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  FFMPEG_PATH: z.string().default('ffmpeg')
});

export type Env = z.infer<typeof envSchema>;

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Environment validation failed:');
  parsed.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

export const env: Env = parsed.data;

// Log configuration (non-sensitive info only)
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment configuration loaded:');
  console.log(`   - Server Port: ${env.PORT}`);
  console.log(`   - Node Environment: ${env.NODE_ENV}`);
  console.log(`   - Model Directories: ${env.WHISPER_MODEL_DIRS.join(', ') || '(none)'}`);
  console.log(`   - Default Model: ${env.WHISPER_DEFAULT_MODEL || '(not set)'}`);
}
