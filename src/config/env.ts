/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';

// Load .env file
dotenv.config();

// z.coerce.boolean() treats "false" as true, so flags are parsed explicitly
const booleanish = (fallback: boolean) =>
  z
    .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
    .default(fallback)
    .transform((value) => value === true || value === 'true' || value === '1');

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const envSchema = z.object({
  // ===== Server Configuration =====
  PORT: z.coerce.number().int().positive().default(8000),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  API_PREFIX: z.string().default('/api/v1'),
  ENABLE_CORS: booleanish(true),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // ===== Synthesis Defaults =====
  DEFAULT_TTS_PROVIDER: z.string().default('engine'),
  DEFAULT_VOICE: z.string().default('af_alloy'),
  DEFAULT_LANGUAGE: z.string().default('en-us'),
  MAX_TEXT_LENGTH: z.coerce.number().int().positive().default(5000),

  // ===== Mock Provider =====
  MOCK_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),

  // ===== Engine-backed Provider =====
  TTS_ENGINE_MODULE: optionalPath, // module exporting createEngine(options)
  TTS_ENGINE_MODEL_PATH: z.string().default('models/engine/model.onnx'),
  TTS_ENGINE_VOICES_PATH: z.string().default('models/engine/voices.bin'),
  TTS_ENGINE_DEFAULT_VOICE: z.string().default('af_alloy'),
  TTS_ENGINE_DEFAULT_LANG: z.string().default('en-us'),
  TTS_ENGINE_LIBRARY_PATH: optionalPath,
  TTS_ENGINE_DATA_PATH: optionalPath,
  TTS_ENGINE_SAMPLE_RATE: z.coerce.number().int().positive().default(24000),

  // ===== Post-processing =====
  TTS_NOISE_GATE_THRESHOLD: z.coerce.number().min(0).default(0.003),
  TTS_ENABLE_NORMALIZATION: booleanish(true),
  TTS_NORMALIZE_TARGET: z.coerce.number().default(0.95)
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment-like record without touching the process state
 */
export function parseEnv(source: Record<string, string | undefined>) {
  return envSchema.safeParse(source);
}

// Parse and validate environment variables
const parsed = parseEnv(process.env);

if (!parsed.success) {
  console.error('❌ Environment validation failed:');
  parsed.error.issues.forEach((issue) => {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  });
  process.exit(1);
}

export const env: Env = parsed.data;
