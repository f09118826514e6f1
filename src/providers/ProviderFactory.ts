/**
 * Provider Factory
 *
 * Creates the TTS provider registry from environment configuration.
 */

import type { Env } from '../config/env';
import { TTSProviderRegistry, type ProviderInitResult } from './ProviderRegistry';
import { EngineTTSProvider, findMissingAsset, type EngineTTSProviderConfig } from './ai/tts/EngineTTSProvider';
import { loadEngineModule } from './engine/engineModule';
import type { EngineLoader } from './engine/ISynthesisEngine';
import { EngineInitError } from './errors';

export const ENGINE_PROVIDER = 'engine';

type ProviderEnv = Pick<
  Env,
  | 'DEFAULT_TTS_PROVIDER'
  | 'MOCK_SAMPLE_RATE'
  | 'TTS_ENGINE_MODULE'
  | 'TTS_ENGINE_MODEL_PATH'
  | 'TTS_ENGINE_VOICES_PATH'
  | 'TTS_ENGINE_DEFAULT_VOICE'
  | 'TTS_ENGINE_DEFAULT_LANG'
  | 'TTS_ENGINE_LIBRARY_PATH'
  | 'TTS_ENGINE_DATA_PATH'
  | 'TTS_ENGINE_SAMPLE_RATE'
  | 'TTS_NOISE_GATE_THRESHOLD'
  | 'TTS_ENABLE_NORMALIZATION'
  | 'TTS_NORMALIZE_TARGET'
>;

export function engineConfigFromEnv(env: ProviderEnv): EngineTTSProviderConfig {
  return {
    name: ENGINE_PROVIDER,
    modelPath: env.TTS_ENGINE_MODEL_PATH,
    voicesPath: env.TTS_ENGINE_VOICES_PATH,
    defaultVoice: env.TTS_ENGINE_DEFAULT_VOICE,
    defaultLang: env.TTS_ENGINE_DEFAULT_LANG,
    engineLibraryPath: env.TTS_ENGINE_LIBRARY_PATH,
    engineDataPath: env.TTS_ENGINE_DATA_PATH,
    noiseGateThreshold: env.TTS_NOISE_GATE_THRESHOLD,
    enableNormalization: env.TTS_ENABLE_NORMALIZATION,
    normalizeTarget: env.TTS_NORMALIZE_TARGET,
    sampleRate: env.TTS_ENGINE_SAMPLE_RATE
  };
}

/**
 * Construct the engine-backed provider if its assets are on disk.
 * The engine itself is still loaded lazily on first synthesis.
 */
export function createEngineProvider(config: EngineTTSProviderConfig, loader: EngineLoader): ProviderInitResult {
  const missing = findMissingAsset(config);
  if (missing) {
    return { ok: false, error: missing };
  }

  try {
    return { ok: true, provider: new EngineTTSProvider(config, loader) };
  } catch (error) {
    return {
      ok: false,
      error: new EngineInitError(
        `Failed to construct engine provider: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    };
  }
}

/**
 * Create the provider registry; the default provider is brought up on first lookup
 */
export function createProviderRegistry(env: ProviderEnv, loader?: EngineLoader): TTSProviderRegistry {
  const engineLoader = loader ?? loadEngineModule(env.TTS_ENGINE_MODULE);
  const engineConfig = engineConfigFromEnv(env);

  return new TTSProviderRegistry({
    defaultProvider: env.DEFAULT_TTS_PROVIDER,
    mockSampleRate: env.MOCK_SAMPLE_RATE,
    factories: {
      [ENGINE_PROVIDER]: () => createEngineProvider(engineConfig, engineLoader)
    }
  });
}
