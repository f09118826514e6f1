/**
 * Engine-backed TTS Provider
 *
 * Wraps an external neural synthesis engine (see ISynthesisEngine).
 * The engine is loaded on the first synthesize() call, after the model and
 * voices files have been found on disk. Engine output goes through the
 * noise gate / normalization stage and is encoded as mono 16-bit WAV.
 *
 * Pitch and seed are accepted but ignored: the engine has no pitch control
 * and is not seed-controllable, so output is not reproducible across calls.
 */

import { existsSync } from 'fs';
import { access } from 'fs/promises';
import type { AudioFormat, ITTSProvider, SynthesizeOptions } from '../ITTSProvider';
import type { EngineLoader, ISynthesisEngine } from '../../engine/ISynthesisEngine';
import { AssetNotFoundError, EngineInitError, NoVoicesAvailableError, TTSError, UnsupportedFormatError } from '../../errors';
import { postProcess, resolvePostProcessOptions, type PostProcessOptions } from '../../../audio/postProcessor';
import { encodeWav } from '../../../audio/wavEncoder';
import { OnceCell } from '../../../utils/OnceCell';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'EngineTTSProvider' });

export const DEFAULT_ENGINE_SAMPLE_RATE = 24000;

export interface EngineTTSProviderConfig {
  name?: string;
  modelPath: string;
  voicesPath: string;
  defaultVoice: string;
  defaultLang: string;
  noiseGateThreshold?: number;
  enableNormalization?: boolean;
  normalizeTarget?: number;
  engineLibraryPath?: string;
  engineDataPath?: string;
  /** Used when the engine does not report its output rate */
  sampleRate?: number;
}

interface EngineState {
  engine: ISynthesisEngine;
  voices: readonly string[];
}

/**
 * Lowercase, '_' → '-', and expand bare 'en' to 'en-us'
 */
export function normalizeLanguage(lang: string | undefined): string {
  if (!lang) {
    return 'en-us';
  }
  const normalized = lang.replace(/_/g, '-').toLowerCase();
  if (normalized === 'en') {
    return 'en-us';
  }
  return normalized;
}

/**
 * First missing engine asset, checked synchronously
 */
export function findMissingAsset(config: Pick<EngineTTSProviderConfig, 'modelPath' | 'voicesPath'>): AssetNotFoundError | null {
  if (!existsSync(config.modelPath)) {
    return new AssetNotFoundError('model', config.modelPath);
  }
  if (!existsSync(config.voicesPath)) {
    return new AssetNotFoundError('voices', config.voicesPath);
  }
  return null;
}

async function assertAssetExists(assetType: 'model' | 'voices', assetPath: string): Promise<void> {
  try {
    await access(assetPath);
  } catch {
    throw new AssetNotFoundError(assetType, assetPath);
  }
}

export class EngineTTSProvider implements ITTSProvider {
  readonly name: string;
  readonly supportedFormats: readonly AudioFormat[] = ['wav'];
  readonly sampleRate: number;

  private readonly config: EngineTTSProviderConfig;
  private readonly postProcessOptions: PostProcessOptions;
  private readonly engineCell = new OnceCell<EngineState>();

  constructor(
    config: EngineTTSProviderConfig,
    private readonly loadEngine: EngineLoader
  ) {
    this.config = config;
    this.name = config.name ?? 'engine';
    this.sampleRate = config.sampleRate ?? DEFAULT_ENGINE_SAMPLE_RATE;
    this.postProcessOptions = resolvePostProcessOptions({
      noiseGateThreshold: config.noiseGateThreshold ?? 0,
      enableNormalization: config.enableNormalization ?? false,
      normalizeTarget: config.normalizeTarget ?? 0.95
    });
  }

  get initialized(): boolean {
    return this.engineCell.initialized;
  }

  private ensureEngine(): Promise<EngineState> {
    return this.engineCell.getOrInit(async () => {
      await assertAssetExists('model', this.config.modelPath);
      await assertAssetExists('voices', this.config.voicesPath);

      logger.info(
        { modelPath: this.config.modelPath, voicesPath: this.config.voicesPath },
        'Loading synthesis engine'
      );

      try {
        const engine = await this.loadEngine({
          modelPath: this.config.modelPath,
          voicesPath: this.config.voicesPath,
          libraryPath: this.config.engineLibraryPath,
          dataPath: this.config.engineDataPath
        });
        const voices = [...(await engine.getVoices())];
        logger.info({ voiceCount: voices.length }, 'Synthesis engine ready');
        return { engine, voices };
      } catch (error) {
        if (error instanceof TTSError) {
          throw error;
        }
        throw new EngineInitError(
          `Synthesis engine failed to initialize: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error }
        );
      }
    });
  }

  /**
   * Requested voice if the engine knows it, otherwise the first engine voice
   * @throws NoVoicesAvailableError when the engine reports no voices
   */
  async resolveVoice(voice?: string): Promise<string> {
    const { voices } = await this.ensureEngine();
    const candidate = (voice ?? this.config.defaultVoice).trim();

    if (voices.includes(candidate)) {
      return candidate;
    }

    if (voices.length > 0) {
      logger.warn(
        { requested: candidate, fallback: voices[0], available: voices },
        `Voice '${candidate}' not found. Falling back to '${voices[0]}'`
      );
      return voices[0];
    }

    throw new NoVoicesAvailableError(this.name);
  }

  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<Buffer> {
    const format = options.format ?? 'wav';
    if (!this.supportedFormats.includes(format)) {
      throw new UnsupportedFormatError(this.name, format, this.supportedFormats);
    }

    const pitch = options.pitch ?? 0;
    if (pitch !== 0) {
      logger.warn({ pitch }, 'Engine does not support pitch adjustment; ignoring value');
    }

    if (options.seed !== undefined) {
      logger.debug({ seed: options.seed }, 'Engine ignores seed parameter');
    }

    const { engine } = await this.ensureEngine();
    const voice = await this.resolveVoice(options.voice);
    const lang = normalizeLanguage(options.language ?? this.config.defaultLang);

    const result = await engine.create({
      text,
      voice,
      speed: options.speed ?? 1.0,
      lang
    });

    const processed = postProcess(result.samples, this.postProcessOptions);
    return encodeWav(processed, result.sampleRate || this.sampleRate);
  }
}
