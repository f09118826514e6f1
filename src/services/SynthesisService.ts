import type { TTSProviderRegistry } from '../providers/ProviderRegistry';
import type { AudioFormat } from '../providers/ai/ITTSProvider';
import { TextTooLongError } from '../providers/errors';
import type { SynthesisRequest } from '../models/SynthesisRequest';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'SynthesisService' });

export interface SynthesisServiceOptions {
  maxTextLength: number;
  defaultVoice: string;
}

export interface SynthesisResult {
  audio: Buffer;
  format: AudioFormat;
  contentType: string;
  /** Name of the provider that produced the audio (after any fallback) */
  provider: string;
  voice: string;
  language: string;
  text: string;
}

export class SynthesisService {
  constructor(
    private readonly registry: TTSProviderRegistry,
    private readonly options: SynthesisServiceOptions
  ) {}

  async synthesize(request: SynthesisRequest, providerName?: string): Promise<SynthesisResult> {
    if (request.text.length > this.options.maxTextLength) {
      throw new TextTooLongError(this.options.maxTextLength);
    }

    const provider = this.registry.get(providerName);
    const startedAt = Date.now();

    const audio = await provider.synthesize(request.text, {
      voice: request.voice,
      language: request.lang,
      speed: request.speed,
      pitch: request.pitch,
      format: request.format,
      seed: request.seed
    });

    logger.info(
      {
        provider: provider.name,
        chars: request.text.length,
        format: request.format,
        bytes: audio.length,
        durationMs: Date.now() - startedAt
      },
      'Speech synthesized'
    );

    return {
      audio,
      format: request.format,
      contentType: `audio/${request.format}`,
      provider: provider.name,
      voice: request.voice || this.options.defaultVoice,
      language: request.lang,
      text: request.text
    };
  }
}
