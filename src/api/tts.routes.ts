import { Router, Request, Response, NextFunction } from 'express';
import { SynthesisRequestSchema } from '../models/SynthesisRequest';
import { AUDIO_FORMATS } from '../providers/ai/ITTSProvider';
import type { TTSProviderRegistry } from '../providers/ProviderRegistry';
import type { SynthesisService } from '../services/SynthesisService';

export function createTTSRouter(synthesisService: SynthesisService, registry: TTSProviderRegistry): Router {
  const router = Router();

  /**
   * POST /tts?provider=<name>
   * Synthesize speech; responds with the encoded audio bytes
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = SynthesisRequestSchema.parse(req.body);
      const providerName = typeof req.query.provider === 'string' ? req.query.provider : undefined;

      const result = await synthesisService.synthesize(request, providerName);

      res.set({
        'Content-Type': result.contentType,
        'Content-Length': result.audio.length.toString(),
        'X-TTS-Provider': result.provider,
        'X-TTS-Voice': result.voice,
        'X-TTS-Language': result.language
      });
      res.send(result.audio);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /tts/formats
   * Supported output formats and their MIME types
   */
  router.get('/formats', (_req: Request, res: Response) => {
    res.json({
      formats: AUDIO_FORMATS.map((format) => ({ id: format, mime_type: `audio/${format}` }))
    });
  });

  /**
   * GET /tts/providers
   * Registered providers (triggers default bootstrap on first call)
   */
  router.get('/providers', (_req: Request, res: Response, next: NextFunction) => {
    try {
      const defaultProvider = registry.get();
      res.json({
        default: defaultProvider.name,
        providers: registry.getAvailableProviders()
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
