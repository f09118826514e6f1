import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import pinoHttp from 'pino-http';
import { logger } from './utils/logger';
import healthRoutes from './api/health.routes';
import { createTTSRouter } from './api/tts.routes';
import { errorHandler } from './middleware/errorHandler';
import type { TTSProviderRegistry } from './providers/ProviderRegistry';
import type { SynthesisService } from './services/SynthesisService';

export interface AppDependencies {
  registry: TTSProviderRegistry;
  synthesisService: SynthesisService;
  apiPrefix?: string;
  enableCors?: boolean;
}

export function createApp(deps: AppDependencies): Express {
  const apiPrefix = deps.apiPrefix ?? '/api/v1';
  const app = express();

  // Middleware
  app.use(helmet());
  if (deps.enableCors ?? true) {
    app.use(cors());
  }
  app.use(express.json({ limit: '1mb' }));
  app.use(pinoHttp({
    logger,
    autoLogging: false // Per-request logging happens in SynthesisService
  }));

  // Routes
  app.use(apiPrefix, healthRoutes);
  app.use(`${apiPrefix}/tts`, createTTSRouter(deps.synthesisService, deps.registry));

  // Error handling
  app.use(errorHandler);

  return app;
}
