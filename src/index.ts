import { env } from './config/env';
import { logger } from './utils/logger';
import { createApp } from './app';
import { createProviderRegistry } from './providers/ProviderFactory';
import { SynthesisService } from './services/SynthesisService';

// Initialize services
const registry = createProviderRegistry(env);
const synthesisService = new SynthesisService(registry, {
  maxTextLength: env.MAX_TEXT_LENGTH,
  defaultVoice: env.DEFAULT_VOICE
});

const app = createApp({
  registry,
  synthesisService,
  apiPrefix: env.API_PREFIX,
  enableCors: env.ENABLE_CORS
});

// Start server
const server = app.listen(env.PORT, env.HOST, () => {
  logger.info(
    {
      host: env.HOST,
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      defaultProvider: env.DEFAULT_TTS_PROVIDER,
      engineModule: env.TTS_ENGINE_MODULE ?? '(not configured)'
    },
    'TTS gateway started'
  );

  // Bring up the default provider now rather than on the first request
  registry.get();
});

// Graceful shutdown
const shutdown = (signal: string) => {
  logger.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export default app;
