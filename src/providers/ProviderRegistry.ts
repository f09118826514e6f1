/**
 * Provider Registry
 *
 * Name-keyed registry of TTS providers. Allows runtime selection of a
 * provider per request, with lazy bootstrap of the configured default and
 * a mock fallback when the default cannot be brought up.
 */

import type { ITTSProvider } from './ai/ITTSProvider';
import { MockTTSProvider } from './ai/tts/MockTTSProvider';
import { ProviderNotFoundError, type TTSError } from './errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'TTSProviderRegistry' });

export const FALLBACK_PROVIDER = 'mock';

export type ProviderInitResult =
  | { ok: true; provider: ITTSProvider }
  | { ok: false; error: TTSError };

export type ProviderFactoryFn = () => ProviderInitResult;

export interface ProviderRegistryOptions {
  /** Name used when get() is called without one */
  defaultProvider: string;
  /** Factories tried for the default provider during bootstrap */
  factories?: Record<string, ProviderFactoryFn>;
  /** Sample rate of the mock fallback */
  mockSampleRate?: number;
}

export class TTSProviderRegistry {
  private providers = new Map<string, ITTSProvider>();
  private readonly defaultProvider: string;
  private readonly factories: Record<string, ProviderFactoryFn>;
  private readonly mockSampleRate?: number;

  constructor(options: ProviderRegistryOptions) {
    this.defaultProvider = options.defaultProvider;
    this.factories = options.factories ?? {};
    this.mockSampleRate = options.mockSampleRate;
  }

  get defaultProviderName(): string {
    return this.defaultProvider;
  }

  /**
   * Register a TTS provider (last registration for a name wins)
   */
  register(name: string, provider: ITTSProvider): void {
    this.providers.set(name, provider);
    logger.info({ name, provider: provider.name }, 'Registered TTS provider');
  }

  /**
   * Get a TTS provider by name, or the default provider
   * @throws ProviderNotFoundError if the provider is not registered and no fallback applies
   */
  get(name?: string): ITTSProvider {
    const providerName = name ?? this.defaultProvider;

    if (this.providers.size === 0) {
      this.bootstrap();
    }

    const provider = this.providers.get(providerName);
    if (provider) {
      return provider;
    }

    const fallback = this.providers.get(FALLBACK_PROVIDER);
    if (providerName === this.defaultProvider && fallback) {
      logger.warn(
        { requested: providerName, fallback: FALLBACK_PROVIDER },
        `Falling back to ${FALLBACK_PROVIDER} provider because ${providerName} is unavailable`
      );
      return fallback;
    }

    throw new ProviderNotFoundError(providerName, this.getAvailableProviders());
  }

  /**
   * Check if a provider is registered
   */
  has(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * Get list of registered provider names
   */
  getAvailableProviders(): string[] {
    return Array.from(this.providers.keys());
  }

  /**
   * Log all registered providers
   */
  logRegisteredProviders(): void {
    const names = this.getAvailableProviders();
    logger.info(
      { default: this.defaultProvider, providers: names },
      `Registered TTS providers: ${names.length > 0 ? names.join(', ') : '(none)'}`
    );
  }

  /**
   * Bring up the default provider and the mock fallback. Runs synchronously,
   * so concurrent first lookups cannot observe a half-populated registry.
   */
  private bootstrap(): void {
    const factory = this.factories[this.defaultProvider];

    if (factory) {
      const result = factory();
      if (result.ok) {
        this.providers.set(this.defaultProvider, result.provider);
      } else if (result.error.kind === 'AssetNotFound') {
        logger.warn({ provider: this.defaultProvider, reason: result.error.message }, 'Default TTS provider unavailable');
      } else {
        logger.error(
          { provider: this.defaultProvider, kind: result.error.kind, err: result.error },
          'Failed to initialize default TTS provider'
        );
      }
    }

    if (!this.providers.has(FALLBACK_PROVIDER)) {
      this.providers.set(FALLBACK_PROVIDER, new MockTTSProvider(this.mockSampleRate));
    }

    this.logRegisteredProviders();
  }
}
