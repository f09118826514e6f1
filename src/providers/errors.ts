/**
 * Synthesis error kinds
 *
 * Every failure raised by the provider layer carries a `kind` so callers
 * (registry bootstrap, HTTP error handler, CLI) can branch without
 * inspecting messages.
 */

export type TTSErrorKind =
  | 'AssetNotFound'
  | 'NoVoicesAvailable'
  | 'UnsupportedFormat'
  | 'ProviderNotFound'
  | 'EngineInitFailure'
  | 'TextTooLong';

export abstract class TTSError extends Error {
  abstract readonly kind: TTSErrorKind;
}

export class AssetNotFoundError extends TTSError {
  readonly kind = 'AssetNotFound' as const;

  constructor(
    readonly assetType: 'model' | 'voices',
    readonly assetPath: string
  ) {
    super(
      `Engine ${assetType} file not found at ${assetPath}. ` +
        'Download the engine assets and point TTS_ENGINE_MODEL_PATH / TTS_ENGINE_VOICES_PATH at them.'
    );
    this.name = 'AssetNotFoundError';
  }
}

export class NoVoicesAvailableError extends TTSError {
  readonly kind = 'NoVoicesAvailable' as const;

  constructor(provider: string) {
    super(`No voices available for provider '${provider}'`);
    this.name = 'NoVoicesAvailableError';
  }
}

export class UnsupportedFormatError extends TTSError {
  readonly kind = 'UnsupportedFormat' as const;

  constructor(
    provider: string,
    readonly format: string,
    supported: readonly string[]
  ) {
    super(
      `Provider '${provider}' does not support '${format}' output. Supported formats: ${supported.join(', ')}`
    );
    this.name = 'UnsupportedFormatError';
  }
}

export class ProviderNotFoundError extends TTSError {
  readonly kind = 'ProviderNotFound' as const;

  constructor(name: string, available: string[]) {
    super(
      `TTS provider '${name}' not found. Available providers: ${available.length > 0 ? available.join(', ') : 'none'}`
    );
    this.name = 'ProviderNotFoundError';
  }
}

export class EngineInitError extends TTSError {
  readonly kind = 'EngineInitFailure' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineInitError';
  }
}

export class TextTooLongError extends TTSError {
  readonly kind = 'TextTooLong' as const;

  constructor(readonly maxLength: number) {
    super(`Text too long. Maximum length is ${maxLength} characters.`);
    this.name = 'TextTooLongError';
  }
}

export function isTTSError(error: unknown): error is TTSError {
  return error instanceof TTSError;
}
