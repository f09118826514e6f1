/**
 * Text-to-Speech Provider Interface
 *
 * Abstraction over synthesis backends (deterministic mock, engine-backed, ...)
 */

export const AUDIO_FORMATS = ['wav', 'mp3'] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export interface SynthesizeOptions {
  /** Provider-specific voice identifier */
  voice?: string;
  /** Language tag, e.g. 'en', 'en-us', 'pt_BR' (default 'en') */
  language?: string;
  /** Speaking rate, 0.5 to 2.0 (default 1.0) */
  speed?: number;
  /** Pitch adjustment, -1.0 to 1.0 (default 0.0) */
  pitch?: number;
  /** Output encoding (default 'wav') */
  format?: AudioFormat;
  /** Random seed; only honoured by seed-controllable providers */
  seed?: number;
}

export interface ITTSProvider {
  /**
   * Provider name for logging/debugging and response headers
   */
  readonly name: string;

  /**
   * Encodings this provider can produce
   */
  readonly supportedFormats: readonly AudioFormat[];

  /**
   * Nominal output sample rate in Hz
   */
  readonly sampleRate: number;

  /**
   * Synthesize text to audio
   * @throws UnsupportedFormatError when options.format is not in supportedFormats
   * @returns Encoded audio bytes
   */
  synthesize(text: string, options?: SynthesizeOptions): Promise<Buffer>;
}
