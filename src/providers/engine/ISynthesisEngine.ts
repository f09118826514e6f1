/**
 * Neural synthesis engine contract
 *
 * The engine itself (model runtime, phonemizer) lives outside this
 * project; EngineTTSProvider only talks to it through these types.
 */

import type { SampleBuffer } from '../../audio/wavEncoder';

export interface EngineSynthesisRequest {
  text: string;
  voice: string;
  speed: number;
  /** Normalized language tag, e.g. 'en-us' */
  lang: string;
}

export interface EngineSynthesisResult {
  /** Float samples, nominally in [-1, 1] */
  samples: SampleBuffer;
  /** Native output rate; providers fall back to their default when absent */
  sampleRate?: number;
}

export interface ISynthesisEngine {
  getVoices(): string[] | Promise<string[]>;
  create(request: EngineSynthesisRequest): Promise<EngineSynthesisResult>;
}

export interface EngineLoadOptions {
  modelPath: string;
  voicesPath: string;
  /** Phonemizer shared library, when not on the default search path */
  libraryPath?: string;
  /** Phonemizer data directory */
  dataPath?: string;
}

export type EngineLoader = (options: EngineLoadOptions) => Promise<ISynthesisEngine>;
