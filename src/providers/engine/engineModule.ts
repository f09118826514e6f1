/**
 * Engine module loader
 *
 * The neural engine is plugged in as a module (package name or file path)
 * exporting `createEngine(options)`. TTS_ENGINE_MODULE names it.
 */

import * as path from 'path';
import { EngineInitError } from '../errors';
import type { EngineLoadOptions, EngineLoader, ISynthesisEngine } from './ISynthesisEngine';

interface EngineModule {
  createEngine(options: EngineLoadOptions): ISynthesisEngine | Promise<ISynthesisEngine>;
}

function hasCreateEngine(value: unknown): value is EngineModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'createEngine' in value &&
    typeof value.createEngine === 'function'
  );
}

export function isSynthesisEngine(value: unknown): value is ISynthesisEngine {
  return (
    typeof value === 'object' &&
    value !== null &&
    'getVoices' in value &&
    typeof value.getVoices === 'function' &&
    'create' in value &&
    typeof value.create === 'function'
  );
}

function resolveModuleSpecifier(specifier: string): string {
  return specifier.startsWith('.') ? path.resolve(process.cwd(), specifier) : specifier;
}

/**
 * Build an EngineLoader backed by the given module
 */
export function loadEngineModule(specifier: string | undefined): EngineLoader {
  return async (options: EngineLoadOptions): Promise<ISynthesisEngine> => {
    if (!specifier) {
      throw new EngineInitError('No synthesis engine configured. Set TTS_ENGINE_MODULE to an engine module.');
    }

    let loaded: unknown;
    try {
      loaded = await import(resolveModuleSpecifier(specifier));
    } catch (error) {
      throw new EngineInitError(`Failed to load engine module '${specifier}'`, { cause: error });
    }

    // CommonJS engines compiled from ESM export under `default`
    let candidate: unknown = loaded;
    if (!hasCreateEngine(candidate) && typeof loaded === 'object' && loaded !== null && 'default' in loaded) {
      candidate = loaded.default;
    }

    if (!hasCreateEngine(candidate)) {
      throw new EngineInitError(`Engine module '${specifier}' does not export createEngine()`);
    }

    const engine: unknown = await candidate.createEngine(options);
    if (!isSynthesisEngine(engine)) {
      throw new EngineInitError(`Engine module '${specifier}' returned an object without getVoices()/create()`);
    }
    return engine;
  };
}
