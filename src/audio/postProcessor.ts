import type { SampleBuffer } from './wavEncoder';

export interface PostProcessOptions {
  /** Samples with |x| below this are zeroed; 0 disables the gate */
  noiseGateThreshold: number;
  enableNormalization: boolean;
  /** Peak amplitude after normalization, in [0, 1] */
  normalizeTarget: number;
}

/**
 * Clamp raw configuration values into their valid ranges
 */
export function resolvePostProcessOptions(options: PostProcessOptions): PostProcessOptions {
  return {
    noiseGateThreshold: Math.max(0, options.noiseGateThreshold),
    enableNormalization: options.enableNormalization,
    normalizeTarget: Math.max(0, Math.min(1, options.normalizeTarget))
  };
}

export function peakAmplitude(samples: SampleBuffer): number {
  let peak = 0;
  for (let i = 0; i < samples.length; i += 1) {
    const magnitude = Math.abs(samples[i]);
    if (magnitude > peak) {
      peak = magnitude;
    }
  }
  return peak;
}

/**
 * Noise gate, then peak normalization. Returns a new buffer.
 */
export function postProcess(samples: SampleBuffer, options: PostProcessOptions): Float64Array {
  const processed = Float64Array.from(samples);
  const { noiseGateThreshold, enableNormalization, normalizeTarget } = options;

  if (noiseGateThreshold > 0) {
    for (let i = 0; i < processed.length; i += 1) {
      if (Math.abs(processed[i]) < noiseGateThreshold) {
        processed[i] = 0;
      }
    }
  }

  if (enableNormalization) {
    const peak = peakAmplitude(processed);
    if (peak > 0) {
      const gain = normalizeTarget / peak;
      for (let i = 0; i < processed.length; i += 1) {
        processed[i] *= gain;
      }
    }
  }

  return processed;
}
