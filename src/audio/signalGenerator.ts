import { createHash } from 'crypto';
import { SeededRandom } from './random';

const MIN_DURATION_S = 0.5;
const MAX_DURATION_S = 5.0;
const BASE_FREQUENCY_HZ = 220;
const FREQUENCY_SPAN_HZ = 220n;
const NOISE_DEPTH = 0.02;

export interface SineWaveOptions {
  frequency: number;
  duration: number;
  sampleRate: number;
  volume?: number;
  seed?: number;
}

/**
 * Seconds of audio for a text: one second per ten characters, clamped to
 * [0.5, 5], then divided by the speaking rate (floored at 0.5)
 */
export function mockDuration(text: string, speed: number): number {
  const base = Math.max(MIN_DURATION_S, Math.min(MAX_DURATION_S, text.length / 10));
  return base / Math.max(0.5, speed);
}

/**
 * Stable base frequency in [220, 440) Hz from the MD5 of the UTF-8 text
 */
export function textFrequency(text: string): number {
  const digest = createHash('md5').update(text, 'utf8').digest('hex');
  const hash = BigInt(`0x${digest}`);
  return BASE_FREQUENCY_HZ + Number(hash % FREQUENCY_SPAN_HZ);
}

/**
 * Pitch in [-1, 1] maps to -12..+12 semitones
 */
export function pitchShift(baseFrequency: number, pitch: number): number {
  return baseFrequency * 2 ** ((pitch * 12) / 12);
}

/**
 * Sine wave with multiplicative seeded noise:
 * volume * sin(2πft) * (1 + 0.02 * n), one standard normal n per sample
 */
export function generateSineWave(options: SineWaveOptions): Float64Array {
  const { frequency, duration, sampleRate, volume = 0.2, seed = 0 } = options;
  const rng = new SeededRandom(seed);
  const sampleCount = Math.trunc(sampleRate * duration);
  const step = sampleCount > 0 ? duration / sampleCount : 0;
  const signal = new Float64Array(sampleCount);

  for (let i = 0; i < sampleCount; i += 1) {
    const t = i * step;
    const noise = NOISE_DEPTH * rng.standardNormal();
    signal[i] = volume * Math.sin(2 * Math.PI * frequency * t) * (1 + noise);
  }

  return signal;
}
