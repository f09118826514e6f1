/**
 * Mock TTS Provider
 *
 * Deterministic sine-wave "speech" for tests and as the fallback when no
 * real engine is available. Same text and seed give byte-identical WAV.
 */

import type { AudioFormat, ITTSProvider, SynthesizeOptions } from '../ITTSProvider';
import { UnsupportedFormatError } from '../../errors';
import { generateSineWave, mockDuration, pitchShift, textFrequency } from '../../../audio/signalGenerator';
import { encodeWav } from '../../../audio/wavEncoder';

export const DEFAULT_MOCK_SAMPLE_RATE = 16000;

export class MockTTSProvider implements ITTSProvider {
  readonly name = 'mock';
  readonly supportedFormats: readonly AudioFormat[] = ['wav'];

  constructor(readonly sampleRate: number = DEFAULT_MOCK_SAMPLE_RATE) {}

  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<Buffer> {
    const format = options.format ?? 'wav';
    if (!this.supportedFormats.includes(format)) {
      throw new UnsupportedFormatError(this.name, format, this.supportedFormats);
    }

    // voice and language do not affect the mock signal
    const duration = mockDuration(text, options.speed ?? 1.0);
    const frequency = pitchShift(textFrequency(text), options.pitch ?? 0.0);

    const audio = generateSineWave({
      frequency,
      duration,
      sampleRate: this.sampleRate,
      volume: 0.2,
      seed: options.seed ?? 0
    });

    return encodeWav(audio, this.sampleRate);
  }
}
