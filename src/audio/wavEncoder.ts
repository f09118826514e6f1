/**
 * WAV Codec
 *
 * Float samples in [-1, 1] → mono 16-bit little-endian PCM inside a
 * RIFF/WAVE container, plus the inverse for reading such files back.
 */

const NUM_CHANNELS = 1; // Mono
const BITS_PER_SAMPLE = 16;
const HEADER_SIZE = 44;
const PCM_SCALE = 32767;

export type SampleBuffer = ArrayLike<number>;

export interface DecodedWav {
  sampleRate: number;
  numChannels: number;
  bitsPerSample: number;
  samples: Int16Array;
}

/**
 * Clip to [-1, 1], scale by 32767 and truncate toward zero
 */
export function floatToPcm16(samples: SampleBuffer): Buffer {
  const pcm = Buffer.alloc(samples.length * 2);
  for (let i = 0; i < samples.length; i += 1) {
    const clipped = Math.max(-1, Math.min(1, samples[i]));
    pcm.writeInt16LE(Math.trunc(clipped * PCM_SCALE), i * 2);
  }
  return pcm;
}

/**
 * Wrap raw 16-bit signed PCM data (little-endian) in a WAV header
 */
export function pcmToWav(pcmData: Buffer, sampleRate: number): Buffer {
  const byteRate = (sampleRate * NUM_CHANNELS * BITS_PER_SAMPLE) / 8;
  const blockAlign = (NUM_CHANNELS * BITS_PER_SAMPLE) / 8;

  const wavBuffer = Buffer.alloc(HEADER_SIZE + pcmData.length);

  // RIFF header
  wavBuffer.write('RIFF', 0);
  wavBuffer.writeUInt32LE(36 + pcmData.length, 4); // File size - 8
  wavBuffer.write('WAVE', 8);

  // fmt subchunk
  wavBuffer.write('fmt ', 12);
  wavBuffer.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wavBuffer.writeUInt16LE(1, 20); // AudioFormat (1 = PCM)
  wavBuffer.writeUInt16LE(NUM_CHANNELS, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(BITS_PER_SAMPLE, 34);

  // data subchunk
  wavBuffer.write('data', 36);
  wavBuffer.writeUInt32LE(pcmData.length, 40); // Subchunk2Size

  pcmData.copy(wavBuffer, HEADER_SIZE);

  return wavBuffer;
}

export function encodeWav(samples: SampleBuffer, sampleRate: number): Buffer {
  return pcmToWav(floatToPcm16(samples), sampleRate);
}

/**
 * Parse a PCM WAV buffer
 * Walks the chunk list so extra chunks (LIST, fact) are skipped
 */
export function decodeWav(wavData: Buffer): DecodedWav {
  if (wavData.length < 12 || wavData.toString('ascii', 0, 4) !== 'RIFF') {
    throw new Error('Invalid WAV file: missing RIFF header');
  }

  if (wavData.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('Invalid WAV file: missing WAVE format');
  }

  let offset = 12;
  let format: Omit<DecodedWav, 'samples'> | undefined;

  while (offset + 8 <= wavData.length) {
    const chunkId = wavData.toString('ascii', offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);

    if (chunkId === 'fmt ') {
      format = {
        numChannels: wavData.readUInt16LE(offset + 10),
        sampleRate: wavData.readUInt32LE(offset + 12),
        bitsPerSample: wavData.readUInt16LE(offset + 22)
      };
    } else if (chunkId === 'data') {
      if (!format) {
        throw new Error('Invalid WAV file: data chunk before fmt chunk');
      }
      const end = Math.min(wavData.length, offset + 8 + chunkSize);
      const frameCount = Math.floor((end - offset - 8) / 2);
      const samples = new Int16Array(frameCount);
      for (let i = 0; i < frameCount; i += 1) {
        samples[i] = wavData.readInt16LE(offset + 8 + i * 2);
      }
      return { ...format, samples };
    }

    // Chunks are word-aligned
    offset += 8 + chunkSize + (chunkSize % 2);
  }

  throw new Error(format ? 'Invalid WAV file: missing data chunk' : 'Invalid WAV file: missing fmt chunk');
}
