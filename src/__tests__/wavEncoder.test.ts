import { decodeWav, encodeWav, floatToPcm16, pcmToWav } from '../audio/wavEncoder';

describe('wavEncoder', () => {
  describe('floatToPcm16', () => {
    it('should clip, scale by 32767 and truncate toward zero', () => {
      const pcm = floatToPcm16([0, 0.5, -0.5, 1.5, -2]);

      expect(pcm.length).toBe(10);
      expect([0, 1, 2, 3, 4].map((i) => pcm.readInt16LE(i * 2))).toEqual([0, 16383, -16383, 32767, -32767]);
    });
  });

  describe('encodeWav', () => {
    it('should write a 44-byte mono 16-bit PCM header', () => {
      const wav = encodeWav([0, 0.5, -0.5, 1.5, -2], 8000);

      expect(wav.length).toBe(54);
      expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
      expect(wav.readUInt32LE(4)).toBe(46);
      expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
      expect(wav.toString('ascii', 12, 16)).toBe('fmt ');
      expect(wav.readUInt32LE(16)).toBe(16);
      expect(wav.readUInt16LE(20)).toBe(1);
      expect(wav.readUInt16LE(22)).toBe(1);
      expect(wav.readUInt32LE(24)).toBe(8000);
      expect(wav.readUInt32LE(28)).toBe(16000);
      expect(wav.readUInt16LE(32)).toBe(2);
      expect(wav.readUInt16LE(34)).toBe(16);
      expect(wav.toString('ascii', 36, 40)).toBe('data');
      expect(wav.readUInt32LE(40)).toBe(10);
    });

    it('should produce a header-only file for empty input', () => {
      const wav = encodeWav([], 16000);

      expect(wav.length).toBe(44);
      expect(wav.readUInt32LE(40)).toBe(0);
    });
  });

  describe('decodeWav', () => {
    it('should read back what encodeWav wrote', () => {
      const decoded = decodeWav(encodeWav([0, 0.5, -0.5, 1.5, -2], 8000));

      expect(decoded.sampleRate).toBe(8000);
      expect(decoded.numChannels).toBe(1);
      expect(decoded.bitsPerSample).toBe(16);
      expect(Array.from(decoded.samples)).toEqual([0, 16383, -16383, 32767, -32767]);
    });

    it('should skip chunks between fmt and data', () => {
      const wav = encodeWav([0.25], 22050);
      const list = Buffer.alloc(8 + 3 + 1);
      list.write('LIST', 0);
      list.writeUInt32LE(3, 4);
      const withList = Buffer.concat([wav.subarray(0, 36), list, wav.subarray(36)]);

      const decoded = decodeWav(withList);

      expect(decoded.sampleRate).toBe(22050);
      expect(Array.from(decoded.samples)).toEqual([8191]);
    });

    it('should reject buffers without a RIFF header', () => {
      expect(() => decodeWav(Buffer.from('not a wav file'))).toThrow('Invalid WAV file: missing RIFF header');
    });

    it('should reject RIFF files that are not WAVE', () => {
      const wav = encodeWav([0], 8000);
      wav.write('AVI ', 8);

      expect(() => decodeWav(wav)).toThrow('Invalid WAV file: missing WAVE format');
    });

    it('should reject files without a data chunk', () => {
      const headerOnly = pcmToWav(Buffer.alloc(0), 8000).subarray(0, 36);

      expect(() => decodeWav(headerOnly)).toThrow('Invalid WAV file: missing data chunk');
    });
  });
});
