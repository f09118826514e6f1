import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import * as path from 'path';
import { parseCliArgs, runCli, USAGE, type CliDependencies } from '../cli';
import { TTSProviderRegistry } from '../providers/ProviderRegistry';
import { MockTTSProvider } from '../providers/ai/tts/MockTTSProvider';

describe('cli', () => {
  let workDir: string;
  let stdout: string[];
  let stderr: string[];
  let deps: CliDependencies;

  beforeEach(() => {
    workDir = mkdtempSync(path.join(tmpdir(), 'tts-cli-'));
    stdout = [];
    stderr = [];
    deps = {
      registry: new TTSProviderRegistry({ defaultProvider: 'mock' }),
      maxTextLength: 5000,
      defaultVoice: 'af_alloy',
      defaultProvider: 'mock',
      defaultLanguage: 'en-us',
      stdout: (line) => stdout.push(line),
      stderr: (line) => stderr.push(line)
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('parseCliArgs', () => {
    it('should fill in defaults', () => {
      expect(parseCliArgs(['--text', 'Hello'], deps)).toEqual({
        text: 'Hello',
        file: undefined,
        output: 'output.wav',
        provider: 'mock',
        voice: undefined,
        lang: 'en-us',
        speed: 1,
        pitch: 0,
        format: 'wav',
        seed: undefined,
        verbose: false,
        help: false
      });
    });

    it('should read numeric options', () => {
      const options = parseCliArgs(['--text', 'Hi', '--speed', '1.5', '--pitch=-0.25', '--seed', '7', '-o', 'a.wav'], deps);

      expect(options).toMatchObject({ speed: 1.5, pitch: -0.25, seed: 7, output: 'a.wav' });
    });

    it('should reject non-numeric values', () => {
      expect(() => parseCliArgs(['--text', 'Hi', '--speed', 'fast'], deps)).toThrow("--speed must be a number, got 'fast'");
    });

    it('should require exactly one text source', () => {
      expect(() => parseCliArgs([], deps)).toThrow('one of --text or --file is required');
      expect(() => parseCliArgs(['--text', 'Hi', '--file', 'in.txt'], deps)).toThrow(
        '--text and --file are mutually exclusive'
      );
    });
  });

  describe('runCli', () => {
    it('should print usage for --help', async () => {
      await expect(runCli(['--help'], deps)).resolves.toBe(0);

      expect(stdout).toEqual([USAGE]);
    });

    it('should print the error and usage for bad arguments', async () => {
      await expect(runCli([], deps)).resolves.toBe(1);

      expect(stderr).toEqual(['Error: one of --text or --file is required', USAGE]);
    });

    it('should reject unknown options', async () => {
      await expect(runCli(['--text', 'Hi', '--bogus'], deps)).resolves.toBe(1);

      expect(stderr).toHaveLength(2);
      expect(stderr[0].startsWith('Error: ')).toBe(true);
      expect(stderr[1]).toBe(USAGE);
    });

    it('should write deterministic audio and print the output path', async () => {
      const output = path.join(workDir, 'nested', 'hello.wav');

      await expect(runCli(['--text', 'Hello', '--seed', '42', '-o', output], deps)).resolves.toBe(0);

      const expected = await new MockTTSProvider().synthesize('Hello', { seed: 42 });
      expect(readFileSync(output).equals(expected)).toBe(true);
      expect(stdout).toEqual([output]);
      expect(stderr).toEqual([]);
    });

    it('should read and trim text from a file', async () => {
      const input = path.join(workDir, 'input.txt');
      const output = path.join(workDir, 'from-file.wav');
      writeFileSync(input, '  Hi there \n');

      await expect(runCli(['--file', input, '-o', output], deps)).resolves.toBe(0);

      expect(readFileSync(output).equals(await new MockTTSProvider().synthesize('Hi there'))).toBe(true);
    });

    it('should refuse a blank input file', async () => {
      const input = path.join(workDir, 'blank.txt');
      writeFileSync(input, ' \n\t');

      await expect(runCli(['--file', input, '-o', path.join(workDir, 'x.wav')], deps)).resolves.toBe(1);

      expect(stderr).toEqual(['Error: No text to synthesize']);
    });

    it('should report progress in verbose mode', async () => {
      const output = path.join(workDir, 'verbose.wav');

      await expect(runCli(['--text', 'Hello', '-o', output, '-v'], deps)).resolves.toBe(0);

      expect(stdout).toEqual(['Using provider: mock', 'Synthesizing: Hello', `Wrote 16044 bytes to ${output}`]);
    });

    it('should truncate long text in the verbose preview', async () => {
      const text = 'a'.repeat(60);

      await runCli(['--text', text, '-o', path.join(workDir, 'long.wav'), '--verbose'], deps);

      expect(stdout[1]).toBe(`Synthesizing: ${'a'.repeat(50)}...`);
    });

    it('should reject an unknown format', async () => {
      await expect(runCli(['--text', 'Hi', '--format', 'ogg', '-o', path.join(workDir, 'x.ogg')], deps)).resolves.toBe(1);

      expect(stderr).toEqual(["Error: --format must be one of wav, mp3, got 'ogg'"]);
    });

    it('should surface provider format errors', async () => {
      await expect(runCli(['--text', 'Hi', '--format', 'mp3', '-o', path.join(workDir, 'x.mp3')], deps)).resolves.toBe(1);

      expect(stderr).toEqual(["Error: Provider 'mock' does not support 'mp3' output. Supported formats: wav"]);
    });

    it('should surface validation errors', async () => {
      await expect(runCli(['--text', 'Hi', '--speed', '3', '-o', path.join(workDir, 'x.wav')], deps)).resolves.toBe(1);

      expect(stderr).toEqual(['Error: speed: Number must be less than or equal to 2']);
    });

    it('should surface unknown providers', async () => {
      await expect(
        runCli(['--text', 'Hi', '--provider', 'nope', '-o', path.join(workDir, 'x.wav')], deps)
      ).resolves.toBe(1);

      expect(stderr).toEqual(["Error: TTS provider 'nope' not found. Available providers: mock"]);
    });
  });
});
