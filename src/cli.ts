#!/usr/bin/env node
/**
 * Command-line interface for the TTS gateway
 *
 * Synthesizes text (inline or from a file) with any registered provider
 * and writes the audio to disk.
 */

import { parseArgs } from 'util';
import * as path from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { ZodError } from 'zod';
import { env } from './config/env';
import { AudioFormatSchema, SynthesisRequestSchema, type SynthesisRequestInput } from './models/SynthesisRequest';
import { AUDIO_FORMATS } from './providers/ai/ITTSProvider';
import { createProviderRegistry } from './providers/ProviderFactory';
import type { TTSProviderRegistry } from './providers/ProviderRegistry';
import { SynthesisService } from './services/SynthesisService';

export interface CliOptions {
  text?: string;
  file?: string;
  output: string;
  provider: string;
  voice?: string;
  lang: string;
  speed: number;
  pitch: number;
  format: string;
  seed?: number;
  verbose: boolean;
  help: boolean;
}

export interface CliDependencies {
  registry: TTSProviderRegistry;
  maxTextLength: number;
  defaultVoice: string;
  defaultProvider: string;
  defaultLanguage: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const USAGE = `Usage: tts-gateway (--text <text> | --file <path>) [options]

Options:
  --text <text>        Text to convert to speech
  --file <path>        Path to a UTF-8 text file to convert to speech
  -o, --output <path>  Output file path (default: output.wav)
  --provider <name>    TTS provider to use
  --voice <voice>      Voice to use (provider-specific)
  --lang <code>        Language code
  --speed <n>          Speaking rate (0.5 to 2.0, default: 1.0)
  --pitch <n>          Pitch adjustment (-1.0 to 1.0, default: 0.0)
  --format <fmt>       Output audio format (${AUDIO_FORMATS.join(', ')}; default: wav)
  --seed <n>           Random seed for deterministic output
  -v, --verbose        Enable verbose output
  -h, --help           Show this help`;

function toNumber(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number, got '${value}'`);
  }
  return parsed;
}

export function parseCliArgs(
  argv: string[],
  defaults: Pick<CliDependencies, 'defaultProvider' | 'defaultLanguage'>
): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      text: { type: 'string' },
      file: { type: 'string' },
      output: { type: 'string', short: 'o' },
      provider: { type: 'string' },
      voice: { type: 'string' },
      lang: { type: 'string' },
      speed: { type: 'string' },
      pitch: { type: 'string' },
      format: { type: 'string' },
      seed: { type: 'string' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' }
    }
  });

  const output = values.output ?? 'output.wav';
  const format = values.format ?? 'wav';
  const verbose = values.verbose ?? false;

  if (values.help) {
    return {
      output,
      provider: defaults.defaultProvider,
      lang: defaults.defaultLanguage,
      speed: 1.0,
      pitch: 0.0,
      format,
      verbose,
      help: true
    };
  }

  if (values.text !== undefined && values.file !== undefined) {
    throw new Error('--text and --file are mutually exclusive');
  }
  if (values.text === undefined && values.file === undefined) {
    throw new Error('one of --text or --file is required');
  }

  return {
    text: values.text,
    file: values.file,
    output,
    provider: values.provider ?? defaults.defaultProvider,
    voice: values.voice,
    lang: values.lang ?? defaults.defaultLanguage,
    speed: toNumber('speed', values.speed, 1.0),
    pitch: toNumber('pitch', values.pitch, 0.0),
    format,
    seed: values.seed === undefined ? undefined : toNumber('seed', values.seed, 0),
    verbose,
    help: false
  };
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv, deps);
  } catch (error) {
    deps.stderr(`Error: ${describeError(error)}`);
    deps.stderr(USAGE);
    return 1;
  }

  if (options.help) {
    deps.stdout(USAGE);
    return 0;
  }

  try {
    const text = options.file !== undefined ? (await readFile(options.file, 'utf-8')).trim() : (options.text ?? '').trim();
    if (!text) {
      deps.stderr('Error: No text to synthesize');
      return 1;
    }

    const format = AudioFormatSchema.safeParse(options.format);
    if (!format.success) {
      throw new Error(`--format must be one of ${AUDIO_FORMATS.join(', ')}, got '${options.format}'`);
    }

    const input: SynthesisRequestInput = {
      text,
      voice: options.voice,
      lang: options.lang,
      speed: options.speed,
      pitch: options.pitch,
      format: format.data,
      seed: options.seed
    };
    const request = SynthesisRequestSchema.parse(input);

    const service = new SynthesisService(deps.registry, {
      maxTextLength: deps.maxTextLength,
      defaultVoice: deps.defaultVoice
    });

    if (options.verbose) {
      deps.stdout(`Using provider: ${deps.registry.get(options.provider).name}`);
      deps.stdout(text.length > 50 ? `Synthesizing: ${text.slice(0, 50)}...` : `Synthesizing: ${text}`);
    }

    const result = await service.synthesize(request, options.provider);

    await mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
    await writeFile(options.output, result.audio);

    deps.stdout(options.verbose ? `Wrote ${result.audio.length} bytes to ${options.output}` : options.output);
    return 0;
  } catch (error) {
    deps.stderr(`Error: ${describeError(error)}`);
    if (options.verbose && error instanceof Error && error.stack) {
      deps.stderr(error.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    registry: createProviderRegistry(env),
    maxTextLength: env.MAX_TEXT_LENGTH,
    defaultVoice: env.DEFAULT_VOICE,
    defaultProvider: env.DEFAULT_TTS_PROVIDER,
    defaultLanguage: env.DEFAULT_LANGUAGE,
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`)
  }).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Error: ${describeError(error)}\n`);
      process.exitCode = 1;
    }
  );
}
