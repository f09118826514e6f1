import { z } from 'zod';
import { AUDIO_FORMATS } from '../providers/ai/ITTSProvider';

export const AudioFormatSchema = z.enum(AUDIO_FORMATS);

export const SynthesisRequestSchema = z
  .object({
    text: z
      .string()
      .trim()
      .min(1, 'Text cannot be empty')
      .max(5000, 'Text cannot exceed 5000 characters'),
    voice: z.string().optional(),
    lang: z.string().min(2).max(5).default('en'),
    speed: z.number().min(0.5).max(2.0).default(1.0),
    pitch: z.number().min(-1.0).max(1.0).default(0.0),
    format: AudioFormatSchema.optional(),
    fmt: AudioFormatSchema.optional(), // legacy name for `format`
    seed: z.number().int().nonnegative().optional()
  })
  .transform(({ fmt, format, ...rest }) => ({
    ...rest,
    format: format ?? fmt ?? 'wav'
  }));

export type SynthesisRequestInput = z.input<typeof SynthesisRequestSchema>;
export type SynthesisRequest = z.output<typeof SynthesisRequestSchema>;
