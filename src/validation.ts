import { z } from 'zod';
import { HttpError } from './errors.js';
import { SPEECH_MODES } from './types.js';
import type { AppConfig, SpeechMode, SpeechRequest } from './types.js';

// Job ids and audio ids are randomUUID() output; anything else never reaches the cache.
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export function isValidJobId(value: string): boolean {
  return UUID_PATTERN.test(value);
}

export function isSpeechMode(value: string): value is SpeechMode {
  return (SPEECH_MODES as readonly string[]).includes(value);
}

export function createSpeechRequestSchemas(limits: AppConfig['limits']) {
  const text = z
    .string({ required_error: 'text is required' })
    .min(1, 'text is required')
    .max(limits.maxTextLength, `text exceeds maximum length of ${limits.maxTextLength} characters`);
  const instruct = z
    .string()
    .max(limits.maxInstructLength, `Instruction exceeds maximum length of ${limits.maxInstructLength} characters`);
  const language = z.string().min(1).default('English');
  const fast = z.boolean().default(false);

  const clone = z
    .object({
      text,
      language,
      refAudioIds: z
        .array(z.string().regex(UUID_PATTERN, 'Invalid audio ID'), {
          required_error: 'At least one reference audio is required',
        })
        .min(1, 'At least one reference audio is required'),
      refTexts: z.array(z.string().nullable()).optional(),
      fast,
    })
    .transform((body) => ({
      mode: 'clone' as const,
      text: body.text,
      language: body.language,
      refAudioIds: body.refAudioIds,
      // one transcript slot per reference sample
      refTexts: body.refAudioIds.map((_, i) => body.refTexts?.[i] ?? null),
      fast: body.fast,
    }));

  const custom = z
    .object({
      text,
      language,
      speaker: z.string({ required_error: 'Speaker is required' }).min(1, 'Speaker is required'),
      instruct: instruct.optional(),
      fast,
    })
    .transform((body) => ({ mode: 'custom' as const, ...body }));

  const design = z
    .object({
      text,
      language,
      instruct: z
        .string({ required_error: 'Voice design instruction is required' })
        .min(1, 'Voice design instruction is required')
        .pipe(instruct),
    })
    .transform((body) => ({ mode: 'design' as const, ...body }));

  return { clone, custom, design };
}

export type SpeechRequestSchemas = ReturnType<typeof createSpeechRequestSchemas>;

export function parseSpeechRequest(schemas: SpeechRequestSchemas, mode: SpeechMode, body: unknown): SpeechRequest {
  const result = schemas[mode].safeParse(body ?? {});
  if (!result.success) {
    throw new HttpError(400, result.error.issues[0]?.message ?? 'invalid request');
  }
  return result.data;
}

export const historyItemSchema = z.object({
  mode: z.enum(SPEECH_MODES),
  text: z.string().min(1).max(20_000),
  language: z.string().optional(),
  params: z.record(z.unknown()).optional(),
  audioId: z.string().regex(UUID_PATTERN, 'Invalid audio ID').nullable().optional(),
});
