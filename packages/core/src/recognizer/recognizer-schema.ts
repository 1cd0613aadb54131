import { z } from 'zod';
import type { RecognizedEntity } from '@kb-graph/types';

export const RecognizedEntitySchema = z
  .object({
    text: z.string(),
    label: z.string().min(1),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    confidence: z.number().min(0).max(1).optional(),
  })
  .refine((entity) => entity.start <= entity.end, { message: 'start must not exceed end' });

export const DictionaryEntrySchema = z.object({
  text: z.string().min(1),
  label: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

export type DictionaryEntry = z.infer<typeof DictionaryEntrySchema>;

/**
 * Check what a recognizer returned before it reaches the processor
 */
export function parseRecognizedEntities(value: unknown): RecognizedEntity[] {
  return z.array(RecognizedEntitySchema).parse(value);
}
