import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { EntityRecognizer, RecognizedEntity } from '@kb-graph/types';
import { DictionaryEntrySchema, type DictionaryEntry } from './recognizer-schema.js';

const WORD_CHAR = /[\p{L}\p{N}_]/u;

function isWordChar(char: string | undefined): boolean {
  return char !== undefined && WORD_CHAR.test(char);
}

/**
 * Exact, case-sensitive matching of known names.
 * The longest entry wins where several start at the same offset.
 */
export class DictionaryRecognizer implements EntityRecognizer {
  private entries: DictionaryEntry[];

  constructor(entries: DictionaryEntry[]) {
    this.entries = [...entries].sort((a, b) => b.text.length - a.text.length);
  }

  /**
   * Load `[{ "text": "...", "label": "PERSON" }, ...]` from a JSON file
   */
  static async fromFile(filePath: string): Promise<DictionaryRecognizer> {
    const content = await readFile(filePath, 'utf-8');
    const entries = z.array(DictionaryEntrySchema).parse(JSON.parse(content));
    return new DictionaryRecognizer(entries);
  }

  async recognize(text: string): Promise<RecognizedEntity[]> {
    const found: RecognizedEntity[] = [];
    let position = 0;

    while (position < text.length) {
      const entry = isWordChar(text[position - 1]) ? undefined : this.matchAt(text, position);

      if (entry) {
        found.push({
          text: entry.text,
          label: entry.label,
          start: position,
          end: position + entry.text.length,
          ...(entry.confidence !== undefined ? { confidence: entry.confidence } : {}),
        });
        position += entry.text.length;
      } else {
        position += 1;
      }
    }

    return found;
  }

  private matchAt(text: string, position: number): DictionaryEntry | undefined {
    return this.entries.find(
      (entry) => text.startsWith(entry.text, position) && !isWordChar(text[position + entry.text.length])
    );
  }
}

/**
 * Recognizer that finds nothing
 */
export class NullRecognizer implements EntityRecognizer {
  async recognize(_text: string): Promise<RecognizedEntity[]> {
    return [];
  }
}
