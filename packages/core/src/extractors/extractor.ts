import type { ContentElement, ExtractorName, SourceDocument } from '@kb-graph/types';

/**
 * A structural extractor.
 *
 * extract() is synchronous, has no side effects and returns elements in
 * document order. Local ids are `<kind>-<ordinal>`.
 */
export interface Extractor {
  readonly name: ExtractorName;
  extract(document: SourceDocument): ContentElement[];
}

/**
 * Hands out `<kind>-<ordinal>` ids, counting per kind
 */
export class LocalIdSequence {
  private counters = new Map<string, number>();

  next(kind: string): string {
    const ordinal = this.counters.get(kind) ?? 0;
    this.counters.set(kind, ordinal + 1);
    return `${kind}-${ordinal}`;
  }
}
