import type { ExtractorName } from '@kb-graph/types';
import { EXTRACTOR_NAMES } from '@kb-graph/types';
import type { DocumentRegistry } from '../registry/document-registry.js';
import type { Extractor } from './extractor.js';
import { FrontmatterExtractor } from './frontmatter.js';
import { HeadingSectionExtractor } from './heading-section.js';
import { ListTableExtractor } from './list-table.js';
import { CodeQuoteExtractor } from './code-quote.js';
import { TodoExtractor } from './todo.js';
import { TagExtractor } from './tag.js';
import { LinkReferenceExtractor } from './link-reference.js';
import { WikiLinkExtractor } from './wikilink.js';

export type { Extractor } from './extractor.js';
export { LocalIdSequence } from './extractor.js';
export { FrontmatterExtractor, readFrontmatter, frontmatterTagNames, parseFrontmatterData, frontmatterMetadata } from './frontmatter.js';
export { HeadingSectionExtractor } from './heading-section.js';
export { ListTableExtractor } from './list-table.js';
export { CodeQuoteExtractor } from './code-quote.js';
export { TodoExtractor } from './todo.js';
export { TagExtractor } from './tag.js';
export { LinkReferenceExtractor, isInternalUrl } from './link-reference.js';
export { WikiLinkExtractor } from './wikilink.js';

export interface CreateExtractorsOptions {
  /** Sealed registry used by the wikilink extractor */
  registry?: DocumentRegistry | null;
}

function createExtractor(name: ExtractorName, registry: DocumentRegistry | null): Extractor {
  switch (name) {
    case 'frontmatter':
      return new FrontmatterExtractor();
    case 'heading-section':
      return new HeadingSectionExtractor();
    case 'list-table':
      return new ListTableExtractor();
    case 'code-quote':
      return new CodeQuoteExtractor();
    case 'todo':
      return new TodoExtractor();
    case 'tag':
      return new TagExtractor();
    case 'link-reference':
      return new LinkReferenceExtractor();
    case 'wikilink':
      return new WikiLinkExtractor(registry);
    default: {
      const unknownName: never = name;
      throw new Error(`Unknown extractor: ${String(unknownName)}`);
    }
  }
}

/**
 * Build extractors in registration order (default: every extractor)
 */
export function createExtractors(
  names: readonly ExtractorName[] = EXTRACTOR_NAMES,
  options: CreateExtractorsOptions = {}
): Extractor[] {
  return names.map((name) => createExtractor(name, options.registry ?? null));
}
