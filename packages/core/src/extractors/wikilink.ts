import type { SourceDocument, WikiLinkElement } from '@kb-graph/types';
import type { DocumentRegistry } from '../registry/document-registry.js';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { blankMatches, blankRegions, scanDocument } from './markdown-scan.js';

/** Non-greedy, never across `[`, `]` or a newline */
const WIKILINK = /\[\[([^[\]|\n]+?)(?:\|([^[\]\n]+?))?\]\]/g;

/**
 * `[[target]]` and `[[target|alias]]`, resolved against the registry
 */
export class WikiLinkExtractor implements Extractor {
  readonly name = 'wikilink' as const;

  constructor(private registry: DocumentRegistry | null = null) {}

  extract(document: SourceDocument): WikiLinkElement[] {
    const { content } = document;
    const scan = scanDocument(content);

    let text = blankRegions(content, scan.frontmatter ? [scan.frontmatter, ...scan.fences] : scan.fences);
    text = blankMatches(text, /`[^`\n]*`/g);

    const sequence = new LocalIdSequence();
    const links: WikiLinkElement[] = [];

    for (const match of text.matchAll(WIKILINK)) {
      const start = match.index ?? 0;
      const targetPath = match[1].trim();
      const alias = match[2]?.trim() || null;

      links.push({
        id: sequence.next('wikilink'),
        kind: 'wikilink',
        position: { start, end: start + match[0].length },
        content: content.slice(start, start + match[0].length),
        parentId: null,
        targetPath,
        alias,
        originalText: content.slice(start, start + match[0].length),
        resolvedDocumentUri: this.resolve(targetPath),
      });
    }

    return links;
  }

  private resolve(targetPath: string): string | null {
    if (!this.registry) {
      return null;
    }

    const resolved = this.registry.findByPath(targetPath);
    if (resolved !== null) {
      return resolved;
    }

    // [[note#heading]] points at the note
    const anchor = targetPath.indexOf('#');
    return anchor > 0 ? this.registry.findByPath(targetPath.slice(0, anchor).trim()) : null;
  }
}
