import type {
  CitationElement,
  ContentElement,
  LinkElement,
  ReferenceElement,
  SourceDocument,
} from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { blankMatches, blankOut, blankRegions, scanDocument } from './markdown-scan.js';

const DEFINITION = /^[ \t]{0,3}\[([^\]\n]+)\]:[ \t]+<?([^\s>]+)>?(?:[ \t]+(?:"([^"\n]*)"|'([^'\n]*)'|\(([^)\n]*)\)))?[ \t]*$/gm;
const INLINE_LINK = /(!?)\[([^\]\n]*)\]\(<?([^)\s>]*)>?(?:\s+"([^"\n]*)")?\)/g;
const FULL_REFERENCE_LINK = /(!?)\[([^\]\n]+)\]\[([^\]\n]*)\]/g;
const CITATION = /\(([^()\n]+,\s*\d{4}[^()\n]*)\)|\[@([^\]\n]+)\]/g;
const BARE_REFERENCE_LINK = /(?<![[\]!])\[([^\]\n]+)\](?![[\](:])/g;
const SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

interface Definition {
  key: string;
  url: string;
  title: string | null;
}

type Pending =
  | Omit<LinkElement, 'id'>
  | Omit<ReferenceElement, 'id'>
  | Omit<CitationElement, 'id'>;

export function isInternalUrl(url: string): boolean {
  return !SCHEME.test(url);
}

function normalizeKey(key: string): string {
  return key.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Inline and reference-style links, link definitions and citations.
 * Definitions may appear anywhere in the document.
 */
export class LinkReferenceExtractor implements Extractor {
  readonly name = 'link-reference' as const;

  extract(document: SourceDocument): ContentElement[] {
    const { content } = document;
    const scan = scanDocument(content);

    let text = blankRegions(content, scan.frontmatter ? [scan.frontmatter, ...scan.fences] : scan.fences);
    text = blankMatches(text, /`[^`\n]*`/g);

    const pending: Pending[] = [];
    const definitions = new Map<string, Definition>();

    for (const match of text.matchAll(DEFINITION)) {
      const start = match.index ?? 0;
      const definition: Definition = {
        key: match[1].trim(),
        url: match[2],
        title: match[3] ?? match[4] ?? match[5] ?? null,
      };
      // first definition of a key wins
      if (!definitions.has(normalizeKey(definition.key))) {
        definitions.set(normalizeKey(definition.key), definition);
      }
      pending.push({
        kind: 'reference',
        position: { start, end: start + match[0].length },
        content: match[0],
        parentId: null,
        ...definition,
      });
    }
    text = blankMatches(text, DEFINITION);

    text = this.consume(text, INLINE_LINK, (match, start) => {
      if (match[1] === '!') {
        return;
      }
      pending.push(this.link(match[0], start, match[2], match[3], match[4] ?? null, null));
    });

    text = this.consume(text, FULL_REFERENCE_LINK, (match, start) => {
      const key = match[3].trim() ? match[3] : match[2];
      const definition = definitions.get(normalizeKey(key));
      if (match[1] === '!' || !definition) {
        return;
      }
      pending.push(this.link(match[0], start, match[2], definition.url, definition.title, definition.key));
    });

    text = this.consume(text, CITATION, (match, start) => {
      pending.push({
        kind: 'citation',
        position: { start, end: start + match[0].length },
        content: match[0],
        parentId: null,
        text: (match[1] ?? match[2]).trim(),
        key: match[2] !== undefined ? match[2].trim() : null,
      });
    });

    this.consume(text, BARE_REFERENCE_LINK, (match, start) => {
      const definition = definitions.get(normalizeKey(match[1]));
      if (!definition) {
        return;
      }
      pending.push(this.link(match[0], start, match[1], definition.url, definition.title, definition.key));
    });

    const sequence = new LocalIdSequence();
    return pending
      .sort((a, b) => a.position.start - b.position.start)
      .map((element): ContentElement => ({
        ...element,
        id: sequence.next(element.kind),
        content: content.slice(element.position.start, element.position.end),
      }));
  }

  /**
   * Run a pattern over the text, hand each match to the visitor and
   * return the text with the matches blanked
   */
  private consume(
    text: string,
    pattern: RegExp,
    visit: (match: RegExpMatchArray, start: number) => void
  ): string {
    let result = text;
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      visit(match, start);
      result = result.slice(0, start) + blankOut(match[0]) + result.slice(start + match[0].length);
    }
    return result;
  }

  private link(
    raw: string,
    start: number,
    text: string,
    url: string,
    title: string | null,
    referenceKey: string | null
  ): Omit<LinkElement, 'id'> {
    return {
      kind: 'link',
      position: { start, end: start + raw.length },
      content: raw,
      parentId: null,
      text: text.trim(),
      url,
      title,
      internal: isInternalUrl(url),
      referenceKey,
    };
  }
}
