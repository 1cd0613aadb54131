import type { Position, SourceDocument, TagElement, TagSource } from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { blankMatches, blankRegions, scanDocument } from './markdown-scan.js';
import { frontmatterTagNames, parseFrontmatterData } from './frontmatter.js';

const HASHTAG = /(^|\s)#([A-Za-z0-9_]+)(?![\p{L}\p{N}_])/gu;
const CATEGORY_TAG = /@([a-zA-Z0-9_-]+)\/([a-zA-Z0-9_-]+)/g;
/** A document that is nothing but `# word` */
const LONE_HEADING_TAG = /^#[ \t]+([A-Za-z0-9_]+)$/;

/** Spans where `#word` is never a tag */
const MASKED_SPANS = [
  /`[^`\n]*`/g,
  /!\[[^\]\n]*\]\([^)\n]*\)/g,
  /\[[^\]\n]*\]\([^)\n]*\)/g,
  /^[ \t]{0,3}\[[^\]\n]+\]:.*$/gm,
  /<[^>\n]+>/g,
];

interface FoundTag {
  position: Position;
  name: string;
  category: string | null;
  source: TagSource;
}

/**
 * Hashtags, `@category/tag` tokens and front-matter `tags`/`categories`
 */
export class TagExtractor implements Extractor {
  readonly name = 'tag' as const;

  extract(document: SourceDocument): TagElement[] {
    const { content } = document;
    const scan = scanDocument(content);

    let masked = blankRegions(content, scan.frontmatter ? [scan.frontmatter, ...scan.fences] : scan.fences);
    for (const pattern of MASKED_SPANS) {
      masked = blankMatches(masked, pattern);
    }

    const found: FoundTag[] = [];

    for (const match of masked.matchAll(HASHTAG)) {
      const start = (match.index ?? 0) + match[1].length;
      found.push({
        position: { start, end: start + 1 + match[2].length },
        name: match[2],
        category: null,
        source: 'inline',
      });
    }

    const lone = LONE_HEADING_TAG.exec(masked.trim());
    if (lone) {
      const start = masked.indexOf('#');
      const nameStart = masked.indexOf(lone[1], start);
      found.push({
        position: { start, end: nameStart + lone[1].length },
        name: lone[1],
        category: null,
        source: 'inline',
      });
    }

    for (const match of masked.matchAll(CATEGORY_TAG)) {
      const start = match.index ?? 0;
      found.push({
        position: { start, end: start + match[0].length },
        name: match[2],
        category: match[1],
        source: 'category',
      });
    }

    if (scan.frontmatter) {
      const { frontmatter } = scan;
      let cursor = frontmatter.sourceStart;

      for (const name of frontmatterTagNames(parseFrontmatterData(frontmatter.source))) {
        const at = content.indexOf(name, cursor);
        const inBlock = at !== -1 && at + name.length <= frontmatter.end;
        if (inBlock) {
          cursor = at + name.length;
        }
        found.push({
          position: inBlock
            ? { start: at, end: at + name.length }
            : { start: frontmatter.start, end: frontmatter.end },
          name,
          category: null,
          source: 'frontmatter',
        });
      }
    }

    const sequence = new LocalIdSequence();
    return found
      .sort((a, b) => a.position.start - b.position.start)
      .map((tag): TagElement => ({
        id: sequence.next('tag'),
        kind: 'tag',
        position: tag.position,
        content: content.slice(tag.position.start, tag.position.end),
        parentId: null,
        name: tag.name,
        category: tag.category,
        source: tag.source,
      }));
  }
}
