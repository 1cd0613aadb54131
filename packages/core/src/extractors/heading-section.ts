import type { ContentElement, HeadingElement, SectionElement, SourceDocument } from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { scanDocument } from './markdown-scan.js';

const ATX_HEADING = /^ {0,3}(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/;

interface OpenHeading {
  id: string;
  level: number;
}

/**
 * ATX headings and the sections they open.
 *
 * Parent headings follow a stack: a heading of level L pops every open
 * heading with level >= L; what remains on top is its parent.
 */
export class HeadingSectionExtractor implements Extractor {
  readonly name = 'heading-section' as const;

  extract(document: SourceDocument): ContentElement[] {
    const { content } = document;
    const { bodyLines } = scanDocument(content);
    const sequence = new LocalIdSequence();

    const headings: Array<{ element: HeadingElement; bodyStart: number }> = [];
    const stack: OpenHeading[] = [];

    for (const line of bodyLines) {
      const match = ATX_HEADING.exec(line.text);
      if (!match) {
        continue;
      }

      const text = match[2].trim();
      if (!text) {
        continue;
      }

      const level = match[1].length;
      while (stack.length > 0 && stack[stack.length - 1].level >= level) {
        stack.pop();
      }

      const id = sequence.next('heading');
      headings.push({
        element: {
          id,
          kind: 'heading',
          position: { start: line.start, end: line.end },
          content: line.text,
          parentId: stack.length > 0 ? stack[stack.length - 1].id : null,
          level,
          text,
        },
        bodyStart: line.next,
      });
      stack.push({ id, level });
    }

    const elements: ContentElement[] = [];

    headings.forEach(({ element, bodyStart }, index) => {
      const closing = headings.slice(index + 1).find((next) => next.element.level <= element.level);
      const end = closing ? closing.element.position.start : content.length;
      const start = Math.min(bodyStart, end);

      const section: SectionElement = {
        id: sequence.next('section'),
        kind: 'section',
        position: { start, end },
        content: content.slice(start, end),
        parentId: element.id,
        headingId: element.id,
      };

      elements.push(element, section);
    });

    return elements;
  }
}
