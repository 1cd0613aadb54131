import type { BlockquoteElement, CodeBlockElement, ContentElement, SourceDocument } from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { scanDocument, type Line } from './markdown-scan.js';

/** `>` markers, optionally separated by spaces */
const QUOTE_PREFIX = /^[ \t]*((?:>[ ]?)+)(.*)$/;

interface QuoteRun {
  level: number;
  lines: Line[];
  texts: string[];
}

/**
 * Fenced code blocks and blockquotes
 */
export class CodeQuoteExtractor implements Extractor {
  readonly name = 'code-quote' as const;

  extract(document: SourceDocument): ContentElement[] {
    const { content } = document;
    const scan = scanDocument(content);
    const sequence = new LocalIdSequence();

    const codeBlocks = scan.fences.map((fence): CodeBlockElement => ({
      id: sequence.next('code_block'),
      kind: 'code_block',
      position: { start: fence.start, end: fence.end },
      content: content.slice(fence.start, fence.end),
      parentId: null,
      language: fence.language,
      code: fence.code,
    }));

    const quotes = this.collectQuoteRuns(scan.bodyLines).map((run): BlockquoteElement => {
      const start = run.lines[0].start;
      const end = run.lines[run.lines.length - 1].end;
      return {
        id: sequence.next('blockquote'),
        kind: 'blockquote',
        position: { start, end },
        content: run.texts.join('\n'),
        parentId: null,
        level: run.level,
      };
    });

    const elements: ContentElement[] = [...codeBlocks, ...quotes];
    return elements.sort((a, b) => a.position.start - b.position.start);
  }

  /**
   * Consecutive lines with the same number of `>` markers form one run
   */
  private collectQuoteRuns(lines: Line[]): QuoteRun[] {
    const runs: QuoteRun[] = [];
    let current: QuoteRun | null = null;
    let previous: Line | null = null;

    for (const line of lines) {
      const match = QUOTE_PREFIX.exec(line.text);
      const adjacent = previous !== null && previous.next === line.start;

      if (!match) {
        current = null;
        previous = line;
        continue;
      }

      const level = (match[1].match(/>/g) ?? []).length;
      const text = match[2];

      if (current && current.level === level && adjacent) {
        current.lines.push(line);
        current.texts.push(text);
      } else {
        current = { level, lines: [line], texts: [text] };
        runs.push(current);
      }
      previous = line;
    }

    return runs;
  }
}
