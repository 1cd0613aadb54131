import { describe, it, expect } from 'vitest';
import type { BlockquoteElement, CodeBlockElement, ContentElement } from '@kb-graph/types';
import { CodeQuoteExtractor } from '../code-quote.js';

const extractor = new CodeQuoteExtractor();

function codeBlocks(elements: ContentElement[]): CodeBlockElement[] {
  return elements.filter((e): e is CodeBlockElement => e.kind === 'code_block');
}

function quotes(elements: ContentElement[]): BlockquoteElement[] {
  return elements.filter((e): e is BlockquoteElement => e.kind === 'blockquote');
}

describe('CodeQuoteExtractor', () => {
  const content = [
    '```ts',
    'const a = 1;',
    '```',
    '> quote one',
    '> still one',
    '>> deeper',
    '> back',
    '',
    '```',
    'plain',
    '```',
  ].join('\n');

  it('returns both kinds in document order', () => {
    const elements = extractor.extract({ path: 'doc.md', content });
    expect(elements.map((e) => e.id)).toEqual([
      'code_block-0',
      'blockquote-0',
      'blockquote-1',
      'blockquote-2',
      'code_block-1',
    ]);
  });

  it('reads fence language and code', () => {
    const [ts, plain] = codeBlocks(extractor.extract({ path: 'doc.md', content }));
    expect(ts).toMatchObject({ language: 'ts', code: 'const a = 1;', position: { start: 0, end: 22 } });
    expect(plain).toMatchObject({ language: null, code: 'plain', position: { start: 65, end: 78 } });
  });

  it('merges same-level quote lines and splits on level changes', () => {
    const found = quotes(extractor.extract({ path: 'doc.md', content }));
    expect(found.map((q) => [q.level, q.content])).toEqual([
      [1, 'quote one\nstill one'],
      [2, 'deeper'],
      [1, 'back'],
    ]);
    expect(found[0].position).toEqual({ start: 23, end: 46 });
  });

  it('counts spaced markers', () => {
    const [quote] = quotes(extractor.extract({ path: 'doc.md', content: '> > nested' }));
    expect(quote.level).toBe(2);
    expect(quote.content).toBe('nested');
  });

  it('runs an unterminated fence to the end', () => {
    const source = '```py\nprint(1)\n';
    const [block] = codeBlocks(extractor.extract({ path: 'doc.md', content: source }));
    expect(block).toMatchObject({
      language: 'py',
      code: 'print(1)',
      position: { start: 0, end: source.length },
    });
  });

  it('ignores quote markers inside code', () => {
    const elements = extractor.extract({ path: 'doc.md', content: '```\n> not a quote\n```' });
    expect(quotes(elements)).toEqual([]);
    expect(codeBlocks(elements)).toHaveLength(1);
  });
});
