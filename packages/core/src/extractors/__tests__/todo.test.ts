import { describe, it, expect } from 'vitest';
import { TodoExtractor } from '../todo.js';

const extractor = new TodoExtractor();

describe('TodoExtractor', () => {
  it('finds checkbox items at any indentation', () => {
    const content = [
      '- [ ] Task A',
      '- [x] Task B',
      '  * [X] nested',
      '\t1. [ ] tabbed',
      '- not a todo',
      '```',
      '- [ ] in code',
      '```',
    ].join('\n');

    const todos = extractor.extract({ path: 'doc.md', content });

    expect(todos.map((t) => [t.text, t.checked])).toEqual([
      ['Task A', false],
      ['Task B', true],
      ['nested', true],
      ['tabbed', false],
    ]);
    expect(todos[0]).toMatchObject({
      id: 'todo_item-0',
      position: { start: 0, end: 12 },
      content: '- [ ] Task A',
      parentId: null,
    });
  });

  it('requires a list marker', () => {
    expect(extractor.extract({ path: 'doc.md', content: '[ ] loose box\n[x] done' })).toEqual([]);
  });
});
