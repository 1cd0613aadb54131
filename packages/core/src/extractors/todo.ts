import type { SourceDocument, TodoItemElement } from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { scanDocument } from './markdown-scan.js';

const TODO_ITEM = /^[ \t]*(?:[-*+]|\d+[.)])[ \t]+\[([ xX])\][ \t]*(.*?)[ \t]*$/;

/**
 * Checkbox list items (`- [ ]`, `- [x]`, `1. [X]`), at any indentation
 */
export class TodoExtractor implements Extractor {
  readonly name = 'todo' as const;

  extract(document: SourceDocument): TodoItemElement[] {
    const { bodyLines } = scanDocument(document.content);
    const sequence = new LocalIdSequence();
    const todos: TodoItemElement[] = [];

    for (const line of bodyLines) {
      const match = TODO_ITEM.exec(line.text);
      if (!match) {
        continue;
      }

      todos.push({
        id: sequence.next('todo_item'),
        kind: 'todo_item',
        position: { start: line.start, end: line.end },
        content: line.text,
        parentId: null,
        text: match[2],
        checked: match[1].toLowerCase() === 'x',
      });
    }

    return todos;
  }
}
