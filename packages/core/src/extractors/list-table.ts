import { marked, type Token, type Tokens } from 'marked';
import type {
  ContentElement,
  ListElement,
  ListItemElement,
  SourceDocument,
  TableCell,
  TableElement,
} from '@kb-graph/types';
import { LocalIdSequence, type Extractor } from './extractor.js';
import { findFrontmatter, splitLines, type Line, type Region } from './markdown-scan.js';

const LIST_ITEM = /^([ \t]*)([-*+]|\d+[.)])(?:[ \t]+(.*))?$/;
const TAB_WIDTH = 4;

interface OpenList {
  element: ListElement;
  indent: number;
}

function isList(token: Token): token is Tokens.List {
  return token.type === 'list';
}

function isTable(token: Token): token is Tokens.Table {
  return token.type === 'table';
}

function indentWidth(indent: string): number {
  let width = 0;
  for (const char of indent) {
    width = char === '\t' ? width + TAB_WIDTH - (width % TAB_WIDTH) : width + 1;
  }
  return width;
}

/**
 * Find a token's raw text in the document, starting at the cursor.
 * Falls back to matching its first line when the lexer has rewritten
 * whitespace or line endings.
 */
function locate(content: string, raw: string, cursor: number): Region | null {
  const exact = content.indexOf(raw, cursor);
  if (exact !== -1) {
    return { start: exact, end: exact + raw.length };
  }

  const rawLines = raw.replace(/\n+$/, '').split('\n');
  const firstLine = rawLines.find((line) => line.trim())?.trim();
  if (!firstLine) {
    return null;
  }

  const found = content.indexOf(firstLine, cursor);
  if (found === -1) {
    return null;
  }

  const start = content.lastIndexOf('\n', found - 1) + 1;
  let end = start;
  for (let i = 0; i < rawLines.length; i++) {
    const newline = content.indexOf('\n', end);
    if (newline === -1) {
      end = content.length;
      break;
    }
    end = i === rawLines.length - 1 ? newline : newline + 1;
  }

  return { start, end };
}

/**
 * Lists (with nesting) and pipe tables, found with marked's lexer.
 *
 * marked decides where a list or table block starts and ends; list
 * nesting inside a block is rebuilt from indentation.
 */
export class ListTableExtractor implements Extractor {
  readonly name = 'list-table' as const;

  extract(document: SourceDocument): ContentElement[] {
    const { content } = document;
    const frontmatter = findFrontmatter(content);
    const bodyStart = frontmatter ? frontmatter.end : 0;
    const lines = splitLines(content);
    const sequence = new LocalIdSequence();
    const elements: ContentElement[] = [];

    const tokens = marked.lexer(content.slice(bodyStart));
    let cursor = bodyStart;

    for (const token of tokens) {
      const region = token.raw.trim() ? locate(content, token.raw, cursor) : null;
      if (!region) {
        continue;
      }
      cursor = region.end;

      if (isList(token)) {
        const blockLines = lines.filter((line) => line.start >= region.start && line.start < region.end);
        elements.push(...this.extractList(content, blockLines, sequence));
      } else if (isTable(token)) {
        elements.push(this.buildTable(content, token, region, sequence));
      }
    }

    return elements;
  }

  private extractList(content: string, lines: Line[], sequence: LocalIdSequence): ContentElement[] {
    const elements: ContentElement[] = [];
    const stack: OpenList[] = [];
    const lists: ListElement[] = [];
    let currentItem: ListItemElement | null = null;
    const lastItemByList = new Map<string, string>();

    const extendOpenLists = (end: number): void => {
      for (const open of stack) {
        open.element.position.end = end;
      }
    };

    for (const line of lines) {
      const match = LIST_ITEM.exec(line.text);

      if (!match) {
        // continuation of the current item
        if (currentItem && line.text.trim()) {
          currentItem.position.end = line.end;
          currentItem.content = content.slice(currentItem.position.start, line.end);
          extendOpenLists(line.end);
        }
        continue;
      }

      const indent = indentWidth(match[1]);
      const ordered = /^\d/.test(match[2]);

      while (stack.length > 0 && indent < stack[stack.length - 1].indent) {
        stack.pop();
      }

      const top = stack.length > 0 ? stack[stack.length - 1] : null;
      let target: OpenList;

      if (top === null || indent > top.indent) {
        const parentItem = top ? lastItemByList.get(top.element.id) ?? null : null;
        const list: ListElement = {
          id: sequence.next('list'),
          kind: 'list',
          position: { start: line.start, end: line.end },
          content: '',
          parentId: parentItem,
          ordered,
          level: stack.length,
          itemCount: 0,
        };
        target = { element: list, indent };
        stack.push(target);
        lists.push(list);
        elements.push(list);
      } else {
        target = top;
      }

      const item: ListItemElement = {
        id: sequence.next('list_item'),
        kind: 'list_item',
        position: { start: line.start, end: line.end },
        content: line.text,
        parentId: target.element.id,
        text: (match[3] ?? '').trim(),
        ordered,
        level: target.element.level,
      };

      target.element.itemCount += 1;
      lastItemByList.set(target.element.id, item.id);
      currentItem = item;
      elements.push(item);
      extendOpenLists(line.end);
    }

    for (const list of lists) {
      list.content = content.slice(list.position.start, list.position.end);
    }

    return elements;
  }

  private buildTable(
    content: string,
    token: Tokens.Table,
    region: Region,
    sequence: LocalIdSequence
  ): TableElement {
    const headers = token.header.map((cell) => cell.text.trim());
    const rows = token.rows.map((row) => row.map((cell) => cell.text.trim()));

    const cells: TableCell[] = [
      ...headers.map((text, column) => ({ text, row: 0, column, header: true })),
      ...rows.flatMap((row, rowIndex) =>
        row.map((text, column) => ({ text, row: rowIndex + 1, column, header: false }))
      ),
    ];

    const end = content.slice(region.start, region.end).replace(/\s+$/, '').length + region.start;

    return {
      id: sequence.next('table'),
      kind: 'table',
      position: { start: region.start, end },
      content: content.slice(region.start, end),
      parentId: null,
      headers,
      rows,
      cells,
      rowCount: rows.length + 1,
      columnCount: headers.length,
    };
  }
}
