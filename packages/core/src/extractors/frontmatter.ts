import { parse as parseYaml } from 'yaml';
import type { FrontmatterElement, FrontmatterMetadata, SourceDocument } from '@kb-graph/types';
import type { Extractor } from './extractor.js';
import { findFrontmatter } from './markdown-scan.js';

export interface ParsedFrontmatter {
  element: FrontmatterElement;
  data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML front matter; malformed or non-mapping YAML yields `{}`
 */
export function parseFrontmatterData(source: string): Record<string, unknown> {
  try {
    const parsed: unknown = parseYaml(source);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function readFrontmatter(content: string): ParsedFrontmatter | null {
  const block = findFrontmatter(content);
  if (!block) {
    return null;
  }

  const data = parseFrontmatterData(block.source);
  return {
    element: {
      id: 'frontmatter-0',
      kind: 'frontmatter',
      position: { start: block.start, end: block.end },
      content: block.source,
      parentId: null,
      format: 'yaml',
      data,
    },
    data,
  };
}

/**
 * Split a `tags`/`categories` value: a list, or a string separated by
 * commas or whitespace
 */
export function frontmatterTagNames(data: Record<string, unknown>): string[] {
  const names: string[] = [];

  for (const key of ['tags', 'categories']) {
    const value = data[key];
    const items = Array.isArray(value) ? value : typeof value === 'string' ? value.split(/[,\s]+/) : [];

    for (const item of items) {
      if (typeof item === 'string' || typeof item === 'number') {
        const name = String(item).trim();
        if (name) {
          names.push(name);
        }
      }
    }
  }

  return names;
}

const RESERVED_KEYS = new Set([
  'title',
  'tags',
  'categories',
  'author',
  'date',
  'created',
  'modified',
  'updated',
  'description',
  'summary',
]);

function scalarText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return null;
}

function authorText(value: unknown): string | null {
  if (Array.isArray(value)) {
    const names = value.map(scalarText).filter((name): name is string => name !== null);
    return names.length > 0 ? names.join(', ') : null;
  }
  return scalarText(value);
}

/**
 * Map parsed front matter onto the document's descriptive fields
 */
export function frontmatterMetadata(data: Record<string, unknown>): FrontmatterMetadata {
  const byKey = new Map<string, unknown>();
  const custom: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(data)) {
    const normalized = key.toLowerCase();
    if (RESERVED_KEYS.has(normalized)) {
      if (!byKey.has(normalized)) {
        byKey.set(normalized, value);
      }
    } else {
      custom[key] = value;
    }
  }

  const first = (...keys: string[]): string | null => {
    for (const key of keys) {
      const text = scalarText(byKey.get(key));
      if (text !== null) {
        return text;
      }
    }
    return null;
  };

  return {
    author: authorText(byKey.get('author')),
    description: first('description'),
    summary: first('summary'),
    dateCreated: first('date', 'created'),
    dateModified: first('modified', 'updated'),
    custom,
  };
}

export class FrontmatterExtractor implements Extractor {
  readonly name = 'frontmatter' as const;

  extract(document: SourceDocument): FrontmatterElement[] {
    const parsed = readFrontmatter(document.content);
    return parsed ? [parsed.element] : [];
  }
}
