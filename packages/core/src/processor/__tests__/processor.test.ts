import { describe, it, expect, vi, afterEach } from 'vitest';
import type { EntityRecognizer, PersonEntity, TodoEntity, WikiLinkEntity } from '@kb-graph/types';
import { Processor, titleFromPath } from '../processor.js';
import { parseTodoAttributes, recognizedType } from '../entity-builder.js';
import { DictionaryRecognizer } from '../../recognizer/dictionary-recognizer.js';
import { createExtractors, type Extractor } from '../../extractors/index.js';
import { DocumentRegistry } from '../../registry/document-registry.js';
import { IdGenerator } from '../../identity/id-generator.js';

const FIXED = new Date('2024-05-01T10:00:00.000Z');
const clock = () => FIXED;
const DOC1 = 'http://example.org/kb/documents/doc1';

describe('Processor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('turns a small note into document, structure, todos and tags', async () => {
    const processor = new Processor({ clock });
    const result = await processor.process({
      path: 'doc1',
      content: '# Title\n\n- [ ] Task A\n- [x] Task B\n\n#urgent',
    });

    expect(result.identity.documentId).toBe(DOC1);
    expect(result.title).toBe('doc1');
    expect(result.warnings).toEqual([]);

    const ids = result.entities.map((entity) => entity.id);
    expect(ids[0]).toBe(DOC1);
    expect(ids).toEqual(
      expect.arrayContaining([
        `${DOC1}/heading/title`,
        `${DOC1}/section/title`,
        `${DOC1}/list/1`,
        `${DOC1}/todo/task-a`,
        `${DOC1}/todo/task-b`,
        `${DOC1}/tag/urgent`,
      ])
    );
    expect(new Set(ids).size).toBe(ids.length);

    const todos = result.entities.filter((entity): entity is TodoEntity => entity.type === 'todo');
    expect(todos.map((todo) => [todo.description, todo.completed, todo.parentUri])).toEqual([
      ['Task A', false, `${DOC1}/list/1`],
      ['Task B', true, `${DOC1}/list/1`],
    ]);
    expect(todos[0].createdAt).toBe(FIXED);
  });

  it('prefers the front-matter title', async () => {
    const result = await new Processor({ clock }).process({
      path: 'notes/weekly_sync.md',
      content: '---\ntitle: Weekly Sync\n---\nbody',
      title: 'Ignored',
    });
    expect(result.title).toBe('Weekly Sync');
    expect(result.record.title).toBe('Weekly Sync');
  });

  it('keeps descriptive front-matter fields on the document and the record', async () => {
    const result = await new Processor({ clock }).process({
      path: 'meta.md',
      content:
        '---\ntitle: Plan\nAuthor: [Ana, Ben]\ncreated: 2024-03-01\nmodified: 2024-03-05\ndescription: Notes on the plan\nsummary: Short\nstatus: draft\ntags: [x]\n---\nbody',
    });
    const expected = {
      author: 'Ana, Ben',
      description: 'Notes on the plan',
      summary: 'Short',
      dateCreated: '2024-03-01',
      dateModified: '2024-03-05',
      custom: { status: 'draft' },
    };

    expect(result.record.frontmatter).toEqual(expected);
    expect(result.entities.find((entity) => entity.type === 'document')).toMatchObject({ frontmatter: expected });
  });

  it('leaves the front-matter fields empty without front matter', async () => {
    const result = await new Processor({ clock }).process({ path: 'plain.md', content: 'body' });
    expect(result.record.frontmatter).toEqual({
      author: null,
      description: null,
      summary: null,
      dateCreated: null,
      dateModified: null,
      custom: {},
    });
  });

  it('falls back to the caller title, then the file name', async () => {
    const processor = new Processor({ clock });
    expect((await processor.process({ path: 'a.md', content: 'x', title: 'Given' })).title).toBe('Given');
    expect((await processor.process({ path: 'notes/weekly_sync-2.md', content: 'x' })).title).toBe('weekly sync 2');
  });

  it('suffixes repeated slugs in document order', async () => {
    const result = await new Processor({ clock }).process({
      path: 'dup.md',
      content: '# Notes\n\ntext\n\n# Notes\n',
    });
    const headings = result.entities.filter((entity) => entity.type === 'heading').map((entity) => entity.id);
    expect(headings).toEqual([
      'http://example.org/kb/documents/dup.md/heading/notes',
      'http://example.org/kb/documents/dup.md/heading/notes-2',
    ]);
  });

  it('gives a loose todo the section around it', async () => {
    const extractors = createExtractors(['heading-section', 'todo']);
    const result = await new Processor({ clock, extractors }).process({
      path: 'plan.md',
      content: '# Plan\n\n- [ ] Ship it due:2024-06-01 priority:High @dana.\n',
    });
    const todo = result.entities.find((entity): entity is TodoEntity => entity.type === 'todo');
    expect(todo).toMatchObject({
      parentUri: 'http://example.org/kb/documents/plan.md/section/plan',
      dueDate: '2024-06-01',
      priority: 'high',
      assigneeUris: ['http://example.org/kb/people/dana'],
    });
  });

  it('keeps elements in extractor order, then document order', async () => {
    const extractors = createExtractors(['todo', 'heading-section']);
    const result = await new Processor({ clock, extractors }).process({
      path: 'order.md',
      content: '# T\n\n- [ ] a\n- [ ] b\n',
    });

    expect(result.elements.map((element) => element.kind)).toEqual(['todo_item', 'todo_item', 'heading', 'section']);
    expect(result.elements.map((element) => element.position.start)).toEqual([5, 13, 0, 4]);
  });

  it('records a failing extractor as a warning and keeps the rest', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const broken: Extractor = {
      name: 'tag',
      extract: () => {
        throw new Error('boom');
      },
    };
    const extractors = [...createExtractors(['heading-section']), broken];
    const result = await new Processor({ clock, extractors }).process({ path: 'a.md', content: '# A\n#tag' });

    expect(result.warnings).toEqual(['tag: boom']);
    expect(result.entities.some((entity) => entity.type === 'heading')).toBe(true);
    expect(warn).toHaveBeenCalledWith('[Processor] a.md: tag: boom');
  });

  it('merges recognised entities from the body and wikilink labels', async () => {
    const recognizer = new DictionaryRecognizer([
      { text: 'Alice Smith', label: 'PERSON' },
      { text: 'Acme', label: 'ORG' },
    ]);
    const result = await new Processor({ clock, recognizer }).process({
      path: 'meeting.md',
      content: 'Alice Smith met Bob at Acme.\n[[Alice Smith]]',
    });

    const base = 'http://example.org/kb/documents/meeting.md';
    const people = result.entities.filter((entity): entity is PersonEntity => entity.type === 'person');
    expect(people).toHaveLength(1);
    expect(people[0]).toMatchObject({
      id: `${base}/person/alice-smith`,
      fullName: 'Alice Smith',
      givenName: 'Alice',
      familyName: 'Smith',
      entityLabel: 'PERSON',
      span: [0, 11],
    });
    expect(result.entities.find((entity) => entity.type === 'organization')?.id).toBe(`${base}/organization/acme`);

    const link = result.entities.find((entity): entity is WikiLinkEntity => entity.type === 'wikilink');
    expect(link?.entityUris).toEqual([`${base}/person/alice-smith`]);
    expect(link?.resolvedDocumentUri).toBeNull();

    expect(result.record.entities.map((entity) => [entity.text, entity.start, entity.end])).toEqual([
      ['Alice Smith', 0, 11],
      ['Acme', 23, 27],
    ]);
    expect(result.record.wikilinks[0].entities).toEqual([
      { text: 'Alice Smith', label: 'PERSON', start: 31, end: 42, confidence: null },
    ]);
  });

  it('shifts body entities past the front matter', async () => {
    const recognizer = new DictionaryRecognizer([{ text: 'Oslo', label: 'GPE' }]);
    const result = await new Processor({ clock, recognizer }).process({
      path: 'trip.md',
      content: '---\nplace: Oslo\n---\nOff to Oslo',
    });
    expect(result.record.entities).toEqual([{ text: 'Oslo', label: 'GPE', start: 27, end: 31, confidence: null }]);
    expect(result.entities.find((entity) => entity.type === 'location')?.span).toEqual([27, 31]);
  });

  it('turns recognizer failures into warnings', async () => {
    const failing: EntityRecognizer = {
      recognize: async () => {
        throw new Error('model unavailable');
      },
    };
    const result = await new Processor({ clock, recognizer: failing }).process({ path: 'a.md', content: 'Hello' });
    expect(result.warnings).toEqual(['recognizer: model unavailable']);
    expect(result.record.entities).toEqual([]);
  });

  it('keeps one entity per recognised text', async () => {
    const recognizer: EntityRecognizer = {
      recognize: async () => [
        { text: 'Paris', label: 'GPE', start: 0, end: 5 },
        { text: 'Paris', label: 'PERSON', start: 10, end: 15 },
      ],
    };
    const result = await new Processor({ clock, recognizer }).process({ path: 'trip.md', content: 'Paris and Paris' });

    const recognised = result.entities.filter((entity) => entity.type === 'location' || entity.type === 'person');
    expect(recognised.map((entity) => entity.id)).toEqual(['http://example.org/kb/documents/trip.md/location/paris']);
    expect(result.record.entities).toEqual([{ text: 'Paris', label: 'GPE', start: 0, end: 5, confidence: null }]);
  });

  it('rejects malformed recognizer output', async () => {
    const malformed: EntityRecognizer = {
      recognize: async () => [{ text: 'x', label: 'PERSON', start: 4, end: 2 }],
    };
    const result = await new Processor({ clock, recognizer: malformed }).process({ path: 'a.md', content: 'Hello' });
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toMatch(/^recognizer: /);
  });

  it('resolves wikilinks through a sealed registry', async () => {
    const ids = new IdGenerator();
    const registry = new DocumentRegistry();
    registry.register(ids.createDocumentIdentity('adr-001.md'));
    registry.seal();

    const result = await new Processor({ clock, registry, idGenerator: ids }).process({
      path: 'index.md',
      content: 'See [[adr-001]]',
    });
    expect(result.record.wikilinks[0].resolvedDocumentUri).toBe('http://example.org/kb/documents/adr-001.md');
  });

  it('builds the persistence record', async () => {
    const result = await new Processor({ clock }).process({
      path: 'r.md',
      content: '#alpha [site](https://example.com "Home")',
    });
    expect(result.record).toMatchObject({
      documentId: 'http://example.org/kb/documents/r.md',
      path: 'r.md',
      tags: [{ name: 'alpha', category: null, source: 'inline' }],
      links: [{ text: 'site', url: 'https://example.com', title: 'Home', internal: false }],
      wikilinks: [],
      metadata: { createdAt: FIXED, updatedAt: FIXED },
    });
  });
});

describe('titleFromPath', () => {
  it('uses the file stem', () => {
    expect(titleFromPath('docs/getting-started.md')).toBe('getting started');
    expect(titleFromPath('README')).toBe('README');
  });
});

describe('parseTodoAttributes', () => {
  it('reads due date, priority and assignees', () => {
    expect(parseTodoAttributes('Review due:2024-12-01 priority:LOW @kim @lee-')).toEqual({
      dueDate: '2024-12-01',
      priority: 'low',
      assignees: ['kim', 'lee'],
    });
  });

  it('ignores category tags and e-mail addresses', () => {
    expect(parseTodoAttributes('See @area/infra and mail a@b.example')).toEqual({ assignees: [] });
  });
});

describe('recognizedType', () => {
  it.each([
    ['PERSON', 'person'],
    ['per', 'person'],
    ['ORG', 'organization'],
    ['GPE', 'location'],
    ['DATE', 'date'],
    ['PRODUCT', 'named_entity'],
  ])('%s → %s', (label, type) => {
    expect(recognizedType(label)).toBe(type);
  });
});
