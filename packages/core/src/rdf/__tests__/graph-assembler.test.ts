import { describe, it, expect } from 'vitest';
import { DataFactory } from 'n3';
import type { KbEntity } from '@kb-graph/types';
import { GraphAssembler } from '../graph-assembler.js';
import { parseGraph, serializeGraph } from '../serializer.js';
import { Processor } from '../../processor/processor.js';

const { namedNode, literal } = DataFactory;

const VOCAB = { namespace: 'http://example.org/kb/vocab#', version: 'test' };
const KB = VOCAB.namespace;
const RDF_TYPE = namedNode('http://www.w3.org/1999/02/22-rdf-syntax-ns#type');
const RDFS_LABEL = namedNode('http://www.w3.org/2000/01/rdf-schema#label');
const XSD = 'http://www.w3.org/2001/XMLSchema#';
const DOC = 'http://example.org/kb/documents/notes.md';
const NOW = new Date('2024-05-01T10:00:00.000Z');

const assembler = new GraphAssembler({ vocabulary: VOCAB });

describe('GraphAssembler', () => {
  it('writes common statements for every entity', () => {
    const graph = assembler.assemble([
      {
        type: 'heading',
        id: `${DOC}/heading/intro`,
        createdAt: NOW,
        updatedAt: NOW,
        label: 'Intro',
        sourceDocumentUri: DOC,
        span: [0, 8],
        level: 1,
        text: 'Intro',
        parentUri: null,
      },
    ]);

    const subject = namedNode(`${DOC}/heading/intro`);
    expect(graph.countQuads(subject, RDF_TYPE, namedNode(`${KB}Heading`), null)).toBe(1);
    expect(graph.countQuads(subject, RDFS_LABEL, literal('Intro'), null)).toBe(1);
    expect(graph.countQuads(subject, namedNode(`${KB}sourceDocument`), namedNode(DOC), null)).toBe(1);
    expect(
      graph.countQuads(subject, namedNode(`${KB}endOffset`), literal('8', namedNode(`${XSD}integer`)), null)
    ).toBe(1);
    expect(
      graph.countQuads(
        subject,
        namedNode('https://schema.org/dateCreated'),
        literal('2024-05-01T10:00:00.000Z', namedNode(`${XSD}dateTime`)),
        null
      )
    ).toBe(1);
    expect(graph.countQuads(subject, namedNode(`${KB}parentElement`), null, null)).toBe(0);
  });

  it('joins relative identifiers to the base URI', () => {
    const graph = new GraphAssembler({ vocabulary: VOCAB, baseUri: 'http://kb.test/' }).assemble([
      {
        type: 'tag',
        id: 'tags/urgent',
        createdAt: NOW,
        updatedAt: NOW,
        name: 'urgent',
        source: 'inline',
      },
    ]);
    expect(graph.countQuads(namedNode('http://kb.test/tags/urgent'), RDF_TYPE, namedNode(`${KB}Tag`), null)).toBe(1);
  });

  it('links todos to assignees and adds schema types', () => {
    const todo: KbEntity = {
      type: 'todo',
      id: `${DOC}/todo/ship`,
      createdAt: NOW,
      updatedAt: NOW,
      description: 'Ship',
      completed: true,
      dueDate: '2024-06-01',
      priority: 'high',
      assigneeUris: ['http://example.org/kb/people/dana'],
      parentUri: `${DOC}/list/1`,
    };
    const graph = assembler.assemble([todo]);
    const subject = namedNode(todo.id);

    expect(graph.countQuads(subject, RDF_TYPE, namedNode('https://schema.org/Action'), null)).toBe(1);
    expect(
      graph.countQuads(subject, namedNode(`${KB}isCompleted`), literal('true', namedNode(`${XSD}boolean`)), null)
    ).toBe(1);
    expect(
      graph.countQuads(subject, namedNode(`${KB}dueDate`), literal('2024-06-01', namedNode(`${XSD}date`)), null)
    ).toBe(1);
    expect(
      graph.countQuads(subject, namedNode(`${KB}assignee`), namedNode('http://example.org/kb/people/dana'), null)
    ).toBe(1);
    expect(graph.countQuads(subject, namedNode(`${KB}parentElement`), namedNode(`${DOC}/list/1`), null)).toBe(1);
  });

  it('points wikilinks at resolved documents and mentioned entities', () => {
    const graph = assembler.assemble([
      {
        type: 'wikilink',
        id: `${DOC}/wikilink/adr-001`,
        createdAt: NOW,
        updatedAt: NOW,
        targetPath: 'adr-001',
        originalText: '[[adr-001]]',
        resolvedDocumentUri: 'http://example.org/kb/documents/adr-001.md',
        entityUris: [`${DOC}/person/alice`],
      },
    ]);
    const subject = namedNode(`${DOC}/wikilink/adr-001`);

    expect(graph.countQuads(subject, RDF_TYPE, null, null)).toBe(2);
    expect(
      graph.countQuads(
        subject,
        namedNode(`${KB}resolvedDocument`),
        namedNode('http://example.org/kb/documents/adr-001.md'),
        null
      )
    ).toBe(1);
    expect(graph.countQuads(subject, namedNode(`${KB}mentions`), namedNode(`${DOC}/person/alice`), null)).toBe(1);
    expect(graph.countQuads(subject, namedNode(`${KB}alias`), null, null)).toBe(0);
  });

  it('types the end-to-end note', async () => {
    const processed = await new Processor({ clock: () => NOW }).process({
      path: 'doc1',
      content: '# Title\n\n- [ ] Task A\n- [x] Task B\n\n#urgent',
    });
    const graph = assembler.assemble(processed.entities);
    const doc1 = 'http://example.org/kb/documents/doc1';

    expect(graph.countQuads(namedNode(doc1), RDF_TYPE, namedNode(`${KB}Document`), null)).toBe(1);
    expect(graph.countQuads(namedNode(`${doc1}/todo/task-a`), RDF_TYPE, namedNode(`${KB}TodoItem`), null)).toBe(1);
    expect(graph.countQuads(namedNode(`${doc1}/tag/urgent`), RDFS_LABEL, literal('urgent'), null)).toBe(1);
    expect(graph.countQuads(namedNode(`${doc1}/heading/title`), RDFS_LABEL, literal('Title'), null)).toBe(1);
  });

  it('describes the document from its front matter', async () => {
    const processed = await new Processor({ clock: () => NOW }).process({
      path: 'meta.md',
      content:
        '---\nAuthor: [Ana, Ben]\ndate: 2024-03-01\nupdated: 2024-03-05T08:00:00Z\ndescription: Notes on the plan\nsummary: Short\n---\nbody',
    });
    const graph = assembler.assemble(processed.entities);
    const subject = namedNode('http://example.org/kb/documents/meta.md');
    const schema = (term: string) => namedNode(`https://schema.org/${term}`);

    expect(graph.countQuads(subject, schema('author'), literal('Ana, Ben'), null)).toBe(1);
    expect(graph.countQuads(subject, schema('description'), literal('Notes on the plan'), null)).toBe(1);
    expect(graph.countQuads(subject, schema('abstract'), literal('Short'), null)).toBe(1);
    expect(graph.countQuads(subject, schema('dateCreated'), null, null)).toBe(1);
    expect(
      graph.countQuads(subject, schema('dateCreated'), literal('2024-03-01', namedNode(`${XSD}date`)), null)
    ).toBe(1);
    expect(
      graph.countQuads(
        subject,
        schema('dateModified'),
        literal('2024-03-05T08:00:00.000Z', namedNode(`${XSD}dateTime`)),
        null
      )
    ).toBe(1);
  });

  it('falls back to the processing time without front-matter dates', async () => {
    const processed = await new Processor({ clock: () => NOW }).process({ path: 'plain.md', content: 'body' });
    const graph = assembler.assemble(processed.entities);
    const subject = namedNode('http://example.org/kb/documents/plain.md');

    expect(
      graph.countQuads(
        subject,
        namedNode('https://schema.org/dateModified'),
        literal('2024-05-01T10:00:00.000Z', namedNode(`${XSD}dateTime`)),
        null
      )
    ).toBe(1);
    expect(graph.countQuads(subject, namedNode('https://schema.org/author'), null, null)).toBe(0);
  });
});

describe('serializeGraph', () => {
  it('round-trips Turtle', async () => {
    const processed = await new Processor({ clock: () => NOW }).process({
      path: 'notes/roundtrip.md',
      content: '---\ntitle: Round trip\ntags: [alpha]\n---\n# Plan\n\n- [ ] Write "quotes" due:2024-06-01\n\n| a | b |\n|---|---|\n| 1 | 2 |\n\nSee [[other]] and [site](https://example.com).\n',
    });
    const graph = assembler.assemble(processed.entities);

    const turtle = await serializeGraph(graph, 'turtle', VOCAB);
    expect(turtle).toMatch(/@prefix kb: <http:\/\/example\.org\/kb\/vocab#>\s*\./);

    const reparsed = parseGraph(turtle, 'turtle');
    expect(reparsed.size).toBe(graph.size);
    for (const statement of graph.getQuads(null, null, null, null)) {
      expect(reparsed.countQuads(statement.subject, statement.predicate, statement.object, null)).toBe(1);
    }
  });

  it('writes one line per statement as N-Triples', async () => {
    const graph = assembler.assemble([
      { type: 'named_entity', id: `${DOC}/named_entity/x`, createdAt: NOW, updatedAt: NOW, text: 'X', entityLabel: 'MISC' },
    ]);
    const text = await serializeGraph(graph, 'n-triples', VOCAB);
    expect(text.trim().split('\n')).toHaveLength(graph.size);
    expect(parseGraph(text, 'n-triples').size).toBe(graph.size);
  });
});
