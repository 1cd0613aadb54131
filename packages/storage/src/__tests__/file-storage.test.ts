/**
 * FileStorage tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createHash } from 'node:crypto';
import { FileStorage } from '../file-storage.js';
import type { DocumentRecord } from '@kb-graph/types';

const CREATED = new Date('2024-05-01T10:00:00.000Z');
const UPDATED = new Date('2024-05-02T11:30:00.000Z');

function makeRecord(path: string, content = '# Notes\n\nSee [[other]] #draft'): DocumentRecord {
  return {
    documentId: `http://example.org/kb/documents/${path}`,
    path,
    title: 'Notes',
    tags: [{ name: 'draft', category: null, source: 'inline' }],
    links: [{ text: 'site', url: 'https://example.com', title: null, internal: false }],
    wikilinks: [
      {
        targetPath: 'other',
        alias: null,
        originalText: '[[other]]',
        resolvedDocumentUri: null,
        entities: [{ text: 'other', label: 'MISC', start: 16, end: 21, confidence: 0.5 }],
      },
    ],
    entities: [],
    content,
    metadata: { createdAt: CREATED, updatedAt: UPDATED },
  };
}

describe('FileStorage', () => {
  let storage: FileStorage;
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `kb-graph-storage-test-${Date.now()}`);
    await fs.mkdir(testDir, { recursive: true });
    storage = new FileStorage({ basePath: testDir });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('save', () => {
    it('stores a record', async () => {
      const record = makeRecord('notes/a.md');
      await storage.save(record);

      expect(await storage.exists(record.documentId)).toBe(true);
    });

    it('adds the content hash', async () => {
      const record = makeRecord('a.md', 'hello');
      await storage.save(record);
      const saved = await storage.get(record.documentId);

      expect(saved?.metadata.contentHash).toBe(createHash('sha256').update('hello').digest('hex'));
    });

    it('overwrites an existing record', async () => {
      const record = makeRecord('a.md');
      await storage.save(record);
      await storage.save({ ...record, title: 'Renamed' });

      expect((await storage.get(record.documentId))?.title).toBe('Renamed');
    });

    it('mirrors the document id as directories', async () => {
      await storage.save(makeRecord('deep/nested/doc.md'));

      const filePath = join(testDir, 'http', 'example.org', 'kb', 'documents', 'deep', 'nested', 'doc.md.json');
      await expect(fs.access(filePath)).resolves.toBeUndefined();
    });

    it('stores long non-ASCII names under their decoded segments', async () => {
      const notePath = 'заметки/Протокол встречи по архитектуре.md';
      const record = {
        ...makeRecord(notePath),
        documentId: `http://example.org/kb/documents/${notePath.split('/').map(encodeURIComponent).join('/')}`,
      };
      await storage.save(record);

      const filePath = join(testDir, 'http', 'example.org', 'kb', 'documents', 'заметки', 'Протокол встречи по архитектуре.md.json');
      await expect(fs.access(filePath)).resolves.toBeUndefined();
      expect((await storage.get(record.documentId))?.path).toBe(notePath);
      expect(await storage.list()).toEqual([record.documentId]);
    });

    it('keeps dot segments inside the base directory', async () => {
      const record = { ...makeRecord('x.md'), documentId: 'http://example.org/kb/documents/%2E%2E/x.md' };
      await storage.save(record);

      await expect(
        fs.access(join(testDir, 'http', 'example.org', 'kb', 'documents', '%252E%252E', 'x.md.json'))
      ).resolves.toBeUndefined();
      expect(await storage.list()).toEqual([record.documentId]);
    });
  });

  describe('get', () => {
    it('returns what was saved, with dates revived', async () => {
      const record = makeRecord('a.md');
      await storage.save(record);

      const saved = await storage.get(record.documentId);
      expect(saved).toEqual({
        ...record,
        metadata: { ...record.metadata, contentHash: createHash('sha256').update(record.content).digest('hex') },
      });
      expect(saved?.metadata.createdAt).toBeInstanceOf(Date);
    });

    it('keeps front-matter fields', async () => {
      const record: DocumentRecord = {
        ...makeRecord('meta.md'),
        frontmatter: {
          author: 'Ana',
          description: null,
          summary: 'Short',
          dateCreated: '2024-03-01',
          dateModified: null,
          custom: { status: 'draft', review: { by: 'kim' } },
        },
      };
      await storage.save(record);

      expect((await storage.get(record.documentId))?.frontmatter).toEqual(record.frontmatter);
    });

    it('returns null for an unknown id', async () => {
      expect(await storage.get('http://example.org/kb/documents/missing.md')).toBeNull();
    });

    it('rejects a malformed file', async () => {
      const id = 'http://example.org/kb/documents/bad.md';
      await fs.mkdir(join(testDir, 'http', 'example.org', 'kb', 'documents'), { recursive: true });
      await fs.writeFile(join(testDir, 'http', 'example.org', 'kb', 'documents', 'bad.md.json'), JSON.stringify({ documentId: id }));

      await expect(storage.get(id)).rejects.toThrow(/Invalid document record/);
    });
  });

  describe('delete', () => {
    it('removes a record', async () => {
      const record = makeRecord('a.md');
      await storage.save(record);
      await storage.delete(record.documentId);

      expect(await storage.exists(record.documentId)).toBe(false);
    });

    it('ignores unknown ids', async () => {
      await expect(storage.delete('http://example.org/kb/documents/none.md')).resolves.toBeUndefined();
    });
  });

  describe('list', () => {
    it('lists stored ids in order', async () => {
      await storage.save(makeRecord('b.md'));
      await storage.save(makeRecord('a/c.md'));

      expect(await storage.list()).toEqual([
        'http://example.org/kb/documents/a/c.md',
        'http://example.org/kb/documents/b.md',
      ]);
    });

    it('returns an empty list when nothing was stored', async () => {
      const empty = new FileStorage({ basePath: join(testDir, 'nothing-here') });
      expect(await empty.list()).toEqual([]);
    });
  });
});
