/**
 * File-based DocumentStore
 */

import { promises as fs, type Dirent } from 'node:fs';
import { dirname, join, normalize } from 'node:path';
import { createHash } from 'node:crypto';
import { z } from 'zod';
import type { DocumentRecord, DocumentStore } from '@kb-graph/types';

export interface FileStorageOptions {
  /** Directory holding one JSON file per document */
  basePath: string;
}

const EntityRecordSchema = z.object({
  text: z.string(),
  label: z.string(),
  start: z.number(),
  end: z.number(),
  confidence: z.number().nullable(),
});

const TagSourceSchema = z.enum(['inline', 'category', 'frontmatter']);

const DocumentRecordSchema = z.object({
  documentId: z.string(),
  path: z.string(),
  title: z.string(),
  tags: z.array(
    z.object({
      name: z.string(),
      category: z.string().nullable(),
      source: TagSourceSchema,
    })
  ),
  links: z.array(
    z.object({
      text: z.string(),
      url: z.string(),
      title: z.string().nullable(),
      internal: z.boolean(),
    })
  ),
  wikilinks: z.array(
    z.object({
      targetPath: z.string(),
      alias: z.string().nullable(),
      originalText: z.string(),
      resolvedDocumentUri: z.string().nullable(),
      entities: z.array(EntityRecordSchema),
    })
  ),
  entities: z.array(EntityRecordSchema),
  content: z.string(),
  frontmatter: z
    .object({
      author: z.string().nullable(),
      description: z.string().nullable(),
      summary: z.string().nullable(),
      dateCreated: z.string().nullable(),
      dateModified: z.string().nullable(),
      custom: z.record(z.unknown()),
    })
    .optional(),
  metadata: z.object({
    createdAt: z.coerce.date(),
    updatedAt: z.coerce.date(),
    contentHash: z.string().optional(),
  }),
});

const StoredIdSchema = z.object({ documentId: z.string() });

const SCHEME = /^([a-z][a-z0-9+.-]*):\/\/(.*)$/i;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * One id segment as a file name: decoded where that is a plain name,
 * left encoded otherwise
 */
function toFileName(segment: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(segment);
  } catch {
    decoded = '';
  }
  if (decoded === '' || decoded === '.' || decoded === '..' || /[/\\\0]/.test(decoded)) {
    return encodeURIComponent(segment) || '%';
  }
  return decoded;
}

/**
 * Stores records as JSON. The document id is mirrored as directories
 * (`http://example.org/kb/documents/notes/a.md` →
 * `http/example.org/kb/documents/notes/a.md.json`).
 */
export class FileStorage implements DocumentStore {
  private basePath: string;

  constructor(options: FileStorageOptions) {
    this.basePath = normalize(options.basePath);
  }

  /**
   * Save a record, adding the content hash
   */
  async save(record: DocumentRecord): Promise<void> {
    const filePath = this.getFilePath(record.documentId);
    await fs.mkdir(dirname(filePath), { recursive: true });

    const withHash: DocumentRecord = {
      ...record,
      metadata: {
        ...record.metadata,
        contentHash: this.calculateHash(record.content),
      },
    };

    await fs.writeFile(filePath, JSON.stringify(withHash, null, 2), 'utf-8');
  }

  async get(documentId: string): Promise<DocumentRecord | null> {
    let content: string;
    try {
      content = await fs.readFile(this.getFilePath(documentId), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed = DocumentRecordSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid document record for ${documentId}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async delete(documentId: string): Promise<void> {
    try {
      await fs.unlink(this.getFilePath(documentId));
    } catch (error) {
      // already gone
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }
  }

  /**
   * Every stored document id, sorted
   */
  async list(): Promise<string[]> {
    const ids: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      let entries: Dirent[];
      try {
        entries = await fs.readdir(dir, { withFileTypes: true });
      } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          return;
        }
        throw error;
      }

      for (const entry of entries) {
        const fullPath = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(fullPath);
        } else if (entry.isFile() && entry.name.endsWith('.json')) {
          const stored = StoredIdSchema.safeParse(JSON.parse(await fs.readFile(fullPath, 'utf-8')));
          if (!stored.success) {
            throw new Error(`Invalid document record in ${fullPath}: ${stored.error.message}`);
          }
          ids.push(stored.data.documentId);
        }
      }
    };

    await walk(this.basePath);
    return ids.sort();
  }

  async exists(documentId: string): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(documentId));
      return true;
    } catch {
      return false;
    }
  }

  private getFilePath(documentId: string): string {
    const match = SCHEME.exec(documentId);
    const segments = match ? [match[1], ...match[2].split('/')] : documentId.split('/');
    return `${join(this.basePath, ...segments.map(toFileName))}.json`;
  }

  private calculateHash(content: string): string {
    return createHash('sha256').update(content).digest('hex');
  }
}
